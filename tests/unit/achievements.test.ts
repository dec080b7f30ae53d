import { describe, it, expect } from 'vitest';
import { ACHIEVEMENTS, measureRequirement, summarizeCompletion } from '../../src/lib/achievements';
import { emptyProgress } from '../../src/lib/progressStore';
import { TEST_SITES, createEngine, site } from '../helpers/fixtures';

const obelisk = site('obelisk');
const harbor = site('harbor');
const tower = site('tower');

function unlockedIds(engine: ReturnType<typeof createEngine>['engine']): string[] {
    return engine.achievements.unlocked().map(p => p.achievement.id);
}

describe('completion summary', () => {
    it('needs the discovery key and every knowledge key of a site', () => {
        const state = {
            ...emptyProgress(),
            explorerBadges: new Set(['obelisk', 'harbor']),
            scholarBadges: new Set(['obelisk_base']),
        };

        expect(summarizeCompletion(TEST_SITES, state)).toEqual({
            completedSites: 1,
            totalSites: 3,
            cityComplete: false,
            eraComplete: false,
        });
    });

    it('never treats an empty catalog as complete', () => {
        const summary = summarizeCompletion([], emptyProgress());
        expect(measureRequirement({ kind: 'allSites' }, emptyProgress(), summary)).toEqual({ current: 0, required: 1 });
    });
});

describe('AchievementEngine', () => {
    it('unlocks each achievement exactly once along a full playthrough', () => {
        const { engine, store } = createEngine();

        // harbor has no sub-locations, so verifying it completes the site
        engine.badges.verifyVisit(harbor, harbor.coordinates);
        expect(store.snapshot().totalPoints).toBe(60);
        expect(unlockedIds(engine)).toEqual(['first_discovery']);

        expect(engine.achievements.evaluate()).toEqual([]);
        expect(store.snapshot().totalPoints).toBe(60);

        // Completing tower finishes city Beta and the Late era
        engine.badges.awardScholarBadge('tower_gate');
        engine.badges.verifyVisit(tower, tower.coordinates);
        expect(store.snapshot().totalPoints).toBe(271);
        expect(unlockedIds(engine)).toEqual(['first_discovery', 'first_secret', 'city_champion', 'era_expert']);

        engine.badges.awardScholarBadge('obelisk_base');
        engine.badges.awardScholarBadge('obelisk_top');
        engine.badges.selfReportVisit(obelisk);
        expect(store.snapshot().totalPoints).toBe(628);
        expect(unlockedIds(engine)).toEqual([
            'first_discovery',
            'curious_traveler',
            'master_explorer',
            'first_secret',
            'city_champion',
            'era_expert',
            'true_pharaoh',
        ]);
        expect(engine.achievements.completionPercent()).toBe(100);
    });

    it('records the unlock time', () => {
        const { engine, clock } = createEngine();
        engine.badges.recordCorrectQuiz('q1');

        const progress = engine.achievements.progress('quiz_starter');
        expect(progress?.unlocked).toBe(true);
        expect(progress?.unlockedAt).toBe(clock.now());
        expect(progress?.fraction).toBe(1);
        expect(engine.achievements.progress('no_such_achievement')).toBeNull();
    });

    it('picks the locked achievement closest to completion', () => {
        const { engine } = createEngine();

        expect(engine.achievements.nextAchievement()?.achievement.id).toBe('first_discovery');

        engine.badges.awardScholarBadge('obelisk_base');

        const next = engine.achievements.nextAchievement();
        expect(next?.achievement.id).toBe('eager_learner');
        expect(next?.current).toBe(1);
        expect(next?.required).toBe(5);
        expect(next?.fraction).toBe(0.2);
    });

    it('recomputes derived values after every commit', () => {
        const { engine } = createEngine();
        expect(engine.achievements.fullyCompletedSitesCount()).toBe(0);

        engine.badges.verifyVisit(harbor, harbor.coordinates);

        expect(engine.achievements.fullyCompletedSitesCount()).toBe(1);
        expect(engine.achievements.completionPercent()).toBe(33);
    });

    it('re-evaluates against a replaced catalog', () => {
        const { engine, catalog } = createEngine();
        engine.badges.verifyVisit(harbor, harbor.coordinates);

        catalog.replace([harbor]);

        expect(engine.achievements.completionPercent()).toBe(100);
        expect(engine.achievements.evaluate().map(a => a.id)).toEqual([
            'master_explorer',
            'city_champion',
            'era_expert',
            'true_pharaoh',
        ]);
    });

    it('leaves catalog-wide achievements locked for an empty catalog', () => {
        const { engine } = createEngine({ sites: [] });

        expect(engine.achievements.evaluate()).toEqual([]);
        expect(engine.achievements.progress('master_explorer')?.unlocked).toBe(false);
        expect(engine.achievements.completionPercent()).toBe(0);
    });

    it('queues unlock notifications until acknowledged', () => {
        const { engine } = createEngine();
        engine.badges.awardScholarBadge('obelisk_base');
        engine.badges.recordCorrectQuiz('q1');

        expect(engine.achievements.pendingNotification()?.id).toBe('first_secret');
        expect(engine.achievements.acknowledgeNotification('first_discovery')).toBe(false);
        expect(engine.achievements.acknowledgeNotification('first_secret')).toBe(true);
        expect(engine.achievements.pendingNotification()?.id).toBe('quiz_starter');
        expect(engine.achievements.acknowledgeNotification('quiz_starter')).toBe(true);
        expect(engine.achievements.pendingNotification()).toBeNull();
    });

    it('forgets unlocks and notifications on reset', () => {
        const { engine, store } = createEngine();
        engine.badges.recordCorrectQuiz('q1');

        engine.resetProgress();

        expect(store.snapshot().totalPoints).toBe(0);
        expect(engine.achievements.unlocked()).toEqual([]);
        expect(engine.achievements.locked()).toHaveLength(ACHIEVEMENTS.length);
        expect(engine.achievements.pendingNotification()).toBeNull();
    });
});
