import { ContentCatalog, Site } from './content';
import { Memo } from './memo';
import { ProgressState, ProgressStore, Timestamp, withEntry } from './progressStore';

export type AchievementCategory = 'exploration' | 'knowledge' | 'mastery';

export type ProgressCounter = 'completedSites' | 'scholarBadges' | 'correctQuizzes';

export type AchievementRequirement =
    | { kind: 'count'; counter: ProgressCounter; threshold: number }
    | { kind: 'allSites' }
    | { kind: 'cityComplete' }
    | { kind: 'eraComplete' }
    | { kind: 'fullCompletion' };

export interface Achievement {
    id: string;
    name: string;
    description: string;
    category: AchievementCategory;
    requirement: AchievementRequirement;
    rewardPoints: number;
}

export interface AchievementProgress {
    achievement: Achievement;
    current: number;
    required: number;
    /** current / required, capped at 1 */
    fraction: number;
    unlocked: boolean;
    unlockedAt: Timestamp | null;
}

// Ids are persisted; never rename one.
export const ACHIEVEMENTS: readonly Achievement[] = [
    {
        id: 'first_discovery',
        name: 'First Discovery',
        description: 'Fully unlock your first site',
        category: 'exploration',
        requirement: { kind: 'count', counter: 'completedSites', threshold: 1 },
        rewardPoints: 10,
    },
    {
        id: 'curious_traveler',
        name: 'Curious Traveler',
        description: 'Fully unlock 3 sites',
        category: 'exploration',
        requirement: { kind: 'count', counter: 'completedSites', threshold: 3 },
        rewardPoints: 25,
    },
    {
        id: 'dedicated_explorer',
        name: 'Dedicated Explorer',
        description: 'Fully unlock 5 sites',
        category: 'exploration',
        requirement: { kind: 'count', counter: 'completedSites', threshold: 5 },
        rewardPoints: 50,
    },
    {
        id: 'master_explorer',
        name: 'Master Explorer',
        description: 'Fully unlock every site',
        category: 'exploration',
        requirement: { kind: 'allSites' },
        rewardPoints: 100,
    },
    {
        id: 'first_secret',
        name: 'First Secret',
        description: 'Earn your first Knowledge Key',
        category: 'knowledge',
        requirement: { kind: 'count', counter: 'scholarBadges', threshold: 1 },
        rewardPoints: 10,
    },
    {
        id: 'eager_learner',
        name: 'Eager Learner',
        description: 'Earn 5 Knowledge Keys',
        category: 'knowledge',
        requirement: { kind: 'count', counter: 'scholarBadges', threshold: 5 },
        rewardPoints: 25,
    },
    {
        id: 'knowledge_seeker',
        name: 'Knowledge Seeker',
        description: 'Earn 10 Knowledge Keys',
        category: 'knowledge',
        requirement: { kind: 'count', counter: 'scholarBadges', threshold: 10 },
        rewardPoints: 50,
    },
    {
        id: 'quiz_starter',
        name: 'Quiz Starter',
        description: 'Answer your first quiz correctly',
        category: 'mastery',
        requirement: { kind: 'count', counter: 'correctQuizzes', threshold: 1 },
        rewardPoints: 10,
    },
    {
        id: 'quiz_apprentice',
        name: 'Quiz Apprentice',
        description: 'Answer 5 quizzes correctly',
        category: 'mastery',
        requirement: { kind: 'count', counter: 'correctQuizzes', threshold: 5 },
        rewardPoints: 25,
    },
    {
        id: 'quiz_master',
        name: 'Quiz Master',
        description: 'Answer 10 quizzes correctly',
        category: 'mastery',
        requirement: { kind: 'count', counter: 'correctQuizzes', threshold: 10 },
        rewardPoints: 50,
    },
    {
        id: 'city_champion',
        name: 'City Champion',
        description: 'Fully unlock all sites in one city',
        category: 'mastery',
        requirement: { kind: 'cityComplete' },
        rewardPoints: 75,
    },
    {
        id: 'era_expert',
        name: 'Era Expert',
        description: 'Fully unlock all sites from one historical period',
        category: 'mastery',
        requirement: { kind: 'eraComplete' },
        rewardPoints: 75,
    },
    {
        id: 'true_pharaoh',
        name: 'True Pharaoh',
        description: 'Achieve 100% completion',
        category: 'mastery',
        requirement: { kind: 'fullCompletion' },
        rewardPoints: 200,
    },
];

export interface CompletionSummary {
    completedSites: number;
    totalSites: number;
    cityComplete: boolean;
    eraComplete: boolean;
}

/** Discovery key held and every sub-location's knowledge key earned. */
export function isSiteFullyCompleted(site: Site, state: ProgressState): boolean {
    if (!state.explorerBadges.has(site.id)) return false;
    return site.subLocations.every(sub => state.scholarBadges.has(sub.id));
}

function anyGroupComplete(sites: readonly Site[], completed: ReadonlySet<string>, groupOf: (site: Site) => string) {
    const groups = new Map<string, Site[]>();
    for (const site of sites) {
        const key = groupOf(site);
        groups.set(key, [...(groups.get(key) ?? []), site]);
    }
    for (const members of groups.values()) {
        if (members.length > 0 && members.every(s => completed.has(s.id))) return true;
    }
    return false;
}

export function summarizeCompletion(sites: readonly Site[], state: ProgressState): CompletionSummary {
    const completed = new Set(sites.filter(s => isSiteFullyCompleted(s, state)).map(s => s.id));

    return {
        completedSites: completed.size,
        totalSites: sites.length,
        cityComplete: anyGroupComplete(sites, completed, s => s.city),
        eraComplete: anyGroupComplete(sites, completed, s => s.era),
    };
}

export function measureRequirement(
    requirement: AchievementRequirement,
    state: ProgressState,
    summary: CompletionSummary
): { current: number; required: number } {
    switch (requirement.kind) {
        case 'count': {
            const current =
                requirement.counter === 'completedSites' ? summary.completedSites
                    : requirement.counter === 'scholarBadges' ? state.scholarBadges.size
                        : state.completedQuizzes.size;
            return { current, required: requirement.threshold };
        }
        case 'allSites':
        case 'fullCompletion':
            // An empty catalog never counts as complete
            return { current: summary.completedSites, required: Math.max(1, summary.totalSites) };
        case 'cityComplete':
            return { current: summary.cityComplete ? 1 : 0, required: 1 };
        case 'eraComplete':
            return { current: summary.eraComplete ? 1 : 0, required: 1 };
    }
}

/**
 * Evaluates the catalog against the store and unlocks achievements exactly
 * once. Derived aggregates are memoized against the store generation and the
 * catalog version, so any commit invalidates them before the writer returns.
 */
export class AchievementEngine {
    private readonly summary: Memo<CompletionSummary>;
    private readonly next: Memo<AchievementProgress | null>;
    private readonly notifications: Achievement[] = [];

    constructor(
        private readonly store: ProgressStore,
        private readonly catalog: ContentCatalog,
        private readonly now: () => number = Date.now,
        private readonly definitions: readonly Achievement[] = ACHIEVEMENTS
    ) {
        this.summary = new Memo(() => summarizeCompletion(this.catalog.sites(), this.store.snapshot()));
        this.next = new Memo(() => this.computeNext());
    }

    /** Unlocks every satisfied achievement; returns the ones unlocked by this call. */
    evaluate(): Achievement[] {
        const state = this.store.snapshot();
        const summary = this.completionSummary();

        const satisfied = this.definitions.filter(def => {
            if (state.unlockedAchievements.has(def.id)) return false;
            const { current, required } = measureRequirement(def.requirement, state, summary);
            return current >= required;
        });
        if (satisfied.length === 0) return [];

        const unlockedAt = this.now();
        const fresh: Achievement[] = [];

        this.store.update(current => {
            let unlocked = current.unlockedAchievements;
            let totalPoints = current.totalPoints;

            for (const achievement of satisfied) {
                if (unlocked.has(achievement.id)) continue;
                unlocked = withEntry(unlocked, achievement.id, unlockedAt);
                totalPoints += achievement.rewardPoints;
                fresh.push(achievement);
            }

            if (fresh.length === 0) return null;
            return { ...current, unlockedAchievements: unlocked, totalPoints };
        });

        this.notifications.push(...fresh);
        return fresh;
    }

    completionSummary(): CompletionSummary {
        return this.summary.get(this.cacheKey());
    }

    fullyCompletedSitesCount(): number {
        return this.completionSummary().completedSites;
    }

    completionPercent(): number {
        const { completedSites, totalSites } = this.completionSummary();
        if (totalSites === 0) return 0;
        return Math.round((completedSites / totalSites) * 100);
    }

    progress(achievementId: string): AchievementProgress | null {
        const achievement = this.definitions.find(def => def.id === achievementId);
        return achievement ? this.describe(achievement) : null;
    }

    list(): AchievementProgress[] {
        return this.definitions.map(def => this.describe(def));
    }

    unlocked(): AchievementProgress[] {
        return this.list().filter(p => p.unlocked);
    }

    locked(): AchievementProgress[] {
        return this.list().filter(p => !p.unlocked);
    }

    /** Closest locked achievement; catalog order breaks ties. */
    nextAchievement(): AchievementProgress | null {
        return this.next.get(this.cacheKey());
    }

    pendingNotification(): Achievement | null {
        return this.notifications[0] ?? null;
    }

    /** Dismisses a queued unlock notification; false if it was not pending. */
    acknowledgeNotification(achievementId: string): boolean {
        const index = this.notifications.findIndex(a => a.id === achievementId);
        if (index === -1) return false;
        this.notifications.splice(index, 1);
        return true;
    }

    clearNotifications(): void {
        this.notifications.length = 0;
    }

    private cacheKey(): string {
        return `${this.store.generation}:${this.catalog.version}`;
    }

    private describe(achievement: Achievement): AchievementProgress {
        const state = this.store.snapshot();
        const unlockedAt = state.unlockedAchievements.get(achievement.id) ?? null;
        const { current, required } = measureRequirement(achievement.requirement, state, this.completionSummary());

        return {
            achievement,
            current,
            required,
            fraction: unlockedAt !== null ? 1 : Math.min(1, current / required),
            unlocked: unlockedAt !== null,
            unlockedAt,
        };
    }

    private computeNext(): AchievementProgress | null {
        let best: AchievementProgress | null = null;
        for (const progress of this.locked()) {
            if (!best || progress.fraction > best.fraction) best = progress;
        }
        return best;
    }
}
