import { describe, it, expect, vi } from 'vitest';
import { ContentCatalog } from '../../src/lib/content';
import { ProgressEngines } from '../../src/lib/engine';
import { KeyValueStore, MemoryKeyValueStore, NamespacedKeyValueStore } from '../../src/lib/kvStore';
import { TEST_SITES, createClock, createEngine, site } from '../helpers/fixtures';

describe('ProgressEngine.summary', () => {
    it('reports points, rank and counters', () => {
        const { engine } = createEngine();
        const harbor = site('harbor');

        engine.badges.verifyVisit(harbor, harbor.coordinates);
        const summary = engine.summary();

        expect(summary.totalPoints).toBe(60);
        expect(summary.rank.id).toBe('traveler');
        expect(summary.nextRank?.id).toBe('explorer');
        expect(summary.pointsToNextRank).toBe(91);
        expect(summary.rankProgress).toBeCloseTo(0.09);
        expect(summary.discoveryKeys).toBe(1);
        expect(summary.knowledgeKeys).toBe(0);
        expect(summary.achievementsUnlocked).toBe(1);
        expect(summary.achievementsTotal).toBe(13);
        expect(summary.completedSites).toBe(1);
        expect(summary.completionPercent).toBe(33);
    });

    it('tells subscribers about every change', () => {
        const { engine } = createEngine();
        const listener = vi.fn();
        engine.onProgressChanged(listener);

        engine.badges.discoverPlace('cafe');

        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener.mock.calls[0][0].totalPoints).toBe(1);
    });
});

describe('ProgressEngines', () => {
    const catalog = new ContentCatalog(TEST_SITES);

    it('shares one load between concurrent first requests', async () => {
        const backing = new MemoryKeyValueStore();
        const storeFor = vi.fn((userId: string) => new NamespacedKeyValueStore(backing, userId));
        const engines = new ProgressEngines(storeFor, catalog);

        const [a, b] = await Promise.all([engines.forUser('u1'), engines.forUser('u1')]);

        expect(a).toBe(b);
        expect(storeFor).toHaveBeenCalledTimes(1);
    });

    it('keeps users apart and persists under their namespace', async () => {
        const backing = new MemoryKeyValueStore();
        const engines = new ProgressEngines(userId => new NamespacedKeyValueStore(backing, userId), catalog, createClock().now);

        const first = await engines.forUser('u1');
        first.badges.recordCorrectQuiz('q1');
        const second = await engines.forUser('u2');
        await engines.flushAll();

        expect(second.summary().totalPoints).toBe(0);
        expect(await backing.get('u1:points')).toBe('20');

        const reloaded = await new ProgressEngines(userId => new NamespacedKeyValueStore(backing, userId), catalog).forUser('u1');
        expect(reloaded.summary().totalPoints).toBe(20);
        expect(reloaded.achievements.progress('quiz_starter')?.unlocked).toBe(true);
    });

    it('retries a load that failed', async () => {
        const broken: KeyValueStore = {
            get: () => Promise.reject(new Error('connection refused')),
            set: () => Promise.resolve(),
            delete: () => Promise.resolve(),
        };
        const storeFor = vi.fn(() => broken);
        const engines = new ProgressEngines(storeFor, catalog);

        await expect(engines.forUser('u1')).rejects.toThrow('connection refused');
        await expect(engines.forUser('u1')).rejects.toThrow('connection refused');
        expect(storeFor).toHaveBeenCalledTimes(2);
    });

    it('evicts an idle engine and reloads it from the store', async () => {
        const clock = createClock();
        const backing = new MemoryKeyValueStore();
        const storeFor = vi.fn((userId: string) => new NamespacedKeyValueStore(backing, userId));
        const engines = new ProgressEngines(storeFor, catalog, clock.now);

        const first = await engines.forUser('u1');
        first.badges.recordCorrectQuiz('q1');
        clock.advanceMs(60_000);

        expect(await engines.evictIdle(60_000)).toBe(1);
        expect(engines.size).toBe(0);

        const reloaded = await engines.forUser('u1');
        expect(reloaded).not.toBe(first);
        expect(reloaded.summary().totalPoints).toBe(20);
        expect(storeFor).toHaveBeenCalledTimes(2);
    });

    it('keeps recently used engines and engines with a device attached', async () => {
        const clock = createClock();
        const backing = new MemoryKeyValueStore();
        const engines = new ProgressEngines(userId => new NamespacedKeyValueStore(backing, userId), catalog, clock.now);

        await engines.forUser('idle');
        const withDevice = await engines.forUser('device');
        withDevice.location.attach(() => undefined);
        clock.advanceMs(60_000);
        await engines.forUser('recent');

        expect(await engines.evictIdle(60_000)).toBe(1);
        expect(engines.size).toBe(2);
    });
});
