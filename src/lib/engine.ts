import { AchievementEngine } from './achievements';
import { BadgeEngine } from './badges';
import { ContentCatalog } from './content';
import { KeyValueStore } from './kvStore';
import { DeviceLocationPort } from './location';
import { ProgressListener, ProgressStore } from './progressStore';
import { Rank, nextRank, pointsToNext, progressFraction, rankFor } from './ranks';

export interface ProgressSummary {
    totalPoints: number;
    rank: Rank;
    nextRank: Rank | null;
    pointsToNextRank: number | null;
    rankProgress: number;
    knowledgeKeys: number;
    discoveryKeys: number;
    selfReportedSites: number;
    correctQuizzes: number;
    achievementsUnlocked: number;
    achievementsTotal: number;
    completedSites: number;
    completionPercent: number;
}

/** Everything one user's progress needs, wired around a single store. */
export class ProgressEngine {
    readonly achievements: AchievementEngine;
    readonly badges: BadgeEngine;
    readonly location: DeviceLocationPort;

    constructor(readonly store: ProgressStore, readonly catalog: ContentCatalog, now: () => number = Date.now) {
        this.achievements = new AchievementEngine(store, catalog, now);
        this.badges = new BadgeEngine(store, this.achievements, now);
        this.location = new DeviceLocationPort(now);
    }

    summary(): ProgressSummary {
        const state = this.store.snapshot();
        const rank = rankFor(state.totalPoints);
        const achievements = this.achievements.list();

        return {
            totalPoints: state.totalPoints,
            rank,
            nextRank: nextRank(rank),
            pointsToNextRank: pointsToNext(rank, state.totalPoints),
            rankProgress: progressFraction(rank, state.totalPoints),
            knowledgeKeys: state.scholarBadges.size,
            discoveryKeys: state.explorerBadges.size,
            selfReportedSites: state.selfReportedSites.size,
            correctQuizzes: state.completedQuizzes.size,
            achievementsUnlocked: achievements.filter(a => a.unlocked).length,
            achievementsTotal: achievements.length,
            completedSites: this.achievements.fullyCompletedSitesCount(),
            completionPercent: this.achievements.completionPercent(),
        };
    }

    resetProgress(): void {
        this.store.reset();
        this.achievements.clearNotifications();
    }

    onProgressChanged(listener: ProgressListener): () => void {
        return this.store.subscribe(listener);
    }
}

export type KeyValueStoreFactory = (userId: string) => KeyValueStore;

interface EngineEntry {
    loading: Promise<ProgressEngine>;
    lastUsed: number;
}

/**
 * Per-user engine registry. Concurrent first requests for the same user share
 * one load from persistence. Engines idle for longer than the eviction window
 * are flushed and dropped; the next request reloads them.
 */
export class ProgressEngines {
    private readonly engines = new Map<string, EngineEntry>();

    constructor(
        private readonly storeFor: KeyValueStoreFactory,
        private readonly catalog: ContentCatalog,
        private readonly now: () => number = Date.now
    ) {}

    get size(): number {
        return this.engines.size;
    }

    forUser(userId: string): Promise<ProgressEngine> {
        const existing = this.engines.get(userId);
        if (existing) {
            existing.lastUsed = this.now();
            return existing.loading;
        }

        const loading = ProgressStore.open(this.storeFor(userId)).then(
            store => new ProgressEngine(store, this.catalog, this.now)
        );
        const entry: EngineEntry = { loading, lastUsed: this.now() };
        this.engines.set(userId, entry);
        // A failed load is not cached; the next request retries
        void loading.catch(() => {
            if (this.engines.get(userId) === entry) this.engines.delete(userId);
        });
        return loading;
    }

    /**
     * Drops engines unused for `maxIdleMs` that have no device attached, after
     * their pending writes land. Returns how many were dropped.
     */
    async evictIdle(maxIdleMs: number): Promise<number> {
        const cutoff = this.now() - maxIdleMs;
        const candidates = Array.from(this.engines.entries()).filter(([, entry]) => entry.lastUsed <= cutoff);

        let evicted = 0;
        for (const [userId, entry] of candidates) {
            let engine: ProgressEngine;
            try {
                engine = await entry.loading;
            } catch {
                // A failed load already removed itself
                continue;
            }
            if (engine.location.isAttached()) continue;

            const seen = entry.lastUsed;
            await engine.store.flush();

            // Used again while flushing: keep it
            if (this.engines.get(userId) !== entry || entry.lastUsed !== seen) continue;
            this.engines.delete(userId);
            evicted++;
        }
        return evicted;
    }

    async flushAll(): Promise<void> {
        const engines = await Promise.allSettled(Array.from(this.engines.values(), entry => entry.loading));
        await Promise.all(
            engines.flatMap(result => (result.status === 'fulfilled' ? [result.value.store.flush()] : []))
        );
    }
}
