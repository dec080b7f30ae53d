import { z } from 'zod';
import { KeyValueStore } from './kvStore';

export type Timestamp = number;

/** Immutable snapshot of a user's progress. */
export interface ProgressState {
    readonly totalPoints: number;
    readonly scholarBadges: ReadonlySet<string>;
    readonly explorerBadges: ReadonlySet<string>;
    /** Subset of explorerBadges whose visit was not location-verified */
    readonly selfReportedSites: ReadonlySet<string>;
    /** Last recorded visit of either kind, per site */
    readonly verifiedVisits: ReadonlyMap<string, Timestamp>;
    readonly completedQuizzes: ReadonlySet<string>;
    readonly discoveredPlaces: ReadonlyMap<string, Timestamp>;
    /** Achievement id → unlock time */
    readonly unlockedAchievements: ReadonlyMap<string, Timestamp>;
    readonly favoriteSites: ReadonlySet<string>;
}

export type ProgressListener = (snapshot: ProgressState) => void;

export function emptyProgress(): ProgressState {
    return {
        totalPoints: 0,
        scholarBadges: new Set(),
        explorerBadges: new Set(),
        selfReportedSites: new Set(),
        verifiedVisits: new Map(),
        completedQuizzes: new Set(),
        discoveredPlaces: new Map(),
        unlockedAchievements: new Map(),
        favoriteSites: new Set(),
    };
}

export function withAdded<T>(set: ReadonlySet<T>, value: T): ReadonlySet<T> {
    return new Set([...set, value]);
}

export function withRemoved<T>(set: ReadonlySet<T>, value: T): ReadonlySet<T> {
    const next = new Set(set);
    next.delete(value);
    return next;
}

export function withEntry<K, V>(map: ReadonlyMap<K, V>, key: K, value: V): ReadonlyMap<K, V> {
    return new Map([...map, [key, value]]);
}

// ─── Serialization boundary ────────────────────────────────────────────────

export const PROGRESS_KEYS = [
    'points',
    'scholarBadges',
    'explorerBadges',
    'selfReportedSites',
    'verifiedVisits',
    'discoveredPlaces',
    'completedQuizzes',
    'achievementProgress',
    'favoriteSites',
] as const;

export type ProgressKey = (typeof PROGRESS_KEYS)[number];
export type EncodedProgress = Record<ProgressKey, string>;

const pointsSchema = z.number().int().nonnegative();
const idListSchema = z.array(z.string());
const timestampMapSchema = z.record(z.number());
const achievementProgressSchema = z.object({
    unlocked: z.array(z.string()),
    unlockDates: z.record(z.number()),
});

export function encodeProgress(state: ProgressState): EncodedProgress {
    return {
        points: JSON.stringify(state.totalPoints),
        scholarBadges: JSON.stringify(Array.from(state.scholarBadges)),
        explorerBadges: JSON.stringify(Array.from(state.explorerBadges)),
        selfReportedSites: JSON.stringify(Array.from(state.selfReportedSites)),
        verifiedVisits: JSON.stringify(Object.fromEntries(state.verifiedVisits)),
        discoveredPlaces: JSON.stringify(Object.fromEntries(state.discoveredPlaces)),
        completedQuizzes: JSON.stringify(Array.from(state.completedQuizzes)),
        achievementProgress: JSON.stringify({
            unlocked: Array.from(state.unlockedAchievements.keys()),
            unlockDates: Object.fromEntries(state.unlockedAchievements),
        }),
        favoriteSites: JSON.stringify(Array.from(state.favoriteSites)),
    };
}

function decodeField<T>(key: ProgressKey, raw: string | null | undefined, schema: z.ZodType<T>, fallback: T): T {
    if (raw == null) return fallback;

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        console.warn(`Discarding unreadable progress field "${key}":`, error);
        return fallback;
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
        console.warn(`Discarding invalid progress field "${key}":`, result.error.message);
        return fallback;
    }
    return result.data;
}

export function decodeProgress(raw: Partial<Record<ProgressKey, string | null>>): ProgressState {
    const achievements = decodeField('achievementProgress', raw.achievementProgress, achievementProgressSchema, {
        unlocked: [],
        unlockDates: {},
    });
    const selfReported = decodeField('selfReportedSites', raw.selfReportedSites, idListSchema, []);
    const explorer = decodeField('explorerBadges', raw.explorerBadges, idListSchema, []);

    return {
        totalPoints: decodeField('points', raw.points, pointsSchema, 0),
        scholarBadges: new Set(decodeField('scholarBadges', raw.scholarBadges, idListSchema, [])),
        // A self-reported site always holds its discovery key
        explorerBadges: new Set([...explorer, ...selfReported]),
        selfReportedSites: new Set(selfReported),
        verifiedVisits: new Map(Object.entries(decodeField('verifiedVisits', raw.verifiedVisits, timestampMapSchema, {}))),
        discoveredPlaces: new Map(Object.entries(decodeField('discoveredPlaces', raw.discoveredPlaces, timestampMapSchema, {}))),
        completedQuizzes: new Set(decodeField('completedQuizzes', raw.completedQuizzes, idListSchema, [])),
        unlockedAchievements: new Map(
            achievements.unlocked.map((id): [string, Timestamp] => [id, achievements.unlockDates[id] ?? 0])
        ),
        favoriteSites: new Set(decodeField('favoriteSites', raw.favoriteSites, idListSchema, [])),
    };
}

// ─── Store ─────────────────────────────────────────────────────────────────

/**
 * Single owner of a user's ProgressState. Every commit swaps in a new snapshot,
 * bumps `generation` and queues a best-effort write of the field groups that
 * changed. Writes run in commit order; a failed write is logged and the
 * in-memory snapshot stays authoritative.
 */
export class ProgressStore {
    private state: ProgressState = emptyProgress();
    private persisted: EncodedProgress = encodeProgress(emptyProgress());
    private generationCounter = 0;
    private writeChain: Promise<void> = Promise.resolve();
    private readonly listeners = new Set<ProgressListener>();

    constructor(private readonly kv: KeyValueStore) {}

    static async open(kv: KeyValueStore): Promise<ProgressStore> {
        const store = new ProgressStore(kv);
        await store.load();
        return store;
    }

    async load(): Promise<void> {
        const entries = await Promise.all(
            PROGRESS_KEYS.map(async (key): Promise<[ProgressKey, string | null]> => [key, await this.kv.get(key)])
        );
        const raw: Partial<Record<ProgressKey, string | null>> = Object.fromEntries(entries);

        this.state = decodeProgress(raw);
        this.persisted = encodeProgress(this.state);
        this.generationCounter++;
    }

    snapshot(): ProgressState {
        return this.state;
    }

    /** Bumped on every commit; derived caches key on it. */
    get generation(): number {
        return this.generationCounter;
    }

    /**
     * Read-compute-commit in one synchronous step. Return the same snapshot (or
     * null) from `recipe` to leave the state untouched.
     */
    update(recipe: (current: ProgressState) => ProgressState | null): ProgressState {
        const next = recipe(this.state);
        if (next && next !== this.state) this.commit(next);
        return this.state;
    }

    reset(): void {
        this.state = emptyProgress();
        this.persisted = encodeProgress(this.state);
        this.generationCounter++;
        this.enqueueWrite(() => Promise.all(PROGRESS_KEYS.map(key => this.kv.delete(key))));
        this.notify();
    }

    subscribe(listener: ProgressListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /** Resolves once every queued write has finished. */
    flush(): Promise<void> {
        return this.writeChain;
    }

    private commit(next: ProgressState): void {
        this.state = next;
        this.generationCounter++;

        const encoded = encodeProgress(next);
        const changed = PROGRESS_KEYS.filter(key => encoded[key] !== this.persisted[key]);
        this.persisted = encoded;

        if (changed.length > 0) {
            this.enqueueWrite(() => Promise.all(changed.map(key => this.kv.set(key, encoded[key]))));
        }
        this.notify();
    }

    private enqueueWrite(write: () => Promise<unknown>): void {
        this.writeChain = this.writeChain
            .then(write)
            .then(
                () => undefined,
                (error: unknown) => {
                    console.error('Progress persist failed:', error);
                }
            );
    }

    private notify(): void {
        for (const listener of this.listeners) {
            try {
                listener(this.state);
            } catch (error) {
                console.error('Progress listener failed:', error);
            }
        }
    }
}
