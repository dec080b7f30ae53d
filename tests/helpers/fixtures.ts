/**
 * Shared test fixtures: a small made-up site catalog, a controllable clock and
 * an engine wired to an in-memory key-value store.
 */
import { ContentCatalog, Site } from '../../src/lib/content';
import { ProgressEngine } from '../../src/lib/engine';
import { MemoryKeyValueStore } from '../../src/lib/kvStore';
import { ProgressStore } from '../../src/lib/progressStore';

export const DAY_MS = 24 * 60 * 60 * 1000;

// ~150 m of latitude
export const LAT_150_M = 0.00135;

export const TEST_SITES: Site[] = [
    {
        id: 'obelisk',
        name: 'Test Obelisk',
        city: 'Alpha',
        era: 'Early',
        coordinates: { latitude: 30.0, longitude: 31.0 },
        subLocations: [
            { id: 'obelisk_base', name: 'Base' },
            { id: 'obelisk_top', name: 'Top' },
        ],
    },
    {
        id: 'harbor',
        name: 'Test Harbor',
        city: 'Alpha',
        era: 'Late',
        coordinates: { latitude: 31.0, longitude: 30.0 },
        subLocations: [],
    },
    {
        id: 'tower',
        name: 'Test Tower',
        city: 'Beta',
        era: 'Late',
        coordinates: { latitude: 25.0, longitude: 32.0 },
        subLocations: [{ id: 'tower_gate', name: 'Gate' }],
    },
];

export function site(id: string): Site {
    const found = TEST_SITES.find(s => s.id === id);
    if (!found) throw new Error(`unknown test site ${id}`);
    return found;
}

export function createClock(start = Date.UTC(2024, 0, 1)) {
    let current = start;
    return {
        now: () => current,
        advanceDays(days: number) {
            current += days * DAY_MS;
        },
        advanceMs(ms: number) {
            current += ms;
        },
    };
}

export function createEngine(options: { clock?: ReturnType<typeof createClock>; sites?: Site[] } = {}) {
    const clock = options.clock ?? createClock();
    const kv = new MemoryKeyValueStore();
    const store = new ProgressStore(kv);
    const catalog = new ContentCatalog(options.sites ?? TEST_SITES);
    const engine = new ProgressEngine(store, catalog, clock.now);
    return { engine, store, kv, catalog, clock };
}
