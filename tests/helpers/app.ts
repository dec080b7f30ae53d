import request from 'supertest';
import { Express } from 'express';
import { buildApp } from '../../src/app';
import { ContentCatalog } from '../../src/lib/content';
import { ProgressEngines } from '../../src/lib/engine';
import { MemoryKeyValueStore, NamespacedKeyValueStore } from '../../src/lib/kvStore';
import { TEST_SITES, createClock } from './fixtures';

/** App wired to the test catalog, a fixed clock and an in-memory progress store. */
export function buildTestApp(options: { locationTimeoutMs?: number } = {}) {
    const clock = createClock();
    const backing = new MemoryKeyValueStore();
    const catalog = new ContentCatalog(TEST_SITES);
    const engines = new ProgressEngines(userId => new NamespacedKeyValueStore(backing, userId), catalog, clock.now);
    const app = buildApp({ engines, catalog, locationTimeoutMs: options.locationTimeoutMs ?? 50 });
    return { app, clock, backing, engines };
}

export async function guestLogin(app: Express, fingerprint: string): Promise<{ token: string; userId: string }> {
    const res = await request(app).post('/auth/guest').send({ fingerprint });
    if (res.status !== 201) throw new Error(`guest login failed with ${res.status}`);
    return { token: res.body.token, userId: res.body.userId };
}

export async function guestToken(app: Express, fingerprint: string): Promise<string> {
    return (await guestLogin(app, fingerprint)).token;
}
