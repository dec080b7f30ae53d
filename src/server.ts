import { createServer } from 'http';
import { env } from './config/env';
import { buildApp } from './app';
import { ContentCatalog, loadSitesFile } from './lib/content';
import { closePool } from './lib/db';
import { attachDeviceChannel } from './lib/deviceChannel';
import { KeyValueStoreFactory, ProgressEngines } from './lib/engine';
import { MemoryKeyValueStore, NamespacedKeyValueStore, PostgresKeyValueStore } from './lib/kvStore';
import { verifyDatabaseSchema } from './startup/verifySchema';

async function main() {
    const catalog = new ContentCatalog(await loadSitesFile(env.CONTENT_PATH));

    let storeFor: KeyValueStoreFactory;
    if (env.PROGRESS_STORE === 'postgres') {
        await verifyDatabaseSchema();
        storeFor = (userId) => new PostgresKeyValueStore(userId);
    } else {
        console.warn('PROGRESS_STORE=memory: progress is lost on restart');
        const shared = new MemoryKeyValueStore();
        storeFor = (userId) => new NamespacedKeyValueStore(shared, userId);
    }

    const engines = new ProgressEngines(storeFor, catalog);
    const app = buildApp({ engines, catalog, locationTimeoutMs: env.LOCATION_TIMEOUT_MS });
    const server = createServer(app);
    const wss = attachDeviceChannel(server, engines);

    const sweep = setInterval(() => {
        engines
            .evictIdle(env.ENGINE_IDLE_TTL_MS)
            .then((count) => {
                if (count > 0) console.log(`Evicted ${count} idle progress engine(s)`);
            })
            .catch((error) => console.error('Engine eviction failed:', error));
    }, Math.min(env.ENGINE_IDLE_TTL_MS, 60_000));
    sweep.unref();

    const shutdown = async (signal: string) => {
        console.log(`${signal} received, flushing progress`);
        clearInterval(sweep);
        wss.close();
        server.close();
        await engines.flushAll();
        await closePool();
        process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    server.listen(env.PORT, '0.0.0.0', () => {
        console.log(`Server is running on port ${env.PORT} with ${catalog.sites().length} sites`);
        console.log(`WebSocket server ready at ws://0.0.0.0:${env.PORT}/ws`);
    });
}

main().catch((error) => {
    console.error('Startup failed:', error);
    process.exit(1);
});
