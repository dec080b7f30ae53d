import { executeRawQuery } from './db';

/** Opaque blob storage, one namespace per user. */
export interface KeyValueStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string): Promise<void>;
    delete(key: string): Promise<void>;
}

export class MemoryKeyValueStore implements KeyValueStore {
    private readonly data = new Map<string, string>();

    async get(key: string): Promise<string | null> {
        return this.data.get(key) ?? null;
    }

    async set(key: string, value: string): Promise<void> {
        this.data.set(key, value);
    }

    async delete(key: string): Promise<void> {
        this.data.delete(key);
    }

    keys(): string[] {
        return Array.from(this.data.keys());
    }
}

export class PostgresKeyValueStore implements KeyValueStore {
    constructor(private readonly ownerId: string) {}

    async get(key: string): Promise<string | null> {
        const rows = await executeRawQuery<{ value: string }>(
            `SELECT value FROM progress_kv WHERE owner_id = $1 AND key = $2 LIMIT 1`,
            [this.ownerId, key]
        );
        return rows[0]?.value ?? null;
    }

    async set(key: string, value: string): Promise<void> {
        await executeRawQuery(
            `INSERT INTO progress_kv (owner_id, key, value, updated_at)
             VALUES ($1, $2, $3, NOW())
             ON CONFLICT (owner_id, key) DO UPDATE
             SET value = EXCLUDED.value, updated_at = NOW()`,
            [this.ownerId, key, value]
        );
    }

    async delete(key: string): Promise<void> {
        await executeRawQuery(
            `DELETE FROM progress_kv WHERE owner_id = $1 AND key = $2`,
            [this.ownerId, key]
        );
    }
}

/** Shares one backing store between users by prefixing every key. */
export class NamespacedKeyValueStore implements KeyValueStore {
    constructor(private readonly inner: KeyValueStore, private readonly namespace: string) {}

    get(key: string): Promise<string | null> {
        return this.inner.get(`${this.namespace}:${key}`);
    }

    set(key: string, value: string): Promise<void> {
        return this.inner.set(`${this.namespace}:${key}`, value);
    }

    delete(key: string): Promise<void> {
        return this.inner.delete(`${this.namespace}:${key}`);
    }
}
