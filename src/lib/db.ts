import { Pool, QueryResultRow } from 'pg';
import { env } from '../config/env';

let poolInstance: Pool | null = null;

export function getPool(): Pool {
    if (!poolInstance) {
        if (!env.DATABASE_URL) {
            throw new Error('DATABASE_URL is not configured');
        }

        poolInstance = new Pool({
            connectionString: env.DATABASE_URL,
            max: 10,
            idleTimeoutMillis: 30_000,
            connectionTimeoutMillis: 10_000,
        });

        poolInstance.on('error', (error) => {
            console.error('Idle database client error:', error);
        });
    }

    return poolInstance;
}

export async function executeRawQuery<T extends QueryResultRow = QueryResultRow>(
    query: string,
    params: unknown[] = []
): Promise<T[]> {
    const result = await getPool().query<T>(query, params);
    return result.rows;
}

export async function closePool(): Promise<void> {
    if (!poolInstance) return;
    const pool = poolInstance;
    poolInstance = null;
    await pool.end();
}
