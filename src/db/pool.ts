/**
 * src/db/pool.ts
 *
 * Singleton PostgreSQL connection pool.
 *
 * The pool is lazy: it does NOT connect until the first query is made, so
 * importing this module never blocks startup. Settings come from the
 * validated env (DATABASE_URL wins over the individual PG* variables).
 */

import pkg from 'pg';
import { log } from 'crawlee';
import { env } from '../config/env.js';

const { Pool } = pkg;

// ─── Build connection config ────────────────────────────────────────────────

function buildPoolConfig(): pkg.PoolConfig {
    const common = {
        max: env.PG_POOL_MAX,
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 5_000,
    };

    if (env.DATABASE_URL) {
        return {
            ...common,
            connectionString: env.DATABASE_URL,
            ssl: env.DATABASE_URL.includes('sslmode=require') || env.PGSSL
                ? { rejectUnauthorized: false }
                : undefined,
        };
    }

    return {
        ...common,
        host: env.PGHOST,
        port: env.PGPORT,
        user: env.PGUSER,
        password: env.PGPASSWORD,
        database: env.PGDATABASE,
        ssl: env.PGSSL ? { rejectUnauthorized: false } : undefined,
    };
}

// ─── Singleton pool ─────────────────────────────────────────────────────────

let pool: pkg.Pool | null = null;

export function getPool(): pkg.Pool {
    if (pool === null) {
        pool = new Pool(buildPoolConfig());
        // Surface idle-client errors instead of crashing the process
        pool.on('error', (err) => {
            log.error(`[DB] Unexpected pool error: ${err.message}`);
        });
    }
    return pool;
}

/**
 * Execute a parameterised SQL query.
 *
 * @example
 *   const { rows } = await query('SELECT url FROM listings WHERE source = $1', ['acme']);
 */
export async function query<T extends pkg.QueryResultRow = pkg.QueryResultRow>(
    sql: string,
    values?: unknown[]
): Promise<pkg.QueryResult<T>> {
    return getPool().query<T>(sql, values);
}

/** Returns true if the DB answers `SELECT 1`. */
export async function pingDb(): Promise<boolean> {
    try {
        await query('SELECT 1');
        return true;
    } catch (err) {
        log.warning(`[DB] Ping failed: ${err instanceof Error ? err.message : String(err)}`);
        return false;
    }
}

/** Close the pool during shutdown. */
export async function closeDb(): Promise<void> {
    if (pool !== null) {
        await pool.end();
        pool = null;
    }
}
