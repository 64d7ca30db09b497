import { describe, it, expect } from 'vitest';
import { parseEnv } from './env.js';

describe('parseEnv', () => {
    it('fills in defaults for an empty environment', () => {
        const env = parseEnv({});

        expect(env.DATABASE_URL).toBeUndefined();
        expect(env.PGHOST).toBe('localhost');
        expect(env.PGPORT).toBe(5432);
        expect(env.PGSSL).toBe(false);
        expect(env.CACHE_DIR).toBe('data/cache');
        expect(env.BATCH_SIZE).toBe(10);
        expect(env.DETAIL_BATCH_SIZE).toBe(50);
        expect(env.REQUEST_DELAY_MS).toBe(1000);
        expect(env.MAX_CONSECUTIVE_FAILURES).toBe(5);
    });

    it('parses numbers and flags and maps DB_* aliases', () => {
        const env = parseEnv({
            DB_HOST: 'db.internal',
            DB_PASSWORD: 'test-secret',
            BATCH_SIZE: '25',
            REQUEST_DELAY_MS: '0',
            PGSSL: ' TRUE ',
            DATABASE_URL: '',
        });

        expect(env.PGHOST).toBe('db.internal');
        expect(env.PGPASSWORD).toBe('test-secret');
        expect(env.BATCH_SIZE).toBe(25);
        expect(env.REQUEST_DELAY_MS).toBe(0);
        expect(env.PGSSL).toBe(true);
        expect(env.DATABASE_URL).toBeUndefined();
    });

    it('prefers PG* over the DB_* aliases', () => {
        expect(parseEnv({ PGHOST: 'primary', DB_HOST: 'alias' }).PGHOST).toBe('primary');
    });

    it('reports every invalid variable on its own line', () => {
        expect(() => parseEnv({ BATCH_SIZE: '0', PROXY_URL: 'not a url' })).toThrow(
            /^Invalid environment variables:\n- BATCH_SIZE: .+\n- PROXY_URL: .+$/
        );
    });
});
