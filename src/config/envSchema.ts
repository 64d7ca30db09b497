import { z } from 'zod';

const boolStrictTrue = z.preprocess((v) => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return v.trim().toLowerCase() === 'true';
    return v;
}, z.boolean());

const toNumber = (v: unknown): unknown => {
    if (v === undefined) return undefined;
    if (typeof v === 'string') return Number(v);
    return v;
};

const positiveInt = z.preprocess(toNumber, z.number().int().positive());
const nonNegativeMs = z.preprocess(toNumber, z.number().int().nonnegative());

// `KEY=` in .env means unset
const emptyAsUnset = (v: unknown): unknown => (v === '' ? undefined : v);
const optionalString = z.preprocess(emptyAsUnset, z.string().optional());

export const envSchema = z.object({
    DATABASE_URL: optionalString,
    PGHOST: z.string().default('localhost'),
    PGPORT: z.coerce.number().int().min(1).max(65535).default(5432),
    PGUSER: z.string().optional(),
    PGPASSWORD: z.string().optional(),
    PGDATABASE: z.string().default('listing_scout'),
    PGSSL: boolStrictTrue.default(false),
    PG_POOL_MAX: positiveInt.default(10),

    CACHE_DIR: z.string().min(1).default('data/cache'),
    LOGS_PATH: z.string().min(1).default('outs/logs'),
    SITES_CONFIG: z.string().min(1).default('config/sites.json'),

    REQUEST_DELAY_MS: nonNegativeMs.default(1_000),
    BATCH_DELAY_MS: nonNegativeMs.default(5_000),
    MAX_RETRIES: positiveInt.default(3),
    MAX_CONSECUTIVE_FAILURES: positiveInt.default(5),
    REQUEST_TIMEOUT_MS: positiveInt.default(30_000),
    BATCH_SIZE: positiveInt.default(10),
    DETAIL_BATCH_SIZE: positiveInt.default(50),

    PROXY_URL: z.preprocess(emptyAsUnset, z.string().url().optional()),
    USER_AGENT: optionalString,

    CRAWLEE_LOG_LEVEL: z.string().default(''),
}).passthrough();

export type Env = z.infer<typeof envSchema>;
