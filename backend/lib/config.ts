import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config({
    path: './.env'
});

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

// --- Environment Schema ---
// Every tunable of the pipeline lives here with its default.
const settingsSchema = z.object({
    PORT: z.coerce.number().int().positive().default(5001),
    FRONTEND_URL: z.string().default('http://localhost:8080'),
    NODE_ENV: z.string().default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    // Upstream services
    TMDB_API_KEY: optionalString,
    TMDB_BASE_URL: z.string().url().default('https://api.themoviedb.org/3'),
    MDBLIST_API_KEY: optionalString,
    MDBLIST_BASE_URL: z.string().url().default('https://mdblist.com/api/'),
    LIBRARY_API_URL: z.string().url().default('https://api.strem.io/api/datastoreGet'),
    UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

    // Cache store
    REDIS_URL: optionalString,

    // Cache TTLs (seconds)
    CACHE_TTL_LIBRARY: z.coerce.number().int().positive().default(21_600), // 6 hours
    CACHE_TTL_RECOMMENDATIONS: z.coerce.number().int().positive().default(86_400), // 24 hours
    CACHE_TTL_RATINGS: z.coerce.number().int().positive().default(604_800), // 7 days
    CACHE_TTL_CATALOG: z.coerce.number().int().positive().default(3_600), // 1 hour
    CACHE_TTL_DEGRADED: z.coerce.number().int().positive().default(900), // 15 minutes
    CACHE_STALE_GRACE: z.coerce.number().int().nonnegative().default(86_400),
    CACHE_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

    // Background warming
    CACHE_WARM_INTERVAL_MINUTES: z.coerce.number().positive().default(180),
    CACHE_WARM_THRESHOLD_SECONDS: z.coerce.number().int().nonnegative().default(900),
    CACHE_WARM_ACTIVE_WINDOW_HOURS: z.coerce.number().positive().default(24),
    CACHE_WARM_MAX_USERS: z.coerce.number().int().positive().default(500),

    // Performance limits
    MAX_SEEDS: z.coerce.number().int().positive().default(10),
    MAX_CANDIDATES_PER_SEED: z.coerce.number().int().positive().default(20),
    ITEMS_PER_ROW: z.coerce.number().int().positive().default(20),
    MAX_CONCURRENT_API_CALLS: z.coerce.number().int().positive().default(10),
    REQUEST_DEADLINE_MS: z.coerce.number().int().positive().default(8_000),

    // Retry policy for upstream calls
    RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(200),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
    RETRY_JITTER_MS: z.coerce.number().int().nonnegative().default(100),

    // Niche discovery filters
    DISCOVERY_MIN_VOTES: z.coerce.number().int().nonnegative().default(50),
    DISCOVERY_MAX_VOTES: z.coerce.number().int().positive().default(5_000),
    DISCOVERY_MIN_RATING: z.coerce.number().min(0).max(10).default(7.0),
    DISCOVERY_MAX_KEYWORDS: z.coerce.number().int().positive().default(5),

    // Scoring weights
    SCORE_FREQUENCY_WEIGHT: z.coerce.number().nonnegative().default(1.0),
    SCORE_RATING_WEIGHT: z.coerce.number().nonnegative().default(1.0),
});

export type Settings = z.infer<typeof settingsSchema>;

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    return settingsSchema.parse(env);
}

export const settings: Settings = loadSettings();

export const APP_VERSION = process.env.npm_package_version ?? '1.0.0';
