import { z } from 'zod';
import { config } from 'dotenv';
import { resolve } from 'path';
import { ConfigError } from './lib/sync-errors';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    DATA_DIR: z.string().min(1).default('./data'),

    SPOTIFY_PLAYLIST_ID: z.string().min(1).default('37i9dQZEVXbMDoHDwVN2tF'),
    SPOTIFY_CLIENT_ID: z.string().min(1),
    SPOTIFY_CLIENT_SECRET: z.string().min(1),

    YOUTUBE_PLAYLIST_ID: z.string().min(1),
    YOUTUBE_REFRESH_TOKEN: z.string().min(1),
    GOOGLE_CLIENT_ID: z.string().min(1).optional(),
    GOOGLE_CLIENT_SECRET: z.string().min(1).optional(),
    YOUTUBE_REQUESTS_PER_SECOND: z.coerce.number().positive().default(2),

    CACHE_TTL_DAYS: z.coerce.number().int().positive().default(30),
    LOCK_STALE_SECONDS: z.coerce.number().int().positive().default(1800),

    // Worker mode
    REDIS_URL: z.string().url().optional(),
    SYNC_CRON: z.string().min(1).default('0 */6 * * *'),
});

export type Env = z.infer<typeof envSchema>;

// Load .env from project root
export function loadDotenv(): void {
    config({ path: resolve(__dirname, '../../../.env') });
}

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
    // Empty strings from a half-filled .env count as unset
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(source)) {
        if (value !== undefined && value.trim() !== '') {
            cleaned[key] = value.trim();
        }
    }

    const parsed = envSchema.safeParse(cleaned);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(
            (issue) => `${issue.path.join('.')}: ${issue.message}`
        );
        throw new ConfigError('Invalid environment variables', issues);
    }

    return parsed.data;
}
