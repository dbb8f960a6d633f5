import { join } from 'path';
import { loadDotenv, parseEnv } from './env';
import type { Env } from './env';
import { exitCodeFor, runSync } from './jobs/run-sync';
import { createLogger, createSyncLoggers } from './lib/logger';
import type { Logger } from './lib/logger';
import { closeRedis, createRedis } from './lib/redis';
import { FileRunLock, LOCK_FILE, RedisRunLock } from './lib/run-lock';
import type { RunLock } from './lib/run-lock';
import { ConfigError } from './lib/sync-errors';
import { createSyncQueue, scheduleSync } from './workers/queues';
import { createSyncWorker } from './workers/sync-worker';

export type Mode = 'once' | 'worker';

export function parseMode(argv: readonly string[]): Mode {
    const [mode = 'once'] = argv;
    if (mode === 'once' || mode === 'worker') {
        return mode;
    }
    throw new ConfigError(`Unknown mode "${mode}", expected "once" or "worker"`);
}

async function runOnce(env: Env, logger: Logger): Promise<number> {
    const loggers = createSyncLoggers(logger);
    let lock: RunLock;
    let closeLock = async (): Promise<void> => undefined;

    if (env.REDIS_URL) {
        const redis = createRedis(env.REDIS_URL);
        lock = new RedisRunLock(redis, env.LOCK_STALE_SECONDS, loggers.lock);
        closeLock = () => closeRedis(redis);
    } else {
        lock = new FileRunLock(join(env.DATA_DIR, LOCK_FILE), env.LOCK_STALE_SECONDS, loggers.lock);
    }

    try {
        const outcome = await runSync({ env, logger, lock });
        return exitCodeFor(outcome);
    } finally {
        await closeLock();
    }
}

async function runWorker(env: Env, logger: Logger): Promise<void> {
    if (!env.REDIS_URL) {
        throw new ConfigError('REDIS_URL is required in worker mode');
    }
    const loggers = createSyncLoggers(logger);

    const redis = createRedis(env.REDIS_URL);
    const queue = createSyncQueue(redis);
    const lock = new RedisRunLock(redis, env.LOCK_STALE_SECONDS, loggers.lock);
    const worker = createSyncWorker({
        connection: redis,
        logger: loggers.worker,
        run: () => runSync({ env, logger, lock }),
    });

    await scheduleSync(queue, env.SYNC_CRON);
    loggers.worker.info({ cron: env.SYNC_CRON }, 'Sync worker started');

    const shutdown = async (signal: string) => {
        loggers.worker.info({ signal }, 'Shutting down...');
        try {
            await worker.close();
            await queue.close();
            await closeRedis(redis);
            process.exit(0);
        } catch (error) {
            loggers.worker.error({ error }, 'Shutdown failed');
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
}

export async function main(argv: readonly string[]): Promise<number | null> {
    loadDotenv();

    let env: Env;
    let mode: Mode;
    try {
        mode = parseMode(argv);
        env = parseEnv(process.env);
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(error.message);
            return 1;
        }
        throw error;
    }

    const logger = createLogger({ level: env.LOG_LEVEL });

    if (mode === 'worker') {
        await runWorker(env, logger);
        // Keeps running until a signal arrives
        return null;
    }
    return runOnce(env, logger);
}

if (require.main === module) {
    main(process.argv.slice(2))
        .then((code) => {
            if (code !== null) {
                process.exit(code);
            }
        })
        .catch((error: unknown) => {
            console.error('Fatal error:', error);
            process.exit(1);
        });
}
