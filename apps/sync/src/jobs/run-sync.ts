import { join } from 'path';
import type { Env } from '../env';
import { SpotifySource } from '../clients/spotify-source';
import { YouTubeDestination } from '../clients/youtube-destination';
import { loadGoogleCredentials } from '../lib/google-credentials';
import { createSyncLoggers } from '../lib/logger';
import type { Logger, SyncLoggers } from '../lib/logger';
import { AdaptiveRateLimiter } from '../lib/rate-limiter';
import type { RunLock } from '../lib/run-lock';
import { errorMessage } from '../lib/sync-errors';
import { YouTubeApi } from '../lib/youtube-api';
import { YouTubeAuthError } from '../lib/youtube-errors';
import { SyncEngine } from '../services/sync-engine';
import { STATUS_FILE, SyncStatusWriter } from '../services/sync-status';
import { VideoCache } from '../services/video-cache';
import type { DestinationProvider, SourceProvider } from '../types/providers';
import type { RunResult } from '../types/sync';
import { failedResult } from '../types/sync';

export const CACHE_FILE = '.video_cache.json';

export interface Providers {
    source: SourceProvider;
    destination: DestinationProvider;
}

export type ProviderFactory = (env: Env, loggers: SyncLoggers) => Promise<Providers>;

export interface RunSyncDeps {
    env: Env;
    logger: Logger;
    lock: RunLock;
    createProviders?: ProviderFactory;
}

export type RunSyncOutcome =
    | { status: 'skipped' }
    | { status: 'completed'; result: RunResult };

export const createLiveProviders: ProviderFactory = async (env, loggers) => {
    const credentials = await loadGoogleCredentials(env, env.DATA_DIR);

    const source = new SpotifySource({
        clientId: env.SPOTIFY_CLIENT_ID,
        clientSecret: env.SPOTIFY_CLIENT_SECRET,
        logger: loggers.spotify,
    });

    const rateLimiter = new AdaptiveRateLimiter(
        { logger: loggers.youtube },
        { initialRate: env.YOUTUBE_REQUESTS_PER_SECOND }
    );
    const api = new YouTubeApi({
        clientId: credentials.clientId,
        clientSecret: credentials.clientSecret,
        refreshToken: env.YOUTUBE_REFRESH_TOKEN,
        logger: loggers.youtube,
        rateLimiter,
    });

    return { source, destination: new YouTubeDestination(api, loggers.youtube) };
};

export function exitCodeFor(outcome: RunSyncOutcome): number {
    if (outcome.status === 'skipped') return 0;
    return outcome.result.success ? 0 : 1;
}

/**
 * One complete run: lock, status, clients, cache, engine. Always releases
 * the lock and always leaves a final status record behind.
 */
export async function runSync(deps: RunSyncDeps): Promise<RunSyncOutcome> {
    const { env, logger, lock } = deps;
    const loggers = createSyncLoggers(logger);
    const createProviders = deps.createProviders ?? createLiveProviders;

    const status = new SyncStatusWriter(join(env.DATA_DIR, STATUS_FILE), loggers.status);

    let acquired: boolean;
    try {
        acquired = await lock.acquire();
    } catch (error) {
        loggers.lock.error({ error }, 'Failed to acquire run lock');
        const result = failedResult({
            code: 'unexpected',
            message: `Failed to acquire run lock: ${errorMessage(error)}`,
        });
        await status.writeResult(result);
        return { status: 'completed', result };
    }
    if (!acquired) {
        loggers.lock.warn('Another sync running, exiting');
        return { status: 'skipped' };
    }

    try {
        await status.writeRunning();

        let result: RunResult;
        try {
            result = await execute(env, loggers, createProviders);
        } catch (error) {
            loggers.engine.error({ error }, 'Unexpected error');
            result = failedResult({ code: 'unexpected', message: `Unexpected error: ${errorMessage(error)}` });
        }

        await status.writeResult(result);

        if (result.success) {
            loggers.engine.info(
                { added: result.insertedCount, removed: result.removedCount },
                `Sync completed: +${result.insertedCount} -${result.removedCount}`
            );
        } else {
            loggers.engine.warn({ errors: result.errors.map(issue => issue.message) }, 'Sync errors');
        }
        return { status: 'completed', result };
    } finally {
        await lock.release();
    }
}

async function execute(env: Env, loggers: SyncLoggers, createProviders: ProviderFactory): Promise<RunResult> {
    let providers: Providers;
    try {
        providers = await createProviders(env, loggers);
    } catch (error) {
        if (error instanceof YouTubeAuthError) {
            return failedResult({ code: 'upstream_fetch', message: `YouTube auth failed: ${error.message}` });
        }
        throw error;
    }

    const cache = await VideoCache.load(join(env.DATA_DIR, CACHE_FILE), {
        logger: loggers.cache,
        ttlSeconds: env.CACHE_TTL_DAYS * 24 * 60 * 60,
    });

    const engine = new SyncEngine({
        source: providers.source,
        destination: providers.destination,
        cache,
        logger: loggers.engine,
    });

    return engine.reconcile(env.SPOTIFY_PLAYLIST_ID, env.YOUTUBE_PLAYLIST_ID);
}
