import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
    level?: LevelWithSilent;
    name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    return pino({
        name: options.name ?? 'playlist-mirror',
        level: options.level ?? 'info',
        serializers: {
            err: pino.stdSerializers.err,
            error: pino.stdSerializers.err,
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    });
}

// One child per component, so every line carries its module
export function createSyncLoggers(root: Logger) {
    return {
        engine: root.child({ module: 'SyncEngine' }),
        cache: root.child({ module: 'VideoCache' }),
        spotify: root.child({ module: 'SpotifyClient' }),
        youtube: root.child({ module: 'YouTubeClient' }),
        lock: root.child({ module: 'RunLock' }),
        status: root.child({ module: 'SyncStatus' }),
        worker: root.child({ module: 'SyncWorker' }),
    };
}

export type SyncLoggers = ReturnType<typeof createSyncLoggers>;

export function silentLogger(): Logger {
    return pino({ level: 'silent' });
}
