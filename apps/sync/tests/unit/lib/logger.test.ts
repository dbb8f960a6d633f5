import { createLogger, createSyncLoggers } from '../../../src/lib/logger';

describe('createLogger', () => {
    test('uses the requested level', () => {
        expect(createLogger({ level: 'warn' }).level).toBe('warn');
        expect(createLogger().level).toBe('info');
    });
});

describe('createSyncLoggers', () => {
    test('tags every component logger with its module', () => {
        const loggers = createSyncLoggers(createLogger({ level: 'silent' }));

        expect(loggers.engine.bindings()).toMatchObject({ module: 'SyncEngine' });
        expect(loggers.cache.bindings()).toMatchObject({ module: 'VideoCache' });
        expect(loggers.youtube.bindings()).toMatchObject({ module: 'YouTubeClient' });
        expect(loggers.worker.bindings()).toMatchObject({ module: 'SyncWorker' });
    });
});
