import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseEnv } from '../../../src/env';
import type { Env } from '../../../src/env';
import { CACHE_FILE, exitCodeFor, runSync } from '../../../src/jobs/run-sync';
import type { Providers } from '../../../src/jobs/run-sync';
import { silentLogger } from '../../../src/lib/logger';
import type { RunLock } from '../../../src/lib/run-lock';
import { YouTubeAuthError } from '../../../src/lib/youtube-errors';
import { STATUS_FILE } from '../../../src/services/sync-status';
import type { SyncStatusRecord } from '../../../src/services/sync-status';
import type { RunResult, SourceEntry } from '../../../src/types/sync';
import { FakeDestination, candidate, sourceEntry } from '../../helpers/fake-destination';

class FakeLock implements RunLock {
    acquired = 0;
    released = 0;

    constructor(private readonly available = true) {}

    async acquire(): Promise<boolean> {
        if (!this.available) return false;
        this.acquired++;
        return true;
    }

    async release(): Promise<void> {
        this.released++;
    }
}

describe('runSync', () => {
    let dir: string;
    let env: Env;
    let destination: FakeDestination;
    let statusDuringFetch: SyncStatusRecord | null;

    const readStatus = async (): Promise<SyncStatusRecord> =>
        JSON.parse(await readFile(join(dir, STATUS_FILE), 'utf-8'));

    const providers = (): Providers => ({
        source: {
            fetchPlaylist: async (): Promise<SourceEntry[]> => {
                statusDuringFetch = await readStatus();
                return [sourceEntry('Song A'), sourceEntry('Song B')];
            },
        },
        destination,
    });

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'run-sync-'));
        env = parseEnv({
            DATA_DIR: dir,
            SPOTIFY_CLIENT_ID: 'test-spotify-client',
            SPOTIFY_CLIENT_SECRET: 'test-secret',
            YOUTUBE_PLAYLIST_ID: 'PLtest',
            YOUTUBE_REFRESH_TOKEN: 'test-refresh-token',
        });
        destination = new FakeDestination();
        destination.searchResults.set('Song A', [candidate('vid-a', 'Test Artist - Song A')]);
        destination.searchResults.set('Song B', [candidate('vid-b', 'Test Artist - Song B')]);
        statusDuringFetch = null;
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    test('skips when another run holds the lock', async () => {
        const lock = new FakeLock(false);

        const outcome = await runSync({ env, logger: silentLogger(), lock, createProviders: async () => providers() });

        expect(outcome).toEqual({ status: 'skipped' });
        expect(lock.released).toBe(0);
        expect(await readdir(dir)).toEqual([]);
    });

    test('records a failed run when the lock cannot be acquired', async () => {
        const lock: RunLock = {
            acquire: async () => {
                throw new Error('connect ECONNREFUSED');
            },
            release: jest.fn(async () => undefined),
        };

        const outcome = await runSync({ env, logger: silentLogger(), lock, createProviders: async () => providers() });

        expect(outcome).toMatchObject({
            status: 'completed',
            result: {
                success: false,
                outcome: 'failed',
                errors: [{ code: 'unexpected', message: 'Failed to acquire run lock: connect ECONNREFUSED' }],
            },
        });
        expect(await readStatus()).toMatchObject({
            status: 'failed',
            last_error: 'Failed to acquire run lock: connect ECONNREFUSED',
        });
        expect(lock.release).not.toHaveBeenCalled();
        expect(destination.insertCalls).toEqual([]);
    });

    test('runs a sync and records its status', async () => {
        const lock = new FakeLock();

        const outcome = await runSync({ env, logger: silentLogger(), lock, createProviders: async () => providers() });

        expect(outcome.status).toBe('completed');
        expect(destination.mediaIds).toEqual(['vid-a', 'vid-b']);
        expect(statusDuringFetch).toMatchObject({ status: 'running', tracks_added: 0 });
        expect(await readStatus()).toMatchObject({
            status: 'success',
            tracks_added: 2,
            tracks_removed: 0,
            last_error: null,
            spotify_track_count: 2,
            youtube_track_count: 2,
        });
        expect(JSON.parse(await readFile(join(dir, CACHE_FILE), 'utf-8'))).toMatchObject({
            'song a\u0000test artist': { mediaId: 'vid-a' },
        });
        expect(lock.released).toBe(1);
    });

    test('reports YouTube auth problems as a fetch failure', async () => {
        const lock = new FakeLock();

        const outcome = await runSync({
            env,
            logger: silentLogger(),
            lock,
            createProviders: async () => {
                throw new YouTubeAuthError('refresh token revoked');
            },
        });

        expect(outcome).toMatchObject({
            status: 'completed',
            result: {
                success: false,
                errors: [{ code: 'upstream_fetch', message: 'YouTube auth failed: refresh token revoked' }],
            },
        });
        expect(await readStatus()).toMatchObject({
            status: 'failed',
            last_error: 'YouTube auth failed: refresh token revoked',
        });
        expect(lock.released).toBe(1);
    });

    test('turns unexpected errors into a failed result and still releases the lock', async () => {
        const lock = new FakeLock();

        const outcome = await runSync({
            env,
            logger: silentLogger(),
            lock,
            createProviders: async () => {
                throw new Error('boom');
            },
        });

        expect(outcome).toMatchObject({
            status: 'completed',
            result: { outcome: 'failed', errors: [{ code: 'unexpected', message: 'Unexpected error: boom' }] },
        });
        expect(lock.released).toBe(1);
    });
});

describe('exitCodeFor', () => {
    const result = (success: boolean): RunResult => ({
        success,
        outcome: success ? 'success' : 'failed',
        insertedCount: 0,
        removedCount: 0,
        errors: [],
        sourceCount: 0,
        destinationCountAfter: 0,
        durationSeconds: 0,
    });

    test('is zero for skipped and successful runs', () => {
        expect(exitCodeFor({ status: 'skipped' })).toBe(0);
        expect(exitCodeFor({ status: 'completed', result: result(true) })).toBe(0);
    });

    test('is one for failed runs', () => {
        expect(exitCodeFor({ status: 'completed', result: result(false) })).toBe(1);
    });
});
