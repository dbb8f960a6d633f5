import { mkdtemp, readFile, rm, stat, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { silentLogger } from '../../../src/lib/logger';
import { FileRunLock, LOCK_FILE, REDIS_LOCK_KEY, RedisRunLock } from '../../../src/lib/run-lock';
import type { LockClient } from '../../../src/lib/run-lock';

describe('FileRunLock', () => {
    let dir: string;
    let lockPath: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'run-lock-'));
        lockPath = join(dir, 'data', LOCK_FILE);
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    test('acquires, records the pid and releases', async () => {
        const lock = new FileRunLock(lockPath, 1800, silentLogger());

        expect(await lock.acquire()).toBe(true);
        expect(await readFile(lockPath, 'utf-8')).toBe(`${process.pid}\n`);

        await lock.release();
        await expect(stat(lockPath)).rejects.toMatchObject({ code: 'ENOENT' });
    });

    test('refuses while another holder has it', async () => {
        const first = new FileRunLock(lockPath, 1800, silentLogger());
        const second = new FileRunLock(lockPath, 1800, silentLogger());

        expect(await first.acquire()).toBe(true);
        expect(await second.acquire()).toBe(false);

        // Releasing a lock we never got leaves the holder alone
        await second.release();
        expect(await readFile(lockPath, 'utf-8')).toBe(`${process.pid}\n`);
    });

    test('takes over a stale lock file', async () => {
        await new FileRunLock(lockPath, 1800, silentLogger()).acquire();
        await writeFile(lockPath, '99999\n', 'utf-8');
        const hourAgo = new Date(Date.now() - 3600 * 1000);
        await utimes(lockPath, hourAgo, hourAgo);

        const lock = new FileRunLock(lockPath, 1800, silentLogger());

        expect(await lock.acquire()).toBe(true);
        expect(await readFile(lockPath, 'utf-8')).toBe(`${process.pid}\n`);
    });

    test('release tolerates a file removed underneath it', async () => {
        const lock = new FileRunLock(lockPath, 1800, silentLogger());
        await lock.acquire();
        await rm(lockPath);

        await expect(lock.release()).resolves.toBeUndefined();
    });
});

class FakeRedis implements LockClient {
    store = new Map<string, string>();
    expiries = new Map<string, number>();

    async set(key: string, value: string, _ex: 'EX', seconds: number, _nx: 'NX'): Promise<'OK' | null> {
        if (this.store.has(key)) {
            return null;
        }
        this.store.set(key, value);
        this.expiries.set(key, seconds);
        return 'OK';
    }

    async get(key: string): Promise<string | null> {
        return this.store.get(key) ?? null;
    }

    async del(key: string): Promise<number> {
        return this.store.delete(key) ? 1 : 0;
    }
}

describe('RedisRunLock', () => {
    test('sets the key with the stale bound as expiry', async () => {
        const redis = new FakeRedis();
        const lock = new RedisRunLock(redis, 900, silentLogger());

        expect(await lock.acquire()).toBe(true);
        expect(redis.expiries.get(REDIS_LOCK_KEY)).toBe(900);

        await lock.release();
        expect(redis.store.has(REDIS_LOCK_KEY)).toBe(false);
    });

    test('refuses while the key is held', async () => {
        const redis = new FakeRedis();
        await new RedisRunLock(redis, 900, silentLogger()).acquire();

        expect(await new RedisRunLock(redis, 900, silentLogger()).acquire()).toBe(false);
    });

    test('does not delete a lock taken over by another run', async () => {
        const redis = new FakeRedis();
        const lock = new RedisRunLock(redis, 900, silentLogger());
        await lock.acquire();

        // Expired and re-acquired elsewhere
        redis.store.set(REDIS_LOCK_KEY, 'someone-else');
        await lock.release();

        expect(redis.store.get(REDIS_LOCK_KEY)).toBe('someone-else');
    });
});
