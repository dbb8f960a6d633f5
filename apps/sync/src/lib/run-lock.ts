import { mkdir, open, stat, unlink } from 'fs/promises';
import { dirname } from 'path';
import { randomBytes } from 'crypto';
import type { Logger } from './logger';

export interface RunLock {
    // false when another run holds the lock
    acquire(): Promise<boolean>;
    release(): Promise<void>;
}

export const LOCK_FILE = '.sync.lock';
export const REDIS_LOCK_KEY = 'playlist-sync:lock';

function hasCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Exclusive-create lock file holding the owner's pid. A file older than the
 * stale threshold is assumed orphaned by a killed run and removed.
 */
export class FileRunLock implements RunLock {
    private held = false;

    constructor(
        private readonly filePath: string,
        private readonly staleSeconds: number,
        private readonly log: Logger,
        private readonly now: () => number = Date.now
    ) {}

    async acquire(): Promise<boolean> {
        await mkdir(dirname(this.filePath), { recursive: true });
        await this.removeIfStale();

        try {
            const handle = await open(this.filePath, 'wx');
            try {
                await handle.writeFile(`${process.pid}\n`, 'utf-8');
            } finally {
                await handle.close();
            }
        } catch (error) {
            if (hasCode(error, 'EEXIST')) {
                return false;
            }
            throw error;
        }

        this.held = true;
        return true;
    }

    async release(): Promise<void> {
        if (!this.held) {
            return;
        }
        this.held = false;
        try {
            await unlink(this.filePath);
        } catch (error) {
            if (!hasCode(error, 'ENOENT')) {
                this.log.warn({ error, filePath: this.filePath }, 'Failed to remove lock file');
            }
        }
    }

    private async removeIfStale(): Promise<void> {
        let ageSeconds: number;
        try {
            const info = await stat(this.filePath);
            ageSeconds = (this.now() - info.mtimeMs) / 1000;
        } catch (error) {
            if (hasCode(error, 'ENOENT')) {
                return;
            }
            throw error;
        }

        if (ageSeconds > this.staleSeconds) {
            this.log.warn({ ageSeconds: Math.round(ageSeconds) }, 'Removing stale lock file');
            await unlink(this.filePath).catch((error: unknown) => {
                if (!hasCode(error, 'ENOENT')) throw error;
            });
        }
    }
}

// The subset of ioredis the lock needs
export interface LockClient {
    set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<'OK' | null>;
    get(key: string): Promise<string | null>;
    del(key: string): Promise<number>;
}

/**
 * SET NX with an expiry: the expiry is the staleness bound, so a crashed
 * holder frees the lock by itself. Release only deletes our own token.
 */
export class RedisRunLock implements RunLock {
    private token: string | null = null;

    constructor(
        private readonly client: LockClient,
        private readonly staleSeconds: number,
        private readonly log: Logger,
        private readonly key: string = REDIS_LOCK_KEY
    ) {}

    async acquire(): Promise<boolean> {
        const token = `${process.pid}:${randomBytes(8).toString('hex')}`;
        const result = await this.client.set(this.key, token, 'EX', this.staleSeconds, 'NX');
        if (result !== 'OK') {
            return false;
        }
        this.token = token;
        return true;
    }

    async release(): Promise<void> {
        if (!this.token) {
            return;
        }
        const token = this.token;
        this.token = null;

        const current = await this.client.get(this.key);
        if (current !== token) {
            this.log.warn({ key: this.key }, 'Lock expired or taken over before release');
            return;
        }
        await this.client.del(this.key);
    }
}
