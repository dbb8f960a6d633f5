import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Logger } from '../lib/logger';
import { writeJsonAtomic } from '../lib/atomic-file';
import { errorMessage } from '../lib/sync-errors';

export const DEFAULT_TTL_SECONDS = 30 * 24 * 60 * 60;

const KEY_SEPARATOR = '\u0000';

const cacheRecordSchema = z.object({
    mediaId: z.string().min(1),
    cachedAt: z.number().finite(),
});

// v1 files stored the bare media id; v2 adds the timestamp
const storedValueSchema = z.union([z.string().min(1), cacheRecordSchema]);
const cacheFileSchema = z.record(z.unknown());

export type CacheRecord = z.infer<typeof cacheRecordSchema>;

export interface VideoCacheOptions {
    logger: Logger;
    ttlSeconds?: number;
    // Epoch seconds
    now?: () => number;
}

function normalizePart(value: string): string {
    return value.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function makeCacheKey(title: string, attribute: string): string {
    return `${normalizePart(title)}${KEY_SEPARATOR}${normalizePart(attribute)}`;
}

function systemNow(): number {
    return Date.now() / 1000;
}

/**
 * Disk-backed title/artist -> video id map with expiry.
 *
 * Mutations stay in memory until {@link VideoCache.save}; the file is then
 * replaced atomically. Saving is best-effort and never throws.
 */
export class VideoCache {
    private readonly entries = new Map<string, CacheRecord>();
    private dirty = false;
    private readonly ttlSeconds: number;
    private readonly now: () => number;
    private readonly log: Logger;

    private constructor(
        private readonly filePath: string,
        options: VideoCacheOptions
    ) {
        this.ttlSeconds = options.ttlSeconds ?? DEFAULT_TTL_SECONDS;
        this.now = options.now ?? systemNow;
        this.log = options.logger;
    }

    static async load(filePath: string, options: VideoCacheOptions): Promise<VideoCache> {
        const cache = new VideoCache(filePath, options);
        await cache.readFromDisk();
        cache.pruneExpired();
        return cache;
    }

    get size(): number {
        return this.entries.size;
    }

    get isDirty(): boolean {
        return this.dirty;
    }

    get(title: string, attribute: string): string | null {
        const key = makeCacheKey(title, attribute);
        const record = this.entries.get(key);
        if (!record) {
            return null;
        }

        if (this.isExpired(record)) {
            this.entries.delete(key);
            this.dirty = true;
            return null;
        }

        return record.mediaId;
    }

    set(title: string, attribute: string, mediaId: string): void {
        const key = makeCacheKey(title, attribute);
        if (this.entries.get(key)?.mediaId === mediaId) {
            return;
        }

        this.entries.set(key, { mediaId, cachedAt: this.now() });
        this.dirty = true;
    }

    async save(): Promise<void> {
        if (!this.dirty) {
            return;
        }

        try {
            await writeJsonAtomic(this.filePath, Object.fromEntries(this.entries));
            this.dirty = false;
            this.log.debug({ entries: this.entries.size }, 'Cache saved');
        } catch (error) {
            this.log.error({ error, filePath: this.filePath }, 'Cache save failed');
        }
    }

    private isExpired(record: CacheRecord): boolean {
        return this.now() - record.cachedAt > this.ttlSeconds;
    }

    private async readFromDisk(): Promise<void> {
        let raw: string;
        try {
            raw = await readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                return;
            }
            this.log.warn({ error: errorMessage(error) }, 'Cache load failed, starting empty');
            return;
        }

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (error) {
            this.log.warn({ error: errorMessage(error) }, 'Cache file is not valid JSON, starting empty');
            return;
        }

        const file = cacheFileSchema.safeParse(data);
        if (!file.success) {
            this.log.warn('Cache file has unexpected shape, starting empty');
            return;
        }

        let dropped = 0;
        for (const [key, value] of Object.entries(file.data)) {
            const stored = storedValueSchema.safeParse(value);
            if (!stored.success) {
                dropped++;
                continue;
            }
            this.entries.set(key, this.migrate(stored.data));
        }

        if (dropped > 0) {
            this.dirty = true;
            this.log.warn({ dropped }, 'Dropped malformed cache entries');
        }
        this.log.debug({ entries: this.entries.size }, 'Loaded cached mappings');
    }

    private migrate(value: string | CacheRecord): CacheRecord {
        if (typeof value !== 'string') {
            return value;
        }
        this.dirty = true;
        return { mediaId: value, cachedAt: this.now() };
    }

    private pruneExpired(): void {
        let pruned = 0;
        for (const [key, record] of this.entries) {
            if (this.isExpired(record)) {
                this.entries.delete(key);
                pruned++;
            }
        }

        if (pruned > 0) {
            this.dirty = true;
            this.log.info({ pruned }, 'Pruned expired cache entries');
        }
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
