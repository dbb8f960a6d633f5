import Redis from 'ioredis';

// BullMQ requires maxRetriesPerRequest: null on connections it blocks on
export function createRedis(url: string): Redis {
    return new Redis(url, {
        maxRetriesPerRequest: null,
    });
}

export async function closeRedis(client: Redis): Promise<void> {
    await client.quit();
}
