import Redis from 'ioredis';

export function createRedisConnection(redisUrl: string): Redis {
    // BullMQ workers block on Redis and require maxRetriesPerRequest: null
    return new Redis(redisUrl, {
        maxRetriesPerRequest: null
    });
}
