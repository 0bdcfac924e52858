import Redis, { type RedisOptions } from 'ioredis';
import type { AppConfig } from '../config';
import { logger } from './logger';

/**
 * Key/value store backing the answer cache, the embedding cache and the
 * rate counters.
 *
 * Every operation touches a single key and is atomic on its own; nothing
 * here spans several keys.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void>;
  /**
   * Increment a counter and return the new value. The first increment of a
   * key also sets its expiry, in the same atomic step.
   */
  incrementWithExpiry(key: string, ttlSeconds: number): Promise<number>;
}

// INCR and EXPIRE in one script so a counter can never be left without a TTL
const INCREMENT_WITH_EXPIRY = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return count
`;

export class RedisKeyValueStore implements KeyValueStore {
  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.setex(key, ttlSeconds, value);
  }

  async incrementWithExpiry(key: string, ttlSeconds: number): Promise<number> {
    const result = await this.redis.eval(INCREMENT_WITH_EXPIRY, 1, key, ttlSeconds);
    const count = Number(result);
    if (!Number.isInteger(count)) {
      throw new Error(`Unexpected counter value for ${key}: ${String(result)}`);
    }
    return count;
  }
}

/**
 * Create the Redis connection.
 * REDIS_URL wins over the individual host settings when both are present.
 */
export function createRedisClient(config: AppConfig['redis']): Redis {
  const options: RedisOptions = {
    retryStrategy: (times: number) => {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
  };

  logger.info({ redisUrl: !!config.url, host: config.host }, 'Initializing Redis connection');

  const redis = config.url
    ? new Redis(config.url, options)
    : new Redis({ ...options, host: config.host, port: config.port, password: config.password });

  redis.on('error', (err) => {
    logger.error({ err }, 'Redis connection error');
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  return redis;
}

/**
 * Health check: verify Redis connectivity.
 */
export async function checkRedisHealth(redis: Redis): Promise<boolean> {
  try {
    await redis.ping();
    return true;
  } catch (error) {
    logger.warn({ error }, 'Redis health check failed');
    return false;
  }
}
