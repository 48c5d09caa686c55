import { createClient } from 'redis';
import { env } from './env';
import { logger } from '../utils/logger';
import { toError } from '../utils/errors';

export const redis = createClient({ url: env.REDIS_URL });

redis.on('error', (err: Error) => {
  logger.error('Redis error', { error: err.message });
});

redis.on('connect', () => {
  logger.info('Redis connected');
});

export async function connectRedis(): Promise<void> {
  if (!redis.isOpen) {
    await redis.connect();
  }
}

export async function checkRedisHealth(): Promise<{ status: string; error?: string }> {
  try {
    await redis.ping();
    return { status: 'healthy' };
  } catch (error) {
    return { status: 'unhealthy', error: toError(error).message };
  }
}
