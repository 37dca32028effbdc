import { Redis } from 'ioredis';
import { config } from '../config/index.js';
import { toErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ServiceStatus } from '../types/index.js';

const PING_TIMEOUT_MS = 2000;

let healthClient: Redis | null = null;

/**
 * Connection used for startup checks and health checks. Queues and workers
 * open their own through `redisConnection()`.
 */
export function getRedisClient(): Redis {
  if (!healthClient) {
    healthClient = new Redis(config.redis.url, {
      lazyConnect: true,
      maxRetriesPerRequest: 1,
      retryStrategy: (attempt: number) => (attempt > 5 ? null : Math.min(attempt * 250, 2000)),
    });

    healthClient.on('ready', () => logger.info('Redis connected'));
    healthClient.on('error', (error: Error) => logger.error('Redis error', { error: error.message }));
  }

  return healthClient;
}

export async function connectRedis(): Promise<void> {
  const client = getRedisClient();
  if (client.status === 'wait') {
    await client.connect();
  }
}

export async function disconnectRedis(): Promise<void> {
  if (!healthClient) {
    return;
  }
  const client = healthClient;
  healthClient = null;
  await client.quit();
  logger.info('Redis disconnected');
}

export async function checkRedisHealth(): Promise<ServiceStatus> {
  const start = Date.now();
  try {
    const client = getRedisClient();
    await Promise.race([
      client.ping(),
      new Promise<never>((_, reject) => {
        setTimeout(() => reject(new Error(`No PING reply within ${PING_TIMEOUT_MS}ms`)), PING_TIMEOUT_MS).unref();
      }),
    ]);
    return { status: 'connected', latency: Date.now() - start };
  } catch (error) {
    return { status: 'error', error: toErrorMessage(error) };
  }
}
