/**
 * Redis connection configuration for BullMQ
 *
 * BullMQ requires different connection settings for Queue vs Worker:
 * - Workers need maxRetriesPerRequest: null to handle Redis disconnects
 * - Queues fail fast (enableOfflineQueue: false) so enqueue errors surface at once
 *
 * @see https://docs.bullmq.io/guide/going-to-production
 */

import { Redis } from 'ioredis';
import { env } from './env.js';

const baseOptions = {
  host: env.REDIS_HOST,
  port: env.REDIS_PORT,
};

/**
 * Linear backoff, capped at 20 seconds
 */
function retryStrategy(times: number): number {
  return Math.min(times * 1000, 20000);
}

/**
 * Redis connection for BullMQ Workers
 * maxRetriesPerRequest must be null or the worker stops on a disconnect
 */
export const workerConnection = new Redis({
  ...baseOptions,
  maxRetriesPerRequest: null,
  enableReadyCheck: false,
  retryStrategy,
});

export const queueConnection = new Redis({
  ...baseOptions,
  enableOfflineQueue: false,
  retryStrategy,
});

/**
 * Close both shared connections after the worker and queue are closed
 */
export async function closeConnections(): Promise<void> {
  await Promise.all([workerConnection.quit(), queueConnection.quit()]);
}

// Connections are lazy; this only reports the target
console.log(`Redis configured for ${env.REDIS_HOST}:${env.REDIS_PORT}`);
