/**
 * Flatten queue for PDF-to-image-PDF jobs
 *
 * Configured with:
 * - 3 attempts with exponential backoff (invalid inputs fail at once, see processor)
 * - Failed jobs retained for debugging (removeOnFail: false)
 * - Completed jobs retained for 7 days or the last 1000
 *
 * Producers queue work through addFlattenJob(flattenQueue, data).
 */

import { Queue } from 'bullmq';
import { queueConnection } from '../config/redis.js';
import { FLATTEN_JOB_OPTIONS, QUEUE_NAME } from '../jobs/producer.js';
import type { FlattenJobData, FlattenJobResult } from '../jobs/types.js';

export { QUEUE_NAME };

export const flattenQueue = new Queue<FlattenJobData, FlattenJobResult>(QUEUE_NAME, {
  connection: queueConnection,
  defaultJobOptions: FLATTEN_JOB_OPTIONS,
});

console.log(`Flatten queue '${QUEUE_NAME}' initialized with 3 attempts, exponential backoff`);
