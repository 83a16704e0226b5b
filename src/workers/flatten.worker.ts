/**
 * Flatten worker
 *
 * - Processes jobs from the pdf-flatten queue, WORKER_CONCURRENCY at a time
 * - Each job runs its own ConversionSession; sessions share nothing
 * - Logs structured error data on failure
 */

import { Worker, type Job } from 'bullmq';
import { env } from '../config/env.js';
import { workerConnection } from '../config/redis.js';
import { processFlattenJob } from '../jobs/processor.js';
import type { FlattenJobData, FlattenJobResult } from '../jobs/types.js';
import { formatFileSize } from '../flatten/sizes.js';
import { QUEUE_NAME } from '../queues/flatten.queue.js';

let worker: Worker<FlattenJobData, FlattenJobResult> | null = null;

export async function startFlattenWorker(): Promise<void> {
  if (worker) return;

  worker = new Worker<FlattenJobData, FlattenJobResult>(
    QUEUE_NAME,
    async (job: Job<FlattenJobData, FlattenJobResult>) => {
      console.log(JSON.stringify({
        event: 'flatten_job_start',
        jobId: job.id,
        inputPath: job.data.inputPath,
        attempt: job.attemptsMade + 1,
        timestamp: new Date().toISOString(),
      }));

      return processFlattenJob(job, {
        dataDir: env.DATA_DIR,
        scratchRoot: env.SCRATCH_DIR,
        defaults: env.DEFAULT_SETTINGS,
      });
    },
    {
      connection: workerConnection,
      concurrency: env.WORKER_CONCURRENCY,
    }
  );

  worker.on('completed', (job, result) => {
    console.log(JSON.stringify({
      event: 'flatten_job_complete',
      jobId: job.id,
      outputPath: result.outputPath,
      outputSize: formatFileSize(result.outputSize),
      pagesProcessed: result.pagesProcessed,
      skippedPages: result.skippedPages,
      duration: job.finishedOn && job.processedOn ? job.finishedOn - job.processedOn : undefined,
      timestamp: new Date().toISOString(),
    }));
  });

  worker.on('failed', (job, error) => {
    console.error(JSON.stringify({
      event: 'job_failed',
      jobId: job?.id ?? 'unknown',
      inputPath: job?.data.inputPath ?? 'unknown',
      attemptsMade: job?.attemptsMade ?? 0,
      maxAttempts: job?.opts.attempts ?? 3,
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      timestamp: new Date().toISOString(),
    }));
  });

  worker.on('error', (error) => {
    console.error(`Worker error: ${error.message}`);
  });

  console.log(`Flatten worker started for queue '${QUEUE_NAME}' with concurrency ${env.WORKER_CONCURRENCY}`);
}

/**
 * Stop the worker
 * Waits for in-flight jobs to complete
 */
export async function stopFlattenWorker(): Promise<void> {
  if (worker) {
    await worker.close();
    worker = null;
    console.log('Flatten worker stopped');
  }
}
