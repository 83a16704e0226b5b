/**
 * Producer side of the flatten queue
 *
 * Works against any queue with BullMQ's `add`: the worker process's
 * `flattenQueue`, or a Queue a producer process opens on QUEUE_NAME with
 * FLATTEN_JOB_OPTIONS.
 */

import type { JobState, JobsOptions } from 'bullmq';
import { ConversionError } from '../flatten/errors.js';
import { DEFAULT_SETTINGS } from '../flatten/settings.js';
import { resolveJobSettings } from './processor.js';
import { mapJobState } from './status.js';
import type { FlattenJobData, JobStatus } from './types.js';

/**
 * Queue name constant - must match worker configuration
 */
export const QUEUE_NAME = 'pdf-flatten';
export const FLATTEN_JOB_NAME = 'flatten';

export const FLATTEN_JOB_OPTIONS: JobsOptions = {
  attempts: 3,
  backoff: {
    type: 'exponential',
    delay: 1000, // 1s base -> 2s -> 4s
  },
  removeOnComplete: {
    count: 1000,
    age: 604800,
  },
  removeOnFail: false,
};

/**
 * The part of a BullMQ Queue the producer needs
 */
export interface FlattenJobQueue<J extends { id?: string }> {
  add(name: string, data: FlattenJobData, options?: JobsOptions): Promise<J>;
}

export interface StatefulJob {
  getState(): Promise<JobState | 'unknown'>;
}

/**
 * Queue a file for flattening
 * Settings are checked here so a bad request fails at the caller, not in the worker
 */
export async function addFlattenJob<J extends { id?: string }>(
  queue: FlattenJobQueue<J>,
  data: FlattenJobData,
  options?: JobsOptions
): Promise<J> {
  if (data.inputPath.trim() === '') {
    throw new ConversionError('UsageError', 'Flatten job needs an input path');
  }
  resolveJobSettings(DEFAULT_SETTINGS, data.settings);

  const job = await queue.add(FLATTEN_JOB_NAME, data, options);
  console.log(JSON.stringify({
    event: 'flatten_job_queued',
    jobId: job.id,
    inputPath: data.inputPath,
    timestamp: new Date().toISOString(),
  }));
  return job;
}

export async function getJobStatus(job: StatefulJob): Promise<JobStatus> {
  return mapJobState(await job.getState());
}
