/**
 * Job contract for producers; opens no Redis connection
 */

export {
  FLATTEN_JOB_NAME,
  FLATTEN_JOB_OPTIONS,
  QUEUE_NAME,
  addFlattenJob,
  getJobStatus,
  type FlattenJobQueue,
  type StatefulJob,
} from './producer.js';
export { mapJobState, progressPercent } from './status.js';
export type { FlattenJobData, FlattenJobFailure, FlattenJobResult, FlattenJobSettings, JobStatus } from './types.js';
