import type { JobState } from 'bullmq';
import type { JobStatus } from './types.js';

/**
 * Map BullMQ job state to JobStatus
 *
 * BullMQ states: 'completed' | 'failed' | 'active' | 'delayed' | 'waiting' | 'waiting-children' | 'prioritized' | 'unknown'
 */
export function mapJobState(state: JobState | 'unknown'): JobStatus {
  switch (state) {
    case 'completed':
      return 'complete';
    case 'failed':
      return 'failed';
    case 'active':
      return 'processing';
    default:
      // 'delayed', 'waiting', 'waiting-children', 'prioritized', 'unknown'
      return 'queued';
  }
}

/**
 * Job progress percentage after `currentPage` of `totalPages`
 */
export function progressPercent(currentPage: number, totalPages: number): number {
  if (totalPages <= 0) return 0;
  return Math.round((100 * currentPage) / totalPages);
}
