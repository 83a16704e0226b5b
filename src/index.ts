/**
 * pdf-flattener worker entry point
 *
 * Startup sequence:
 * 1. Environment validation (fail-fast if missing)
 * 2. Redis connections for BullMQ
 * 3. Flatten queue initialization
 * 4. Worker startup (job processing)
 */

console.log('pdf-flattener starting...');

// Import env first - validates required env vars on load (fail-fast pattern)
import { env } from './config/env.js';
import { closeConnections, queueConnection, workerConnection } from './config/redis.js';
import { flattenQueue, QUEUE_NAME } from './queues/flatten.queue.js';
import { startFlattenWorker, stopFlattenWorker } from './workers/flatten.worker.js';

console.log(`Environment: ${env.NODE_ENV}`);
console.log(`Data directory: ${env.DATA_DIR}, scratch: ${env.SCRATCH_DIR}`);
console.log(
  `Default settings: ${env.DEFAULT_SETTINGS.dpi} DPI, ${env.DEFAULT_SETTINGS.imageFormat}` +
    (env.DEFAULT_SETTINGS.imageFormat === 'JPEG' ? ` quality ${env.DEFAULT_SETTINGS.jpegQuality}` : '')
);

console.log('Worker connection:', workerConnection.status);
console.log('Queue connection:', queueConnection.status);

let isShuttingDown = false;
async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`${signal} received, shutting down gracefully...`);

  let exitCode = 0;
  try {
    // Waits for in-flight conversions
    await stopFlattenWorker();
    await flattenQueue.close();
    await closeConnections();
  } catch (error) {
    console.error('Error during shutdown:', error);
    exitCode = 1;
  }

  process.exit(exitCode);
}

async function main(): Promise<void> {
  await startFlattenWorker();

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  const counts = await flattenQueue.getJobCounts('waiting', 'active', 'delayed', 'failed');
  console.log(JSON.stringify({ event: 'queue_counts', queue: QUEUE_NAME, ...counts, timestamp: new Date().toISOString() }));

  console.log('Initialization complete');
  console.log(`Queue '${QUEUE_NAME}' accepting jobs`);
}

main().catch((error: unknown) => {
  console.error('Fatal startup error:', error);
  process.exit(1);
});
