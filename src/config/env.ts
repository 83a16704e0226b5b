/**
 * Environment configuration with validation
 * Fail-fast pattern: validates all required env vars at module load time
 */

import { DEFAULT_SETTINGS, createSettings, parseImageFormat } from '../flatten/settings.js';
import type { ConversionSettings } from '../flatten/types.js';

interface EnvConfig {
  REDIS_HOST: string;
  REDIS_PORT: number;
  NODE_ENV: 'development' | 'production' | 'test';
  /** Data directory for inputs and flattened outputs (default: ./data) */
  DATA_DIR: string;
  /** Root under which each job gets its own scratch directory (default: DATA_DIR/scratch) */
  SCRATCH_DIR: string;
  /** Jobs converted in parallel by one worker process (default: 2) */
  WORKER_CONCURRENCY: number;
  /** Settings applied to jobs that do not carry their own */
  DEFAULT_SETTINGS: ConversionSettings;
}

const requiredEnvVars = ['REDIS_HOST', 'REDIS_PORT'] as const;

/**
 * Validates that all required environment variables are set
 * Throws immediately on missing vars to fail fast
 */
export function validateEnv(): void {
  const missing: string[] = [];

  for (const varName of requiredEnvVars) {
    if (!process.env[varName]) {
      missing.push(varName);
    }
  }

  if (missing.length > 0) {
    throw new Error(`Missing required env var${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`);
  }
}

function requireEnv(name: (typeof requiredEnvVars)[number]): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

function parseIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`Env var ${name} must be an integer (got "${raw}")`);
  }
  return value;
}

function parseNodeEnv(value: string | undefined): EnvConfig['NODE_ENV'] {
  return value === 'production' || value === 'test' ? value : 'development';
}

// Validate on module load (fail-fast pattern)
validateEnv();

const dataDir = process.env.DATA_DIR || './data';
const concurrency = parseIntEnv('WORKER_CONCURRENCY', 2);
if (concurrency < 1) {
  throw new Error(`WORKER_CONCURRENCY must be at least 1 (got ${concurrency})`);
}

/**
 * Typed environment configuration
 * Safe to access after validateEnv() has run
 */
export const env: EnvConfig = {
  REDIS_HOST: requireEnv('REDIS_HOST'),
  REDIS_PORT: parseIntEnv('REDIS_PORT', 6379),
  NODE_ENV: parseNodeEnv(process.env.NODE_ENV),
  DATA_DIR: dataDir,
  SCRATCH_DIR: process.env.SCRATCH_DIR || `${dataDir}/scratch`,
  WORKER_CONCURRENCY: concurrency,
  DEFAULT_SETTINGS: createSettings({
    dpi: parseIntEnv('DEFAULT_DPI', DEFAULT_SETTINGS.dpi),
    imageFormat: parseImageFormat(process.env.DEFAULT_FORMAT || DEFAULT_SETTINGS.imageFormat),
    jpegQuality: parseIntEnv('DEFAULT_JPEG_QUALITY', DEFAULT_SETTINGS.jpegQuality),
  }),
};
