/**
 * API Configuration
 *
 * All configuration loaded from environment variables.
 * Uses sensible defaults for development.
 */

import { config as dotenvConfig } from 'dotenv';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { SplitwaveError, loadEngineConfig, type EngineConfig } from '@splitwave/core';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

/**
 * Load .env from monorepo root
 */
export function loadEnv(): void {
  dotenvConfig({ path: resolve(monorepoRoot, '.env') });
}

// Relative paths are taken from the monorepo root
function resolvePath(p: string): string {
  if (p.startsWith('./') || p.startsWith('../')) {
    return resolve(monorepoRoot, p);
  }
  return p;
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_HOST: z.string().default('0.0.0.0'),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  STORAGE_INPUT: z.string().min(1).default('./storage/input'),
  STORAGE_OUTPUT: z.string().min(1).default('./storage/output'),
});

export interface ApiConfig {
  nodeEnv: 'development' | 'production' | 'test';
  host: string;
  port: number;
  logLevel: string;
  /** Split requests may only name files under this directory. */
  inputRoot: string;
  /** Every job writes to `<outputRoot>/<jobId>`. */
  outputRoot: string;
  engine: EngineConfig;
}

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new SplitwaveError(
      `Invalid API configuration: ${issues.join('; ')}`,
      'CONFIG_ERROR',
      500,
      { issues }
    );
  }

  const values = parseResult.data;

  return {
    nodeEnv: values.NODE_ENV,
    host: values.API_HOST,
    port: values.API_PORT,
    logLevel: values.LOG_LEVEL,
    inputRoot: resolvePath(values.STORAGE_INPUT),
    outputRoot: resolvePath(values.STORAGE_OUTPUT),
    engine: loadEngineConfig(env),
  };
}
