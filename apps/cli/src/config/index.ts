/**
 * CLI Configuration
 *
 * Engine settings come from the environment (optionally a .env at the
 * monorepo root); a few can be overridden per invocation.
 */

import { config as dotenvConfig } from 'dotenv';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadEngineConfig, type EngineConfig } from '@splitwave/core';

const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

export function loadEnv(): void {
  dotenvConfig({ path: resolve(monorepoRoot, '.env') });
}

export interface EngineOverrides {
  concurrency?: number;
  timeoutMs?: number;
}

export function buildEngineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: EngineOverrides = {}
): EngineConfig {
  const base = loadEngineConfig(env);
  return {
    ...base,
    concurrency: overrides.concurrency ?? base.concurrency,
    segmentTimeoutMs: overrides.timeoutMs ?? base.segmentTimeoutMs,
  };
}
