/**
 * Engine Configuration
 *
 * Limits and tool paths for the segmentation engine. The orchestrator
 * receives this struct at construction; nothing inside the engine reads
 * the environment itself. `loadEngineConfig` is the one place that maps
 * environment variables onto it.
 */

import { availableParallelism } from 'node:os';
import { z } from 'zod';
import { SplitError, SplitwaveError } from '../errors/index.js';

const MB = 1024 * 1024;

export interface EngineConfig {
  ffmpegPath: string;
  ffprobePath: string;

  // Request policy
  maxFileSizeBytes: number;
  maxSeconds: number;
  maxMegabytes: number;

  // Planning
  largeFileThresholdBytes: number;
  largeFileMaxSegments: number;
  minSegmentMs: number;
  minSizeSegmentMs: number;
  sizeSafetyMargin: number;

  // Encoding
  segmentTimeoutMs: number;
  concurrency: number;
}

export type PlannerLimits = Pick<
  EngineConfig,
  | 'largeFileThresholdBytes'
  | 'largeFileMaxSegments'
  | 'minSegmentMs'
  | 'minSizeSegmentMs'
  | 'sizeSafetyMargin'
>;

export type RequestLimits = Pick<EngineConfig, 'maxSeconds' | 'maxMegabytes'>;

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
  ffmpegPath: 'ffmpeg',
  ffprobePath: 'ffprobe',
  maxFileSizeBytes: 200 * MB,
  maxSeconds: 3600,
  maxMegabytes: 100,
  largeFileThresholdBytes: 30 * MB,
  largeFileMaxSegments: 6,
  minSegmentMs: 1000,
  minSizeSegmentMs: 5000,
  sizeSafetyMargin: 0.9,
  segmentTimeoutMs: 300000, // 5 minutes
  concurrency: availableParallelism(),
};

const positiveInt = z.number().int().positive();
const positive = z.number().positive().finite();

const overridesSchema = z.object({
  ffmpegPath: z.string().min(1),
  ffprobePath: z.string().min(1),
  maxFileSizeBytes: positive,
  maxSeconds: positiveInt,
  maxMegabytes: positiveInt,
  largeFileThresholdBytes: positive,
  largeFileMaxSegments: positiveInt,
  minSegmentMs: positiveInt,
  minSizeSegmentMs: positiveInt,
  sizeSafetyMargin: z.number().gt(0).max(1),
  segmentTimeoutMs: positiveInt,
  concurrency: positiveInt,
}).partial();

/**
 * Defaults with explicit overrides applied. Overrides that are out of
 * range fail as INVALID_PARAMETERS naming the first offending field.
 */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const parseResult = overridesSchema.safeParse(overrides);

  if (!parseResult.success) {
    const [issue] = parseResult.error.issues;
    const field = issue ? `config.${issue.path.join('.')}` : 'config';
    throw SplitError.invalidParameters(field, issue?.message ?? 'invalid value');
  }

  return { ...DEFAULT_ENGINE_CONFIG, ...parseResult.data };
}

const envSchema = z.object({
  FFMPEG_PATH: z.string().min(1).default(DEFAULT_ENGINE_CONFIG.ffmpegPath),
  FFPROBE_PATH: z.string().min(1).default(DEFAULT_ENGINE_CONFIG.ffprobePath),
  SPLIT_MAX_FILE_SIZE_MB: z.coerce.number().positive().default(DEFAULT_ENGINE_CONFIG.maxFileSizeBytes / MB),
  SPLIT_MAX_SECONDS: z.coerce.number().int().positive().default(DEFAULT_ENGINE_CONFIG.maxSeconds),
  SPLIT_MAX_MEGABYTES: z.coerce.number().int().positive().default(DEFAULT_ENGINE_CONFIG.maxMegabytes),
  SPLIT_LARGE_FILE_THRESHOLD_MB: z.coerce.number().positive().default(DEFAULT_ENGINE_CONFIG.largeFileThresholdBytes / MB),
  SPLIT_LARGE_FILE_MAX_SEGMENTS: z.coerce.number().int().positive().default(DEFAULT_ENGINE_CONFIG.largeFileMaxSegments),
  SPLIT_MIN_SEGMENT_MS: z.coerce.number().int().positive().default(DEFAULT_ENGINE_CONFIG.minSegmentMs),
  SPLIT_MIN_SIZE_SEGMENT_MS: z.coerce.number().int().positive().default(DEFAULT_ENGINE_CONFIG.minSizeSegmentMs),
  SPLIT_SIZE_SAFETY_MARGIN: z.coerce.number().gt(0).max(1).default(DEFAULT_ENGINE_CONFIG.sizeSafetyMargin),
  SPLIT_SEGMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_ENGINE_CONFIG.segmentTimeoutMs),
  SPLIT_CONCURRENCY: z.coerce.number().int().positive().default(DEFAULT_ENGINE_CONFIG.concurrency),
});

/**
 * Build the engine configuration from environment variables
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new SplitwaveError(
      `Invalid engine configuration: ${issues.join('; ')}`,
      'CONFIG_ERROR',
      500,
      { issues }
    );
  }

  const values = parseResult.data;

  return {
    ffmpegPath: values.FFMPEG_PATH,
    ffprobePath: values.FFPROBE_PATH,
    maxFileSizeBytes: Math.round(values.SPLIT_MAX_FILE_SIZE_MB * MB),
    maxSeconds: values.SPLIT_MAX_SECONDS,
    maxMegabytes: values.SPLIT_MAX_MEGABYTES,
    largeFileThresholdBytes: Math.round(values.SPLIT_LARGE_FILE_THRESHOLD_MB * MB),
    largeFileMaxSegments: values.SPLIT_LARGE_FILE_MAX_SEGMENTS,
    minSegmentMs: values.SPLIT_MIN_SEGMENT_MS,
    minSizeSegmentMs: values.SPLIT_MIN_SIZE_SEGMENT_MS,
    sizeSafetyMargin: values.SPLIT_SIZE_SAFETY_MARGIN,
    segmentTimeoutMs: values.SPLIT_SEGMENT_TIMEOUT_MS,
    concurrency: values.SPLIT_CONCURRENCY,
  };
}
