/**
 * Limits Route
 *
 * Public request limits, so clients can validate before uploading.
 */

import type { FastifyPluginAsync } from 'fastify';
import { SPLIT_UNITS, type EngineConfig } from '@splitwave/core';
import { ALLOWED_AUDIO_EXTENSIONS } from '@splitwave/splitter';

const MB = 1024 * 1024;

export interface LimitsRouteOptions {
  engine: EngineConfig;
}

export const limitsRoutes: FastifyPluginAsync<LimitsRouteOptions> = async (fastify, options) => {
  const { engine } = options;

  fastify.get('/', async () => ({
    maxFileSizeBytes: engine.maxFileSizeBytes,
    maxFileSizeMb: Math.round(engine.maxFileSizeBytes / MB),
    maxSeconds: engine.maxSeconds,
    maxMegabytes: engine.maxMegabytes,
    units: SPLIT_UNITS,
    allowedExtensions: ALLOWED_AUDIO_EXTENSIONS,
  }));
};
