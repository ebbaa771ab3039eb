/**
 * Fastify Server Factory
 *
 * Creates and configures the Fastify instance with all plugins. The engine
 * and the tool checks are injectable so tests can run without ffmpeg.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { LoggerOptions } from 'pino';
import { FFProbe } from '@splitwave/media';
import { FFmpeg } from '@splitwave/processing';
import { SegmentationOrchestrator } from '@splitwave/splitter';

import type { ApiConfig } from './config/index.js';
import { buildLoggerOptions } from './lib/logger.js';
import { errorHandler } from './plugins/errorHandler.js';

// Routes
import {
  healthRoutes,
  limitsRoutes,
  splitRoutes,
  type SplitRunner,
  type Toolchain,
} from './routes/index.js';

export interface ServerOptions {
  config: ApiConfig;
  splitter?: SplitRunner;
  toolchain?: Toolchain;
  /** false silences request logging. */
  logger?: boolean | LoggerOptions;
}

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const { config } = options;

  const server = Fastify({
    logger: options.logger ?? buildLoggerOptions(config),
    bodyLimit: 64 * 1024,
  });

  const splitter = options.splitter ?? SegmentationOrchestrator.fromConfig(config.engine);
  const toolchain = options.toolchain ?? {
    ffmpeg: new FFmpeg(config.engine.ffmpegPath),
    ffprobe: new FFProbe(config.engine.ffprobePath),
  };

  // ============================================
  // Error handling
  // ============================================

  await server.register(errorHandler);

  // ============================================
  // Routes
  // ============================================

  // Root route - API info
  server.get('/', async () => ({
    name: 'splitwave-api',
    version: '1.0.0',
    status: 'running',
    health: '/health',
  }));

  await server.register(healthRoutes, { prefix: '/health', toolchain });
  await server.register(limitsRoutes, { prefix: '/config', engine: config.engine });
  await server.register(splitRoutes, {
    prefix: '/api/v1',
    splitter,
    inputRoot: config.inputRoot,
    outputRoot: config.outputRoot,
  });

  return server;
}
