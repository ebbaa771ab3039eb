/**
 * Health Routes
 *
 * Liveness, and readiness against the ffmpeg/ffprobe binaries.
 */

import type { FastifyPluginAsync } from 'fastify';

export interface ToolCheck {
  isAvailable(): Promise<boolean>;
}

export interface Toolchain {
  ffmpeg: ToolCheck;
  ffprobe: ToolCheck;
}

interface CheckResult {
  status: 'pass' | 'fail';
  latencyMs: number;
}

interface ReadinessStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  timestamp: string;
  checks: {
    ffmpeg: CheckResult;
    ffprobe: CheckResult;
  };
}

export interface HealthRouteOptions {
  toolchain: Toolchain;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, options) => {
  // Basic liveness probe (fast, always returns 200 if running)
  fastify.get('/', {
    schema: {
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            timestamp: { type: 'string' },
          },
        },
      },
    },
  }, async (_request, reply) => {
    return reply.send({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // Readiness probe: can we actually run the media tools
  fastify.get('/ready', async (_request, reply) => {
    const [ffmpeg, ffprobe] = await Promise.all([
      check(options.toolchain.ffmpeg),
      check(options.toolchain.ffprobe),
    ]);
    const checks: ReadinessStatus['checks'] = { ffmpeg, ffprobe };

    const results = Object.values(checks);
    const allPassing = results.every(c => c.status === 'pass');
    const anyPassing = results.some(c => c.status === 'pass');

    const status: ReadinessStatus = {
      status: allPassing ? 'healthy' : anyPassing ? 'degraded' : 'unhealthy',
      version: process.env['npm_package_version'] ?? '1.0.0',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      checks,
    };

    return reply.status(allPassing ? 200 : 503).send(status);
  });
};

async function check(tool: ToolCheck): Promise<CheckResult> {
  const startedAt = Date.now();
  const available = await tool.isAvailable();
  return {
    status: available ? 'pass' : 'fail',
    latencyMs: Date.now() - startedAt,
  };
}
