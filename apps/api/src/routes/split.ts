/**
 * Split Routes
 *
 * Runs the engine against a file already in the input root. Each job gets
 * its own directory under the output root, named by a fresh job id.
 */

import { randomUUID } from 'node:crypto';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { SplitError, type SplitManifest } from '@splitwave/core';
import { assertSupportedExtension, toSplitResult, type SplitJobOptions } from '@splitwave/splitter';

/**
 * What the route needs from the engine; SegmentationOrchestrator fits.
 */
export interface SplitRunner {
  split(
    sourcePath: string,
    outputDir: string,
    request: unknown,
    options?: SplitJobOptions
  ): Promise<SplitManifest>;
}

export interface SplitRouteOptions {
  splitter: SplitRunner;
  inputRoot: string;
  outputRoot: string;
}

// unit and targetValue are checked by the engine so the error names the field
const splitBodySchema = z.object({
  inputPath: z.string().min(1),
  targetValue: z.unknown(),
  unit: z.unknown(),
});

/**
 * Resolve a client path against the input root, refusing anything that
 * lands outside it
 */
export function resolveInputPath(inputRoot: string, requested: string): string {
  const root = resolve(inputRoot);
  const inputPath = resolve(root, requested);
  const rel = relative(root, inputPath);

  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw SplitError.invalidParameters('inputPath', 'must name a file inside the input directory');
  }
  return inputPath;
}

export const splitRoutes: FastifyPluginAsync<SplitRouteOptions> = async (fastify, options) => {
  const { splitter, inputRoot, outputRoot } = options;

  fastify.post('/split', async (request, reply) => {
    const body = splitBodySchema.parse(request.body);
    const inputPath = resolveInputPath(inputRoot, body.inputPath);
    assertSupportedExtension(inputPath);

    const jobId = randomUUID();
    const outputDir = join(outputRoot, jobId);

    // Client went away before we answered
    const controller = new AbortController();
    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    });

    request.log.info({ jobId, inputPath, unit: body.unit, targetValue: body.targetValue }, 'Split requested');

    const manifest = await splitter.split(
      inputPath,
      outputDir,
      { unit: body.unit, targetValue: body.targetValue },
      { jobId, signal: controller.signal }
    );

    request.log.info(
      { jobId, segmentCount: manifest.segmentCount, failedSegments: manifest.failures.length },
      'Split completed'
    );

    return reply.status(200).send({
      jobId,
      outputDir,
      ...toSplitResult(manifest),
    });
  });
};
