/**
 * Split facade
 *
 * The one call outer glue needs: file in, segment names out.
 */

import { resolveEngineConfig, type EngineConfig, type SplitResult, type SplitUnit } from '@splitwave/core';
import { toSplitResult } from './manifest.js';
import { SegmentationOrchestrator } from './orchestrator.js';

export interface SplitOptions {
  config?: Partial<EngineConfig>;
  signal?: AbortSignal;
  orchestrator?: SegmentationOrchestrator;
}

/**
 * Split `inputPath` into segments under `outputDir`
 *
 * @throws SplitError PROBE_FAILED | FILE_TOO_SHORT | NO_SEGMENTS_PRODUCED | INVALID_PARAMETERS | CANCELLED
 */
export async function split(
  inputPath: string,
  outputDir: string,
  targetValue: number,
  unit: SplitUnit,
  options: SplitOptions = {}
): Promise<SplitResult> {
  const orchestrator = options.orchestrator
    ?? SegmentationOrchestrator.fromConfig(resolveEngineConfig(options.config));

  const manifest = await orchestrator.split(
    inputPath,
    outputDir,
    { unit, targetValue },
    { signal: options.signal }
  );

  return toSplitResult(manifest);
}
