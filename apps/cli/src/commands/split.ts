/**
 * Split Command
 *
 * Runs the full engine against a local file. Ctrl+C cancels the job;
 * segments already written stay on disk.
 */

import ora from 'ora';
import { resolve } from 'node:path';
import type { SplitJobState } from '@splitwave/core';
import { SegmentationOrchestrator, toSplitResult } from '@splitwave/splitter';
import { formatBytes, formatDuration } from '@splitwave/utils';
import { buildEngineConfig } from '../config/index.js';
import { describeFailure, segmentRows } from '../lib/format.js';
import { parsePositiveInteger, resolveSplitTarget, type TargetOptions } from '../lib/options.js';
import {
  printError,
  printJson,
  printNote,
  printSkippedSegments,
  printSuccess,
  printTable,
} from '../lib/output.js';

interface SplitCommandOptions extends TargetOptions {
  output: string;
  concurrency?: string;
  timeout?: string;
  json?: boolean;
}

const stateLabels: Record<SplitJobState, string> = {
  PENDING: 'Preparing...',
  PROBING: 'Probing audio file...',
  PLANNING: 'Planning segments...',
  ENCODING: 'Encoding segments...',
  AGGREGATING: 'Collecting results...',
  DONE: 'Done',
  ERROR: 'Failed',
};

export async function splitCommand(input: string, options: SplitCommandOptions): Promise<void> {
  const spinner = ora(stateLabels.PENDING).start();
  const controller = new AbortController();
  const onInterrupt = (): void => {
    spinner.text = 'Cancelling...';
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const config = buildEngineConfig(process.env, {
      concurrency: parsePositiveInteger(options.concurrency, 'concurrency'),
      timeoutMs: parsePositiveInteger(options.timeout, 'timeout'),
    });
    const outputDir = resolve(options.output);
    const orchestrator = SegmentationOrchestrator.fromConfig(config);

    const manifest = await orchestrator.split(resolve(input), outputDir, resolveSplitTarget(options), {
      signal: controller.signal,
      onStateChange: change => {
        spinner.text = stateLabels[change.to];
      },
    });
    spinner.stop();

    if (options.json) {
      printJson({ outputDir, ...toSplitResult(manifest) });
      return;
    }

    printSuccess(
      `${manifest.segmentCount} segment(s), ${formatBytes(manifest.totalSizeBytes)} in ` +
      `${formatDuration(manifest.processingDurationMs)}`
    );
    printNote(`Output: ${outputDir}`);
    printTable(segmentRows(manifest.segments));
    printSkippedSegments(manifest.failures);
  } catch (error) {
    spinner.fail('Split failed');
    printError(describeFailure(error));
    process.exit(1);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}
