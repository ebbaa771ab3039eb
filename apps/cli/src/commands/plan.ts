/**
 * Plan Command
 *
 * Dry run: probe the file and show the ranges a split would produce.
 */

import ora from 'ora';
import { resolve } from 'node:path';
import {
  PlanError,
  SplitError,
  type PlannerLimits,
  type SegmentPlan,
  type SourceAudio,
  type SplitRequest,
} from '@splitwave/core';
import { DurationProber, FFProbe } from '@splitwave/media';
import { planSegments, validateSplitRequest } from '@splitwave/splitter';
import { formatDuration } from '@splitwave/utils';
import { buildEngineConfig } from '../config/index.js';
import { describeFailure, planRows } from '../lib/format.js';
import { resolveSplitTarget, type TargetOptions } from '../lib/options.js';
import { printDetails, printError, printHeader, printJson, printNote, printTable, printWarning } from '../lib/output.js';

interface PlanOptions extends TargetOptions {
  json?: boolean;
}

export async function planCommand(input: string, options: PlanOptions): Promise<void> {
  const spinner = ora('Planning segments...').start();

  try {
    const config = buildEngineConfig();
    const request = validateSplitRequest(resolveSplitTarget(options), config);
    const source = await new DurationProber(new FFProbe(config.ffprobePath)).probe(resolve(input));

    const plan = planOrExplain(source, request, config);
    spinner.stop();

    if (options.json) {
      printJson(plan);
      return;
    }

    printHeader(`Plan for ${source.fileName}`);
    printDetails([
      ['Request', `${request.targetValue} ${request.unit}`],
      ['Duration', formatDuration(source.durationMs)],
      ['Segment length', formatDuration(Math.round(plan.effectiveSegmentMs))],
    ]);
    console.log();
    printTable(planRows(plan));

    if (plan.capped) {
      printWarning(
        `Large file: capped at ${plan.ranges.length} segments instead of ${plan.requestedSegments}`
      );
    }
    printNote('Dry run, nothing was written.');
  } catch (error) {
    spinner.fail('Planning failed');
    printError(describeFailure(error));
    process.exit(1);
  }
}

function planOrExplain(source: SourceAudio, request: SplitRequest, limits: PlannerLimits): SegmentPlan {
  try {
    return planSegments(source, request, limits);
  } catch (error) {
    if (error instanceof PlanError) {
      throw SplitError.fileTooShort(error);
    }
    throw error;
  }
}
