/**
 * Segmentation Orchestrator
 *
 * Runs one split job end to end:
 * PENDING → PROBING → PLANNING → ENCODING → AGGREGATING → DONE
 *
 * Probe and plan finish before any encode starts. Ranges are encoded through
 * a bounded pool; one range failing never stops its siblings. Anything
 * job-fatal leaves as a SplitError and moves the job to ERROR.
 */

import { randomUUID } from 'node:crypto';
import {
  EncodeError,
  PlanError,
  ProbeError,
  SplitError,
  SplitJobStateMachine,
  SplitwaveError,
  type EngineConfig,
  type SegmentPlan,
  type SegmentRange,
  type SourceAudio,
  type SplitJobState,
  type SplitJobStateTransition,
  type SplitManifest,
  type SplitRequest,
} from '@splitwave/core';
import { DurationProber, FFProbe, type AudioProber } from '@splitwave/media';
import { FFmpeg, SegmentEncoder, type SegmentEncoderLike } from '@splitwave/processing';
import {
  createLogger,
  ensureDir,
  formatBytes,
  isErrnoException,
  mapWithConcurrency,
  type Logger,
} from '@splitwave/utils';
import { aggregateManifest, type SegmentOutcome } from './manifest.js';
import { planSegments } from './planner.js';
import { validateSplitRequest } from './validation.js';

export interface OrchestratorDependencies {
  prober: AudioProber;
  encoder: SegmentEncoderLike;
  config: EngineConfig;
  logger?: Logger;
}

export interface SplitJobOptions {
  jobId?: string;
  signal?: AbortSignal;
  /** Called after every state change, ERROR included. */
  onStateChange?: (transition: SplitJobStateTransition) => void;
}

export class SegmentationOrchestrator {
  private readonly prober: AudioProber;
  private readonly encoder: SegmentEncoderLike;
  private readonly config: EngineConfig;
  private readonly log: Logger;

  constructor(deps: OrchestratorDependencies) {
    this.prober = deps.prober;
    this.encoder = deps.encoder;
    this.config = deps.config;
    this.log = deps.logger ?? createLogger('orchestrator');
  }

  /**
   * Wire the ffprobe/ffmpeg backed prober and encoder for a configuration
   */
  static fromConfig(config: EngineConfig, logger?: Logger): SegmentationOrchestrator {
    return new SegmentationOrchestrator({
      prober: new DurationProber(new FFProbe(config.ffprobePath)),
      encoder: new SegmentEncoder(new FFmpeg(config.ffmpegPath), {
        largeFileThresholdBytes: config.largeFileThresholdBytes,
        segmentTimeoutMs: config.segmentTimeoutMs,
      }),
      config,
      logger,
    });
  }

  async split(
    sourcePath: string,
    outputDir: string,
    request: unknown,
    options: SplitJobOptions = {}
  ): Promise<SplitManifest> {
    const jobId = options.jobId ?? randomUUID();
    const machine = new SplitJobStateMachine(jobId);
    const log = this.log.child({ jobId });
    const startedAt = Date.now();
    const { signal } = options;

    const transition = (state: SplitJobState, metadata?: Record<string, unknown>): void => {
      const change = machine.transitionTo(state, undefined, metadata);
      log.info({ from: change.from, to: change.to, ...metadata }, 'Split job state changed');
      options.onStateChange?.(change);
    };

    try {
      const splitRequest = validateSplitRequest(request, this.config);

      transition('PROBING', { sourcePath });
      const source = await this.probe(sourcePath);
      if (source.sizeBytes > this.config.maxFileSizeBytes) {
        throw SplitError.invalidParameters(
          'file',
          `${formatBytes(source.sizeBytes)} exceeds the ${formatBytes(this.config.maxFileSizeBytes)} limit`
        );
      }
      throwIfCancelled(signal);

      transition('PLANNING', { durationMs: source.durationMs, sizeBytes: source.sizeBytes, ...splitRequest });
      const plan = this.plan(source, splitRequest);

      transition('ENCODING', { segments: plan.ranges.length, capped: plan.capped });
      await this.prepareOutput(outputDir);
      const outcomes = await mapWithConcurrency(plan.ranges, this.config.concurrency, range =>
        this.encodeRange(source, range, outputDir, log, signal)
      );

      transition('AGGREGATING');
      const manifest = aggregateManifest(source, plan, outcomes, Date.now() - startedAt);
      throwIfCancelled(signal);
      if (manifest.status === 'EMPTY') {
        throw SplitError.noSegmentsProduced(manifest.failures.length);
      }

      transition('DONE', {
        segmentCount: manifest.segmentCount,
        failedSegments: manifest.failures.length,
        totalSizeBytes: manifest.totalSizeBytes,
        processingDurationMs: manifest.processingDurationMs,
      });
      return manifest;
    } catch (error) {
      const failedIn = machine.getState();
      if (machine.canTransitionTo('ERROR')) {
        const change = machine.fail(
          error instanceof Error ? error.message : String(error),
          error instanceof SplitwaveError ? { code: error.code } : undefined
        );
        options.onStateChange?.(change);
      }
      log.error({ err: error, state: failedIn }, 'Split job failed');
      throw error;
    }
  }

  private async probe(sourcePath: string): Promise<SourceAudio> {
    try {
      return await this.prober.probe(sourcePath);
    } catch (error) {
      if (error instanceof ProbeError) {
        throw SplitError.probeFailed(error);
      }
      throw error;
    }
  }

  private async prepareOutput(outputDir: string): Promise<void> {
    try {
      await ensureDir(outputDir);
    } catch (error) {
      const reason = isErrnoException(error) && error.code ? error.code : 'unknown error';
      throw SplitError.invalidParameters('outputDir', `cannot create ${outputDir} (${reason})`);
    }
  }

  private plan(source: SourceAudio, request: SplitRequest): SegmentPlan {
    try {
      return planSegments(source, request, this.config);
    } catch (error) {
      if (error instanceof PlanError) {
        throw SplitError.fileTooShort(error);
      }
      throw error;
    }
  }

  private async encodeRange(
    source: SourceAudio,
    range: SegmentRange,
    outputDir: string,
    log: Logger,
    signal?: AbortSignal
  ): Promise<SegmentOutcome> {
    if (signal?.aborted) {
      return { ok: false, failure: { range, reason: 'cancelled before start', causes: [] } };
    }

    try {
      const segment = await this.encoder.encode(source, range, outputDir, { signal });
      return { ok: true, segment };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.warn({ segment: range.index + 1, reason }, 'Segment failed');
      return {
        ok: false,
        failure: {
          range,
          reason,
          causes: error instanceof EncodeError ? error.causes : [],
        },
      };
    }
  }
}

function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw SplitError.cancelled();
  }
}
