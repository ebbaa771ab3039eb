/**
 * Segment Encoder
 *
 * Cuts one planned range out of the source and encodes it, walking the
 * strategy ladder until an attempt yields a non-empty file. Each attempt
 * writes to a `.partial.<ext>` file beside the final name and is renamed
 * only on success, so a failed attempt never leaves output behind.
 *
 * The timeout is a budget for the whole segment: each attempt gets what
 * the earlier attempts left over, and the ladder stops once it is spent.
 */

import { join } from 'node:path';
import {
  EncodeError,
  type EncodedSegment,
  type SegmentRange,
  type SourceAudio,
  type StrategyFailure,
} from '@splitwave/core';
import {
  createLogger,
  getBasename,
  moveFile,
  removeFile,
  sanitizeBaseName,
  segmentFileName,
  statFileSize,
  type Logger,
} from '@splitwave/utils';
import { createSegmentCommand } from './commandBuilder.js';
import { resolveCodecOptions, selectLadder, type EncodingStrategy } from './strategies.js';
import type { BackendResult, EncodeBackend } from './types.js';

export interface EncoderSettings {
  largeFileThresholdBytes: number;
  segmentTimeoutMs: number;
}

export interface EncodeOptions {
  signal?: AbortSignal;
  /** Overrides the per-segment time budget from the settings. */
  timeoutMs?: number;
}

export interface SegmentEncoderLike {
  encode(
    source: SourceAudio,
    range: SegmentRange,
    outputDir: string,
    options?: EncodeOptions
  ): Promise<EncodedSegment>;
}

type AttemptOutcome =
  | { ok: true; sizeBytes: number }
  | { ok: false; message: string };

export class SegmentEncoder implements SegmentEncoderLike {
  private readonly backend: EncodeBackend;
  private readonly settings: EncoderSettings;
  private readonly log: Logger;

  constructor(
    backend: EncodeBackend,
    settings: EncoderSettings,
    log: Logger = createLogger('encoder')
  ) {
    this.backend = backend;
    this.settings = settings;
    this.log = log;
  }

  async encode(
    source: SourceAudio,
    range: SegmentRange,
    outputDir: string,
    options: EncodeOptions = {}
  ): Promise<EncodedSegment> {
    const ladder = selectLadder(source, this.settings.largeFileThresholdBytes);
    const baseName = sanitizeBaseName(getBasename(source.fileName));
    const log = this.log.child({ segment: range.index + 1, ladder: ladder.kind });
    const causes: StrategyFailure[] = [];
    const budgetMs = options.timeoutMs ?? this.settings.segmentTimeoutMs;
    const deadline = Date.now() + budgetMs;

    for (const [strategyIndex, strategy] of ladder.strategies.entries()) {
      if (options.signal?.aborted) {
        causes.push({ strategy: strategy.name, message: 'cancelled before start' });
        break;
      }

      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) {
        causes.push({ strategy: strategy.name, message: `segment time budget of ${budgetMs}ms used up` });
        break;
      }

      const fileName = segmentFileName(baseName, range.index, strategy.extension);
      const outputPath = join(outputDir, fileName);
      const tempPath = join(outputDir, segmentFileName(baseName, range.index, `partial.${strategy.extension}`));
      const outcome = await this.attempt(source, range, strategy, { tempPath, outputPath }, {
        signal: options.signal,
        timeoutMs: remainingMs,
      });

      if (outcome.ok) {
        log.info({ strategy: strategy.name, fileName, sizeBytes: outcome.sizeBytes }, 'Segment encoded');
        return {
          fileName,
          path: outputPath,
          sizeBytes: outcome.sizeBytes,
          extension: strategy.extension,
          strategy: strategy.name,
          strategyIndex,
          range,
        };
      }

      log.warn({ strategy: strategy.name, reason: outcome.message }, 'Encoding strategy failed');
      causes.push({ strategy: strategy.name, message: outcome.message });
    }

    throw new EncodeError(range.index, causes);
  }

  private async attempt(
    source: SourceAudio,
    range: SegmentRange,
    strategy: EncodingStrategy,
    { tempPath, outputPath }: { tempPath: string; outputPath: string },
    { signal, timeoutMs }: { signal?: AbortSignal; timeoutMs: number }
  ): Promise<AttemptOutcome> {
    const command = createSegmentCommand(
      source.path,
      range,
      resolveCodecOptions(strategy, source),
      strategy.format,
      tempPath
    );

    this.log.debug({ command: command.toString() }, 'FFmpeg command');

    try {
      const result = await this.backend.run(command.build(), { timeoutMs, signal });
      const failure = describeFailure(result, timeoutMs);
      if (failure) {
        return { ok: false, message: failure };
      }

      const sizeBytes = await statFileSize(tempPath);
      if (!sizeBytes) {
        return {
          ok: false,
          message: sizeBytes === null ? 'ffmpeg produced no output file' : 'ffmpeg produced an empty file',
        };
      }

      await moveFile(tempPath, outputPath);
      return { ok: true, sizeBytes };
    } catch (error) {
      return { ok: false, message: error instanceof Error ? error.message : String(error) };
    } finally {
      await removeFile(tempPath);
    }
  }
}

function describeFailure(result: BackendResult, timeoutMs: number): string | null {
  if (result.aborted) {
    return 'cancelled';
  }
  if (result.timedOut) {
    return `timed out after ${timeoutMs}ms`;
  }
  if (result.exitCode !== 0) {
    const lastLine = result.stderr.trim().split('\n').pop() ?? '';
    return `ffmpeg exited with code ${result.exitCode}${lastLine ? `: ${lastLine}` : ''}`;
  }
  return null;
}
