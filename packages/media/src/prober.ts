/**
 * Duration Prober
 *
 * Describes a source file as SourceAudio: duration, size, container and the
 * first audio stream's properties. Read-only; any failure is a ProbeError.
 */

import { basename } from 'node:path';
import { ProbeError, type SourceAudio } from '@splitwave/core';
import { createLogger, isErrnoException, parseNumeric, statFileSize, type Logger } from '@splitwave/utils';
import { FFProbe, type FFProbeResult, type FFProbeStream } from './probes/ffprobe.js';
import type { AudioProber, ProbeRunner } from './types.js';

export class DurationProber implements AudioProber {
  private readonly runner: ProbeRunner;
  private readonly log: Logger;

  constructor(runner: ProbeRunner = new FFProbe(), log: Logger = createLogger('prober')) {
    this.runner = runner;
    this.log = log;
  }

  async probe(filePath: string): Promise<SourceAudio> {
    const sizeBytes = await this.readSize(filePath);

    let metadata: FFProbeResult;
    try {
      metadata = await this.runner.probe(filePath);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.log.warn({ filePath, err: error }, 'ffprobe could not read file');
      throw new ProbeError('UNREADABLE', filePath, detail);
    }

    const audio = metadata.streams.find(stream => stream.codec_type === 'audio');
    if (!audio) {
      throw new ProbeError('UNREADABLE', filePath, 'no audio stream found');
    }

    const durationMs = resolveDurationMs(metadata, audio);
    if (durationMs <= 0) {
      throw new ProbeError('ZERO_DURATION', filePath, 'duration resolved to 0');
    }

    const source: SourceAudio = {
      path: filePath,
      fileName: basename(filePath),
      durationMs,
      sizeBytes,
      format: metadata.format.format_name ?? 'unknown',
      codec: audio.codec_name ?? 'unknown',
      channels: audio.channels ?? 0,
      sampleRate: Math.round(parseNumeric(audio.sample_rate) ?? 0),
      bitRate: Math.round(parseNumeric(metadata.format.bit_rate) ?? parseNumeric(audio.bit_rate) ?? 0),
    };

    this.log.debug({ source }, 'Probed source audio');
    return source;
  }

  private async readSize(filePath: string): Promise<number> {
    let size: number | null;
    try {
      size = await statFileSize(filePath);
    } catch (error) {
      const detail = isErrnoException(error) ? `${error.code ?? 'error'}: ${error.message}` : String(error);
      throw new ProbeError('UNREADABLE', filePath, detail);
    }

    if (size === null) {
      throw new ProbeError('UNREADABLE', filePath, 'file not found');
    }
    if (size === 0) {
      throw new ProbeError('UNREADABLE', filePath, 'file is empty');
    }
    return size;
  }
}

/**
 * Container duration first, then the audio stream's; integer milliseconds.
 * Missing or non-finite values count as zero.
 */
function resolveDurationMs(metadata: FFProbeResult, audio: FFProbeStream): number {
  const seconds = parseNumeric(metadata.format.duration) ?? parseNumeric(audio.duration) ?? 0;
  return Math.max(0, Math.round(seconds * 1000));
}
