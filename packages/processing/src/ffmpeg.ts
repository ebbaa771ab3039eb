/**
 * FFmpeg Wrapper
 *
 * Runs ffmpeg with quiet, non-interactive defaults. Failures come back as
 * a result with a non-zero exit code rather than a thrown error so the
 * encoder can move on to its next strategy.
 */

import { executeCommand } from '@splitwave/utils';
import type { BackendResult, BackendRunOptions, EncodeBackend } from './types.js';

const BASE_ARGS = ['-hide_banner', '-nostdin', '-loglevel', 'error', '-y'];

export class FFmpeg implements EncodeBackend {
  private ffmpegPath: string;

  constructor(ffmpegPath: string = 'ffmpeg') {
    this.ffmpegPath = ffmpegPath;
  }

  /**
   * Execute an FFmpeg command
   */
  async run(args: string[], options: BackendRunOptions): Promise<BackendResult> {
    const result = await executeCommand(this.ffmpegPath, [...BASE_ARGS, ...args], {
      timeout: options.timeoutMs,
      signal: options.signal,
    });

    return {
      exitCode: result.exitCode,
      stderr: result.stderr,
      timedOut: result.timedOut,
      aborted: result.aborted,
    };
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffmpegPath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
