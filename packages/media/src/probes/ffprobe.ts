/**
 * FFProbe Wrapper
 *
 * Safe wrapper for ffprobe command execution.
 * Reads container and stream metadata as JSON without decoding the audio.
 */

import { z } from 'zod';
import { CommandExecutionError } from '@splitwave/core';
import { executeCommand } from '@splitwave/utils';
import type { ProbeRunner } from '../types.js';

// ffprobe prints numbers as strings in some sections and numbers in others
const numeric = z.union([z.string(), z.number()]).optional();

const streamSchema = z.object({
  index: z.number(),
  codec_name: z.string().optional(),
  codec_type: z.string().optional(),
  sample_rate: numeric,
  channels: z.number().optional(),
  channel_layout: z.string().optional(),
  duration: numeric,
  bit_rate: numeric,
});

export const ffprobeResultSchema = z.object({
  format: z.object({
    filename: z.string().optional(),
    nb_streams: z.number().optional(),
    format_name: z.string().optional(),
    format_long_name: z.string().optional(),
    duration: numeric,
    size: numeric,
    bit_rate: numeric,
  }),
  streams: z.array(streamSchema).default([]),
});

export type FFProbeResult = z.infer<typeof ffprobeResultSchema>;
export type FFProbeStream = z.infer<typeof streamSchema>;

export class FFProbe implements ProbeRunner {
  private ffprobePath: string;
  private timeoutMs: number;

  constructor(ffprobePath: string = 'ffprobe', timeoutMs: number = 60000) {
    this.ffprobePath = ffprobePath;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Probe a media file and return its format and stream metadata
   */
  async probe(filePath: string): Promise<FFProbeResult> {
    const args = [
      '-v', 'error',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    const result = await executeCommand(this.ffprobePath, args, {
      timeout: this.timeoutMs,
    });

    if (result.exitCode !== 0) {
      throw new CommandExecutionError(this.ffprobePath, result.exitCode, result.stderr);
    }

    return parseFFProbeOutput(result.stdout);
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffprobePath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}

/**
 * Parse and validate ffprobe's JSON output
 */
export function parseFFProbeOutput(stdout: string): FFProbeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    throw new Error(`Failed to parse ffprobe output: ${stdout.substring(0, 200)}`);
  }

  const parsed = ffprobeResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Unexpected ffprobe output: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`);
  }
  return parsed.data;
}
