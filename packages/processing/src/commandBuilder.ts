/**
 * FFmpeg Command Builder
 *
 * Fluent API for building audio extraction commands.
 */

import type { SegmentRange } from '@splitwave/core';
import { toSecondsArg } from '@splitwave/utils';

export interface InputOptions {
  seekToMs?: number;      // -ss before input (fast seek)
  durationMs?: number;    // -t duration
}

export interface AudioCodecOptions {
  codec: 'libmp3lame' | 'pcm_s16le';
  bitrate?: string;
  sampleRate?: number;
  channels?: number;
  extraArgs?: string[];
}

export interface OutputOptions {
  format?: string;        // -f format
}

export class AudioCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private audioStream: number | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private dropVideo = false;
  private outputOpts: OutputOptions = {};
  private outputFile = '';

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Add input limited to a time range
   */
  addInputRange(file: string, range: SegmentRange): this {
    return this.addInput(file, {
      seekToMs: range.startMs,
      durationMs: range.endMs - range.startMs,
    });
  }

  /**
   * Keep only one audio stream of the first input
   */
  mapAudio(streamIndex: number = 0): this {
    this.audioStream = streamIndex;
    return this;
  }

  /**
   * Drop video (cover art and the like)
   */
  noVideo(): this {
    this.dropVideo = true;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    if (this.inputs.length === 0) {
      throw new Error('No input specified');
    }
    if (!this.outputFile) {
      throw new Error('No output file specified');
    }

    const args: string[] = [];

    for (const input of this.inputs) {
      if (input.options.seekToMs !== undefined) {
        args.push('-ss', toSecondsArg(input.options.seekToMs));
      }
      if (input.options.durationMs !== undefined) {
        args.push('-t', toSecondsArg(input.options.durationMs));
      }
      args.push('-i', input.file);
    }

    if (this.audioStream !== null) {
      args.push('-map', `0:a:${this.audioStream}`);
    }

    if (this.dropVideo) {
      args.push('-vn');
    }

    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.bitrate) {
        args.push('-b:a', this.audioCodec.bitrate);
      }
      if (this.audioCodec.channels !== undefined) {
        args.push('-ac', this.audioCodec.channels.toString());
      }
      if (this.audioCodec.sampleRate !== undefined) {
        args.push('-ar', this.audioCodec.sampleRate.toString());
      }
      if (this.audioCodec.extraArgs) {
        args.push(...this.audioCodec.extraArgs);
      }
    }

    if (this.outputOpts.format) {
      args.push('-f', this.outputOpts.format);
    }

    args.push(this.outputFile);

    return args;
  }

  /**
   * Get command as string (for logging)
   */
  toString(ffmpegPath: string = 'ffmpeg'): string {
    const args = this.build();
    const escaped = args.map(arg => (arg.includes(' ') ? `"${arg}"` : arg));
    return `${ffmpegPath} ${escaped.join(' ')}`;
  }
}

/**
 * Create a command that cuts one range out of the input and encodes it
 */
export function createSegmentCommand(
  inputFile: string,
  range: SegmentRange,
  codec: AudioCodecOptions,
  format: string,
  outputFile: string
): AudioCommandBuilder {
  return new AudioCommandBuilder()
    .addInputRange(inputFile, range)
    .mapAudio(0)
    .noVideo()
    .setAudioCodec(codec)
    .setOutputOptions({ format })
    .setOutput(outputFile);
}
