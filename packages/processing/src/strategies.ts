/**
 * Encoding Strategies
 *
 * Ordered ladders of encoder configurations. The encoder walks a ladder
 * top to bottom and keeps the first output that succeeds, so every ladder
 * ends in uncompressed PCM, which only needs working disk I/O.
 *
 * Large inputs favour speed (mono, low sample rate) from the first rung;
 * small inputs start at full quality and simplify on the way down.
 */

import type { SourceAudio } from '@splitwave/core';
import type { AudioCodecOptions } from './commandBuilder.js';

export interface EncodingStrategy {
  name: string;
  description: string;
  codec: AudioCodecOptions['codec'];
  format: 'mp3' | 'wav';
  extension: 'mp3' | 'wav';
  bitrate?: string;

  // A number forces the value; 'source' keeps the input's
  channels: number | 'source';
  sampleRate: number | 'source';
  maxChannels?: number;

  extraArgs?: string[];
}

export type LadderKind = 'large' | 'small';

export const LARGE_INPUT_LADDER: readonly EncodingStrategy[] = [
  {
    name: 'mp3-mono-16k',
    description: 'Fast MP3, mono 16 kHz at 64 kbps',
    codec: 'libmp3lame',
    format: 'mp3',
    extension: 'mp3',
    bitrate: '64k',
    channels: 1,
    sampleRate: 16000,
    extraArgs: ['-compression_level', '9'],
  },
  {
    name: 'mp3-mono-22k',
    description: 'MP3, mono 22.05 kHz at 96 kbps',
    codec: 'libmp3lame',
    format: 'mp3',
    extension: 'mp3',
    bitrate: '96k',
    channels: 1,
    sampleRate: 22050,
  },
  {
    name: 'wav-pcm-mono',
    description: '16-bit PCM WAV, mono 16 kHz',
    codec: 'pcm_s16le',
    format: 'wav',
    extension: 'wav',
    channels: 1,
    sampleRate: 16000,
  },
];

export const SMALL_INPUT_LADDER: readonly EncodingStrategy[] = [
  {
    name: 'mp3-standard',
    description: 'MP3 at 128 kbps with the source channels and sample rate',
    codec: 'libmp3lame',
    format: 'mp3',
    extension: 'mp3',
    bitrate: '128k',
    channels: 'source',
    sampleRate: 'source',
  },
  {
    name: 'mp3-simple',
    description: 'MP3 at 128 kbps, at most stereo, 44.1 kHz',
    codec: 'libmp3lame',
    format: 'mp3',
    extension: 'mp3',
    bitrate: '128k',
    channels: 'source',
    maxChannels: 2,
    sampleRate: 44100,
  },
  {
    name: 'wav-pcm',
    description: '16-bit PCM WAV with the source channels and sample rate',
    codec: 'pcm_s16le',
    format: 'wav',
    extension: 'wav',
    channels: 'source',
    sampleRate: 'source',
  },
];

/**
 * Pick the ladder for a source: anything above the threshold is "large"
 */
export function selectLadder(
  source: Pick<SourceAudio, 'sizeBytes'>,
  largeFileThresholdBytes: number
): { kind: LadderKind; strategies: readonly EncodingStrategy[] } {
  return source.sizeBytes > largeFileThresholdBytes
    ? { kind: 'large', strategies: LARGE_INPUT_LADDER }
    : { kind: 'small', strategies: SMALL_INPUT_LADDER };
}

/**
 * Concrete codec options for one strategy applied to one source.
 * 'source' values the prober could not determine are left to ffmpeg.
 */
export function resolveCodecOptions(
  strategy: EncodingStrategy,
  source: Pick<SourceAudio, 'channels' | 'sampleRate'>
): AudioCodecOptions {
  let channels = strategy.channels === 'source' ? positiveOrUndefined(source.channels) : strategy.channels;
  if (strategy.maxChannels !== undefined) {
    channels = Math.min(channels ?? strategy.maxChannels, strategy.maxChannels);
  }

  const sampleRate = strategy.sampleRate === 'source'
    ? positiveOrUndefined(source.sampleRate)
    : strategy.sampleRate;

  return {
    codec: strategy.codec,
    bitrate: strategy.bitrate,
    channels,
    sampleRate,
    extraArgs: strategy.extraArgs,
  };
}

function positiveOrUndefined(value: number): number | undefined {
  return value > 0 ? value : undefined;
}
