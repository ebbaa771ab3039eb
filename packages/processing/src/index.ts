/**
 * @splitwave/processing
 *
 * Audio encoding layer.
 *
 * RULES:
 * - Every segment is cut from the untouched source
 * - A failed attempt leaves no file behind
 * - Every ladder ends in PCM
 */

// FFmpeg wrapper
export { FFmpeg } from './ffmpeg.js';

// Types
export type { EncodeBackend, BackendResult, BackendRunOptions } from './types.js';

// Command Builder
export {
  AudioCommandBuilder,
  createSegmentCommand,
  type InputOptions,
  type AudioCodecOptions,
  type OutputOptions,
} from './commandBuilder.js';

// Strategy ladders
export {
  LARGE_INPUT_LADDER,
  SMALL_INPUT_LADDER,
  selectLadder,
  resolveCodecOptions,
  type EncodingStrategy,
  type LadderKind,
} from './strategies.js';

// Encoder
export {
  SegmentEncoder,
  type SegmentEncoderLike,
  type EncoderSettings,
  type EncodeOptions,
} from './encoder.js';
