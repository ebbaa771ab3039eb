/**
 * @splitwave/media
 *
 * Media analysis layer.
 *
 * Responsibilities:
 * - Probe files with ffprobe
 * - Describe the input as SourceAudio (duration, size, stream properties)
 */

// Probing
export {
  FFProbe,
  parseFFProbeOutput,
  ffprobeResultSchema,
  type FFProbeResult,
  type FFProbeStream,
} from './probes/ffprobe.js';

export { DurationProber } from './prober.js';

// Types
export type { ProbeRunner, AudioProber } from './types.js';
