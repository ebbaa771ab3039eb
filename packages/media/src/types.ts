/**
 * Media Types
 */

import type { SourceAudio } from '@splitwave/core';
import type { FFProbeResult } from './probes/ffprobe.js';

/**
 * Anything that can produce ffprobe-shaped metadata for a path.
 * The real implementation shells out; tests hand in canned results.
 */
export interface ProbeRunner {
  probe(filePath: string): Promise<FFProbeResult>;
}

export interface AudioProber {
  probe(filePath: string): Promise<SourceAudio>;
}
