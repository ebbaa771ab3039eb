/**
 * Audio Split Types
 *
 * Shapes that flow between the prober, planner, encoder and orchestrator.
 */

/**
 * Immutable description of the input file, produced once per job by the prober.
 */
export interface SourceAudio {
  path: string;
  fileName: string;
  durationMs: number;
  sizeBytes: number;
  format: string;
  codec: string;
  channels: number;
  sampleRate: number;
  /** Bits per second; 0 when the container does not report one. */
  bitRate: number;
}

export type SplitUnit = 'seconds' | 'megabytes';

export const SPLIT_UNITS: readonly SplitUnit[] = ['seconds', 'megabytes'];

export interface SplitRequest {
  unit: SplitUnit;
  targetValue: number;
}

export interface SegmentRange {
  index: number;
  startMs: number;
  endMs: number;
}

export interface SegmentPlan {
  ranges: SegmentRange[];
  /** Length derived from the request before capping and redistribution. */
  nominalSegmentMs: number;
  /** Spacing actually used for the boundaries. */
  effectiveSegmentMs: number;
  /** Segment count before the large-file cap. */
  requestedSegments: number;
  capped: boolean;
}

export interface EncodedSegment {
  fileName: string;
  path: string;
  sizeBytes: number;
  extension: string;
  strategy: string;
  strategyIndex: number;
  range: SegmentRange;
}

export interface StrategyFailure {
  strategy: string;
  message: string;
}

export interface SegmentFailure {
  range: SegmentRange;
  reason: string;
  causes: StrategyFailure[];
}

export type ManifestStatus = 'COMPLETE' | 'EMPTY';

export interface SplitManifest {
  status: ManifestStatus;
  source: SourceAudio;
  plan: SegmentPlan;
  segments: EncodedSegment[];
  failures: SegmentFailure[];
  totalSizeBytes: number;
  segmentCount: number;
  processingDurationMs: number;
}

/**
 * What the outer glue receives from `split()`.
 */
export interface SplitResult {
  files: string[];
  totalSizeBytes: number;
  segmentCount: number;
  processingTimeMs: number;
}
