/**
 * Manifest aggregation
 */

import type {
  EncodedSegment,
  SegmentFailure,
  SegmentPlan,
  SourceAudio,
  SplitManifest,
  SplitResult,
} from '@splitwave/core';

export type SegmentOutcome =
  | { ok: true; segment: EncodedSegment }
  | { ok: false; failure: SegmentFailure };

/**
 * Collect per-range outcomes into a manifest ordered by range index.
 * A manifest without a single segment is EMPTY.
 */
export function aggregateManifest(
  source: SourceAudio,
  plan: SegmentPlan,
  outcomes: readonly SegmentOutcome[],
  processingDurationMs: number
): SplitManifest {
  const segments = outcomes
    .flatMap(outcome => (outcome.ok ? [outcome.segment] : []))
    .sort((a, b) => a.range.index - b.range.index);
  const failures = outcomes
    .flatMap(outcome => (outcome.ok ? [] : [outcome.failure]))
    .sort((a, b) => a.range.index - b.range.index);

  return {
    status: segments.length > 0 ? 'COMPLETE' : 'EMPTY',
    source,
    plan,
    segments,
    failures,
    totalSizeBytes: segments.reduce((total, segment) => total + segment.sizeBytes, 0),
    segmentCount: segments.length,
    processingDurationMs,
  };
}

export function toSplitResult(manifest: SplitManifest): SplitResult {
  return {
    files: manifest.segments.map(segment => segment.fileName),
    totalSizeBytes: manifest.totalSizeBytes,
    segmentCount: manifest.segmentCount,
    processingTimeMs: manifest.processingDurationMs,
  };
}
