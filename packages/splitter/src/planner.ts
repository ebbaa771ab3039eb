/**
 * Segment Planner
 *
 * Turns a duration and a split request into ordered, contiguous time ranges.
 * Pure: no I/O, same input gives the same plan.
 *
 * Steps:
 * 1. Nominal length from the unit (seconds directly, megabytes via bitrate)
 * 2. Segment count, capped for large files
 * 3. Even redistribution over the count
 * 4. Integer boundaries, short ranges dropped and the rest re-indexed
 */

import {
  PlanError,
  type PlannerLimits,
  type SegmentPlan,
  type SegmentRange,
  type SourceAudio,
  type SplitRequest,
} from '@splitwave/core';

const BITS_PER_MEGABYTE = 8 * 1024 * 1024;

export type PlanSource = Pick<SourceAudio, 'durationMs' | 'sizeBytes' | 'bitRate'>;

export function planSegments(
  source: PlanSource,
  request: SplitRequest,
  limits: PlannerLimits
): SegmentPlan {
  const { durationMs } = source;
  if (!(durationMs > 0)) {
    throw new PlanError(durationMs, 0);
  }

  const nominalSegmentMs = nominalLengthMs(source, request, limits);
  const requestedSegments = Math.max(1, Math.ceil(durationMs / nominalSegmentMs));

  const capped = source.sizeBytes > limits.largeFileThresholdBytes
    && requestedSegments > limits.largeFileMaxSegments;
  const count = capped ? limits.largeFileMaxSegments : requestedSegments;

  // Evening out would make every range too short; keep nominal spacing and let the tail drop
  const evenedMs = durationMs / count;
  const effectiveSegmentMs = count === 1 || evenedMs >= limits.minSegmentMs ? evenedMs : nominalSegmentMs;

  const ranges: SegmentRange[] = [];
  for (let i = 0; i < count; i++) {
    const startMs = Math.round(i * effectiveSegmentMs);
    const endMs = i === count - 1
      ? durationMs
      : Math.min(Math.round((i + 1) * effectiveSegmentMs), durationMs);

    if (endMs - startMs >= limits.minSegmentMs) {
      ranges.push({ index: ranges.length, startMs, endMs });
    }
  }

  if (ranges.length === 0) {
    throw new PlanError(durationMs, effectiveSegmentMs);
  }

  return {
    ranges,
    nominalSegmentMs,
    effectiveSegmentMs,
    requestedSegments,
    capped,
  };
}

/**
 * Segment length the request asks for, before capping and redistribution
 */
export function nominalLengthMs(
  source: PlanSource,
  request: SplitRequest,
  limits: Pick<PlannerLimits, 'minSizeSegmentMs' | 'sizeSafetyMargin'>
): number {
  if (request.unit === 'seconds') {
    return request.targetValue * 1000;
  }

  const bitRate = source.bitRate > 0
    ? source.bitRate
    : (source.sizeBytes * 8 * 1000) / source.durationMs;

  // No usable bitrate: a single segment covering the file
  if (!(bitRate > 0) || !Number.isFinite(bitRate)) {
    return source.durationMs;
  }

  const segmentMs = (request.targetValue * BITS_PER_MEGABYTE / bitRate) * 1000 * limits.sizeSafetyMargin;
  return Math.max(segmentMs, limits.minSizeSegmentMs);
}
