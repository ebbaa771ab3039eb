/**
 * Plain-text views of engine results, shared by the commands
 */

import { SplitwaveError, type EncodedSegment, type SegmentPlan, type SourceAudio } from '@splitwave/core';
import { formatBytes, formatDuration, formatTimecode } from '@splitwave/utils';

export function sourceDetails(source: SourceAudio): Array<[string, string]> {
  return [
    ['File', source.path],
    ['Format', source.format],
    ['Codec', source.codec],
    ['Duration', `${formatDuration(source.durationMs)} (${formatTimecode(source.durationMs)})`],
    ['Size', formatBytes(source.sizeBytes)],
    ['Channels', source.channels > 0 ? String(source.channels) : 'unknown'],
    ['Sample rate', source.sampleRate > 0 ? `${source.sampleRate} Hz` : 'unknown'],
    ['Bitrate', source.bitRate > 0 ? `${Math.round(source.bitRate / 1000)} kbps` : 'unknown'],
  ];
}

export function planRows(plan: SegmentPlan): Array<Record<string, string | number>> {
  return plan.ranges.map(range => ({
    segment: range.index + 1,
    start: formatTimecode(range.startMs),
    end: formatTimecode(range.endMs),
    duration: formatDuration(range.endMs - range.startMs),
  }));
}

export function segmentRows(segments: readonly EncodedSegment[]): Array<Record<string, string | number>> {
  return segments.map(segment => ({
    file: segment.fileName,
    strategy: segment.strategy,
    size: formatBytes(segment.sizeBytes),
    start: formatTimecode(segment.range.startMs),
    end: formatTimecode(segment.range.endMs),
  }));
}

/**
 * One line for the terminal. Engine errors carry their code.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof SplitwaveError) {
    return `${error.message} [${error.code}]`;
  }
  return error instanceof Error ? error.message : String(error);
}
