import { afterEach, describe, expect, test, vi } from 'vitest';
import { SplitError, type SegmentPlan, type SourceAudio } from '@splitwave/core';
import { buildEngineConfig } from '../config/index.js';
import { describeFailure, planRows, sourceDetails } from '../lib/format.js';
import { parsePositiveInteger, resolveSplitTarget } from '../lib/options.js';
import { printSkippedSegments } from '../lib/output.js';

describe('resolveSplitTarget', () => {
  test('maps the chosen flag to a unit', () => {
    expect(resolveSplitTarget({ seconds: '30' })).toEqual({ unit: 'seconds', targetValue: 30 });
    expect(resolveSplitTarget({ megabytes: '5' })).toEqual({ unit: 'megabytes', targetValue: 5 });
  });

  test('requires exactly one target', () => {
    expect(() => resolveSplitTarget({})).toThrow(SplitError);
    expect(() => resolveSplitTarget({ seconds: '30', megabytes: '5' })).toThrow(
      'Invalid target: pass exactly one of --seconds or --megabytes'
    );
  });
});

describe('parsePositiveInteger', () => {
  test('passes through absent values and parses whole numbers', () => {
    expect(parsePositiveInteger(undefined, 'concurrency')).toBeUndefined();
    expect(parsePositiveInteger('4', 'concurrency')).toBe(4);
  });

  test('rejects anything else', () => {
    expect(() => parsePositiveInteger('0', 'concurrency')).toThrow(
      'Invalid concurrency: must be a positive whole number'
    );
    expect(() => parsePositiveInteger('2.5', 'timeout')).toThrow(SplitError);
    expect(() => parsePositiveInteger('fast', 'timeout')).toThrow(SplitError);
  });
});

describe('buildEngineConfig', () => {
  test('applies command-line overrides on top of the environment', () => {
    const config = buildEngineConfig({ SPLIT_CONCURRENCY: '4', FFMPEG_PATH: '/opt/ffmpeg' }, { timeoutMs: 1000 });

    expect(config.concurrency).toBe(4);
    expect(config.segmentTimeoutMs).toBe(1000);
    expect(config.ffmpegPath).toBe('/opt/ffmpeg');
  });
});

describe('format', () => {
  const source: SourceAudio = {
    path: '/input/talk.mp3',
    fileName: 'talk.mp3',
    durationMs: 65_000,
    sizeBytes: 1_040_000,
    format: 'mp3',
    codec: 'mp3',
    channels: 2,
    sampleRate: 44_100,
    bitRate: 0,
  };

  test('lists source details with unknown values spelled out', () => {
    expect(sourceDetails(source)).toEqual([
      ['File', '/input/talk.mp3'],
      ['Format', 'mp3'],
      ['Codec', 'mp3'],
      ['Duration', '1m 5s (00:01:05.000)'],
      ['Size', '1015.6 KB'],
      ['Channels', '2'],
      ['Sample rate', '44100 Hz'],
      ['Bitrate', 'unknown'],
    ]);
  });

  test('renders plan ranges one row per segment', () => {
    const plan: SegmentPlan = {
      ranges: [
        { index: 0, startMs: 0, endMs: 21_667 },
        { index: 1, startMs: 21_667, endMs: 43_333 },
      ],
      nominalSegmentMs: 30_000,
      effectiveSegmentMs: 21_666.67,
      requestedSegments: 2,
      capped: false,
    };

    expect(planRows(plan)).toEqual([
      { segment: 1, start: '00:00:00.000', end: '00:00:21.667', duration: '21s' },
      { segment: 2, start: '00:00:21.667', end: '00:00:43.333', duration: '21s' },
    ]);
  });

  test('tags engine errors with their code', () => {
    expect(describeFailure(SplitError.cancelled())).toBe('Splitting was cancelled before it completed. [CANCELLED]');
    expect(describeFailure(new Error('disk full'))).toBe('disk full');
    expect(describeFailure('odd')).toBe('odd');
  });
});

describe('printSkippedSegments', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('warns once per skipped range with its last cause', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    printSkippedSegments([
      {
        range: { index: 1, startMs: 30_000, endMs: 60_000 },
        reason: 'All 3 encoding strategies failed for segment 2',
        causes: [
          { strategy: 'mp3-standard', message: 'ffmpeg exited with code 1: boom' },
          { strategy: 'wav-pcm', message: 'ffmpeg produced an empty file' },
        ],
      },
      { range: { index: 2, startMs: 60_000, endMs: 65_000 }, reason: 'cancelled before start', causes: [] },
    ]);

    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenNthCalledWith(
      1,
      expect.any(String),
      'Segment 2 skipped: All 3 encoding strategies failed for segment 2 (wav-pcm: ffmpeg produced an empty file)'
    );
    expect(warn).toHaveBeenNthCalledWith(2, expect.any(String), 'Segment 3 skipped: cancelled before start');
  });
});
