import { describe, expect, test } from 'vitest';
import { PlanError, resolveEngineConfig, type SegmentPlan } from '@splitwave/core';
import { nominalLengthMs, planSegments, type PlanSource } from '../planner.js';

const MB = 1024 * 1024;
const limits = resolveEngineConfig({ concurrency: 2 });

function smallFile(durationMs: number, overrides: Partial<PlanSource> = {}): PlanSource {
  return { durationMs, sizeBytes: 1_000_000, bitRate: 128_000, ...overrides };
}

function bounds(plan: SegmentPlan): Array<[number, number]> {
  return plan.ranges.map(range => [range.startMs, range.endMs]);
}

describe('planSegments by time', () => {
  test('evens out three ranges over 65 seconds', () => {
    const plan = planSegments(smallFile(65_000), { unit: 'seconds', targetValue: 30 }, limits);

    expect(bounds(plan)).toEqual([
      [0, 21_667],
      [21_667, 43_333],
      [43_333, 65_000],
    ]);
    expect(plan.requestedSegments).toBe(3);
    expect(plan.capped).toBe(false);
  });

  test('drops a tail shorter than the minimum', () => {
    const plan = planSegments(smallFile(1_500), { unit: 'seconds', targetValue: 1 }, limits);

    expect(plan.ranges).toEqual([{ index: 0, startMs: 0, endMs: 1_000 }]);
    expect(plan.effectiveSegmentMs).toBe(1_000);
  });

  test('returns the whole file when the target is longer than it', () => {
    const plan = planSegments(smallFile(10_000), { unit: 'seconds', targetValue: 30 }, limits);

    expect(plan.ranges).toEqual([{ index: 0, startMs: 0, endMs: 10_000 }]);
  });

  test('refuses audio shorter than the minimum segment', () => {
    expect(() => planSegments(smallFile(800), { unit: 'seconds', targetValue: 30 }, limits))
      .toThrow(PlanError);
    expect(() => planSegments(smallFile(0), { unit: 'seconds', targetValue: 30 }, limits))
      .toThrow(PlanError);
  });

  test('caps large files at six evenly sized ranges', () => {
    const plan = planSegments(
      smallFile(600_000, { sizeBytes: 40 * MB }),
      { unit: 'seconds', targetValue: 30 },
      limits
    );

    expect(plan.capped).toBe(true);
    expect(plan.requestedSegments).toBe(20);
    expect(plan.ranges).toHaveLength(6);
    expect(plan.ranges.every(range => range.endMs - range.startMs === 100_000)).toBe(true);
  });

  test('does not cap a large file that needs few segments', () => {
    const plan = planSegments(
      smallFile(120_000, { sizeBytes: 40 * MB }),
      { unit: 'seconds', targetValue: 30 },
      limits
    );

    expect(plan.capped).toBe(false);
    expect(plan.ranges).toHaveLength(4);
  });
});

describe('planSegments by size', () => {
  test('derives the length from the reported bitrate', () => {
    const plan = planSegments(smallFile(300_000), { unit: 'megabytes', targetValue: 1 }, limits);

    expect(plan.nominalSegmentMs).toBeCloseTo(58_982.4, 6);
    expect(plan.ranges).toHaveLength(6);
    expect(bounds(plan)[5]).toEqual([250_000, 300_000]);
  });

  test('estimates the bitrate from size and duration when none is reported', () => {
    const source = smallFile(300_000, { bitRate: 0, sizeBytes: 4_800_000 });

    expect(nominalLengthMs(source, { unit: 'megabytes', targetValue: 1 }, limits)).toBeCloseTo(58_982.4, 6);
  });

  test('never goes below the minimum size-derived length', () => {
    const plan = planSegments(
      smallFile(12_000, { bitRate: 16_000_000 }),
      { unit: 'megabytes', targetValue: 1 },
      limits
    );

    expect(plan.nominalSegmentMs).toBe(5_000);
    expect(bounds(plan)).toEqual([
      [0, 4_000],
      [4_000, 8_000],
      [8_000, 12_000],
    ]);
  });
});

describe('plan invariants', () => {
  const cases: Array<[number, number]> = [
    [65_000, 30],
    [61_001, 10],
    [3_599_999, 7],
    [9_999, 3],
  ];

  test.each(cases)('%ims split every %is is contiguous and covers the file', (durationMs, seconds) => {
    const request = { unit: 'seconds' as const, targetValue: seconds };
    const plan = planSegments(smallFile(durationMs), request, limits);

    expect(plan.ranges[0]?.startMs).toBe(0);
    expect(plan.ranges[plan.ranges.length - 1]?.endMs).toBe(durationMs);
    plan.ranges.forEach((range, i) => {
      expect(range.index).toBe(i);
      expect(range.endMs - range.startMs).toBeGreaterThanOrEqual(limits.minSegmentMs);
      if (i > 0) expect(range.startMs).toBe(plan.ranges[i - 1]?.endMs);
    });
    expect(plan.ranges.reduce((sum, r) => sum + (r.endMs - r.startMs), 0)).toBe(durationMs);

    expect(planSegments(smallFile(durationMs), request, limits)).toEqual(plan);
  });
});
