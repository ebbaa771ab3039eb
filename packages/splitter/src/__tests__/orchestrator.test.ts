import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import {
  EncodeError,
  SplitError,
  resolveEngineConfig,
  type EncodedSegment,
  type SegmentRange,
  type SourceAudio,
  type SplitJobStateTransition,
} from '@splitwave/core';
import { DurationProber } from '@splitwave/media';
import { SegmentEncoder, type EncodeBackend } from '@splitwave/processing';
import { sleep } from '@splitwave/utils';
import { SegmentationOrchestrator } from '../orchestrator.js';
import { split } from '../split.js';

const config = resolveEngineConfig({ concurrency: 3 });

function talk(overrides: Partial<SourceAudio> = {}): SourceAudio {
  return {
    path: '/input/talk.mp3',
    fileName: 'talk.mp3',
    durationMs: 65_000,
    sizeBytes: 1_040_000,
    format: 'mp3',
    codec: 'mp3',
    channels: 2,
    sampleRate: 44_100,
    bitRate: 128_000,
    ...overrides,
  };
}

function fakeProber(source: SourceAudio = talk()) {
  return { probe: vi.fn(async (_filePath: string) => source) };
}

function fakeEncoder(behave: (range: SegmentRange) => Promise<void> | void = () => undefined) {
  return {
    encode: vi.fn(async (_source: SourceAudio, range: SegmentRange, outputDir: string): Promise<EncodedSegment> => {
      await behave(range);
      const fileName = `talk_part0${range.index + 1}.mp3`;
      return {
        fileName,
        path: join(outputDir, fileName),
        sizeBytes: 1000 + range.index,
        extension: 'mp3',
        strategy: 'mp3-standard',
        strategyIndex: 0,
        range,
      };
    }),
  };
}

async function splitError(promise: Promise<unknown>): Promise<SplitError> {
  const error = await promise.catch((e: unknown) => e);
  if (error instanceof SplitError) return error;
  throw new Error(`expected a SplitError, got ${String(error)}`);
}

describe('SegmentationOrchestrator', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'splitwave-split-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('walks every state and returns a complete manifest', async () => {
    const orchestrator = new SegmentationOrchestrator({ prober: fakeProber(), encoder: fakeEncoder(), config });
    const transitions: SplitJobStateTransition[] = [];

    const manifest = await orchestrator.split('/input/talk.mp3', dir, { unit: 'seconds', targetValue: 30 }, {
      jobId: 'job-1',
      onStateChange: change => transitions.push(change),
    });

    expect(transitions.map(t => t.to)).toEqual(['PROBING', 'PLANNING', 'ENCODING', 'AGGREGATING', 'DONE']);
    expect(manifest.status).toBe('COMPLETE');
    expect(manifest.segments.map(s => s.fileName)).toEqual([
      'talk_part01.mp3',
      'talk_part02.mp3',
      'talk_part03.mp3',
    ]);
    expect(manifest.totalSizeBytes).toBe(3003);
    expect(manifest.segmentCount).toBe(3);
    expect(manifest.failures).toEqual([]);
  });

  test('keeps going when one segment fails', async () => {
    const causes = [{ strategy: 'wav-pcm', message: 'disk full' }];
    const encoder = fakeEncoder(range => {
      if (range.index === 1) throw new EncodeError(1, causes);
    });
    const orchestrator = new SegmentationOrchestrator({ prober: fakeProber(), encoder, config });

    const manifest = await orchestrator.split('/input/talk.mp3', dir, { unit: 'seconds', targetValue: 30 });

    expect(encoder.encode).toHaveBeenCalledTimes(3);
    expect(manifest.status).toBe('COMPLETE');
    expect(manifest.segments.map(s => s.range.index)).toEqual([0, 2]);
    expect(manifest.failures).toEqual([
      {
        range: { index: 1, startMs: 21_667, endMs: 43_333 },
        reason: 'All 1 encoding strategies failed for segment 2',
        causes,
      },
    ]);
  });

  test('orders segments by index whatever the completion order', async () => {
    const encoder = fakeEncoder(range => sleep((3 - range.index) * 20));
    const orchestrator = new SegmentationOrchestrator({ prober: fakeProber(), encoder, config });

    const manifest = await orchestrator.split('/input/talk.mp3', dir, { unit: 'seconds', targetValue: 30 });

    expect(manifest.segments.map(s => s.range.index)).toEqual([0, 1, 2]);
  });

  test('fails with NO_SEGMENTS_PRODUCED when every segment fails', async () => {
    const encoder = fakeEncoder(range => {
      throw new EncodeError(range.index, []);
    });
    const orchestrator = new SegmentationOrchestrator({ prober: fakeProber(), encoder, config });
    const transitions: SplitJobStateTransition[] = [];

    const error = await splitError(
      orchestrator.split('/input/talk.mp3', dir, { unit: 'seconds', targetValue: 30 }, {
        onStateChange: change => transitions.push(change),
      })
    );

    expect(error.code).toBe('NO_SEGMENTS_PRODUCED');
    expect(error.statusCode).toBe(500);
    expect(error.details).toEqual({ failedSegments: 3 });
    expect(transitions[transitions.length - 1]).toMatchObject({ from: 'AGGREGATING', to: 'ERROR' });
  });

  test('stops at the prober for an empty file', async () => {
    const emptyPath = join(dir, 'empty.mp3');
    await writeFile(emptyPath, '');
    const runner = { probe: vi.fn() };
    const encoder = fakeEncoder();
    const orchestrator = new SegmentationOrchestrator({
      prober: new DurationProber(runner),
      encoder,
      config,
    });

    const error = await splitError(
      orchestrator.split(emptyPath, join(dir, 'out'), { unit: 'seconds', targetValue: 30 })
    );

    expect(error.code).toBe('PROBE_FAILED');
    expect(error.details).toMatchObject({ probeReason: 'UNREADABLE', detail: 'file is empty' });
    expect(runner.probe).not.toHaveBeenCalled();
    expect(encoder.encode).not.toHaveBeenCalled();
    expect(await readdir(dir)).toEqual(['empty.mp3']);
  });

  test('reports FILE_TOO_SHORT when no range is long enough', async () => {
    const encoder = fakeEncoder();
    const orchestrator = new SegmentationOrchestrator({
      prober: fakeProber(talk({ durationMs: 800 })),
      encoder,
      config,
    });

    const error = await splitError(orchestrator.split('/input/talk.mp3', dir, { unit: 'seconds', targetValue: 30 }));

    expect(error.code).toBe('FILE_TOO_SHORT');
    expect(error.statusCode).toBe(422);
    expect(encoder.encode).not.toHaveBeenCalled();
  });

  test('rejects invalid parameters before probing', async () => {
    const prober = fakeProber();
    const orchestrator = new SegmentationOrchestrator({ prober, encoder: fakeEncoder(), config });

    const error = await splitError(orchestrator.split('/input/talk.mp3', dir, { unit: 'seconds', targetValue: -5 }));

    expect(error.code).toBe('INVALID_PARAMETERS');
    expect(error.details).toMatchObject({ field: 'targetValue' });
    expect(prober.probe).not.toHaveBeenCalled();
  });

  test('rejects files above the size limit', async () => {
    const orchestrator = new SegmentationOrchestrator({
      prober: fakeProber(talk({ sizeBytes: 2048 })),
      encoder: fakeEncoder(),
      config: resolveEngineConfig({ maxFileSizeBytes: 1024 }),
    });

    const error = await splitError(orchestrator.split('/input/talk.mp3', dir, { unit: 'seconds', targetValue: 30 }));

    expect(error.code).toBe('INVALID_PARAMETERS');
    expect(error.message).toBe('Invalid file: 2.0 KB exceeds the 1.0 KB limit');
  });

  test('reports an output directory that cannot be created as a parameter error', async () => {
    await writeFile(join(dir, 'afile'), 'not a directory');
    const encoder = fakeEncoder();
    const transitions: SplitJobStateTransition[] = [];
    const orchestrator = new SegmentationOrchestrator({ prober: fakeProber(), encoder, config });
    const outputDir = join(dir, 'afile', 'out');

    const error = await splitError(
      orchestrator.split('/input/talk.mp3', outputDir, { unit: 'seconds', targetValue: 30 }, {
        onStateChange: change => transitions.push(change),
      })
    );

    expect(error.code).toBe('INVALID_PARAMETERS');
    expect(error.message).toBe(`Invalid outputDir: cannot create ${outputDir} (ENOTDIR)`);
    expect(error.details).toMatchObject({ field: 'outputDir' });
    expect(encoder.encode).not.toHaveBeenCalled();
    expect(transitions.map(t => t.to)).toEqual(['PROBING', 'PLANNING', 'ENCODING', 'ERROR']);
  });

  test('split() rejects an unusable concurrency before touching the file', async () => {
    const error = await splitError(
      split('/input/talk.mp3', dir, 30, 'seconds', { config: { concurrency: Number.NaN } })
    );

    expect(error.code).toBe('INVALID_PARAMETERS');
    expect(error.details).toMatchObject({ field: 'config.concurrency' });
  });

  test('records unstarted ranges and ends CANCELLED once aborted', async () => {
    const controller = new AbortController();
    const encoder = fakeEncoder(() => controller.abort());
    const orchestrator = new SegmentationOrchestrator({
      prober: fakeProber(),
      encoder,
      config: resolveEngineConfig({ concurrency: 1 }),
    });

    const error = await splitError(
      orchestrator.split('/input/talk.mp3', dir, { unit: 'seconds', targetValue: 30 }, { signal: controller.signal })
    );

    expect(error.code).toBe('CANCELLED');
    expect(error.statusCode).toBe(499);
    expect(encoder.encode).toHaveBeenCalledTimes(1);
  });

  test('falls back to PCM end to end and creates the output directory', async () => {
    const backend: EncodeBackend = {
      async run(args) {
        const codec = args[args.indexOf('-c:a') + 1];
        if (codec !== 'pcm_s16le') {
          return { exitCode: 1, stderr: 'Unknown encoder', timedOut: false, aborted: false };
        }
        await writeFile(args[args.length - 1] ?? '', Buffer.alloc(64));
        return { exitCode: 0, stderr: '', timedOut: false, aborted: false };
      },
    };
    const outputDir = join(dir, 'nested', 'out');
    const orchestrator = new SegmentationOrchestrator({
      prober: fakeProber(),
      encoder: new SegmentEncoder(backend, config),
      config,
    });

    const result = await split('/input/talk.mp3', outputDir, 30, 'seconds', { orchestrator });

    expect(result.files).toEqual(['talk_part01.wav', 'talk_part02.wav', 'talk_part03.wav']);
    expect(result.totalSizeBytes).toBe(192);
    expect(result.segmentCount).toBe(3);
    expect((await readdir(outputDir)).sort()).toEqual(result.files);
  });
});
