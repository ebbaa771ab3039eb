import { describe, expect, test } from 'vitest';
import { AudioCommandBuilder, createSegmentCommand } from '../commandBuilder.js';
import {
  LARGE_INPUT_LADDER,
  SMALL_INPUT_LADDER,
  resolveCodecOptions,
  selectLadder,
} from '../strategies.js';

describe('selectLadder', () => {
  test('switches to the large ladder strictly above the threshold', () => {
    expect(selectLadder({ sizeBytes: 100 }, 100).kind).toBe('small');
    expect(selectLadder({ sizeBytes: 101 }, 100).kind).toBe('large');
    expect(selectLadder({ sizeBytes: 101 }, 100).strategies).toBe(LARGE_INPUT_LADDER);
  });

  test('every ladder ends in PCM', () => {
    for (const ladder of [LARGE_INPUT_LADDER, SMALL_INPUT_LADDER]) {
      expect(ladder[ladder.length - 1]?.codec).toBe('pcm_s16le');
      expect(ladder).toHaveLength(3);
    }
  });
});

describe('resolveCodecOptions', () => {
  const [standard, simple, pcm] = SMALL_INPUT_LADDER;

  test('carries source channels and sample rate through', () => {
    if (!standard) throw new Error('ladder is empty');
    expect(resolveCodecOptions(standard, { channels: 6, sampleRate: 48_000 })).toEqual({
      codec: 'libmp3lame',
      bitrate: '128k',
      channels: 6,
      sampleRate: 48_000,
      extraArgs: undefined,
    });
  });

  test('caps channels and leaves unknown values to ffmpeg', () => {
    if (!simple || !pcm) throw new Error('ladder is short');
    expect(resolveCodecOptions(simple, { channels: 6, sampleRate: 48_000 })).toMatchObject({
      channels: 2,
      sampleRate: 44_100,
    });
    expect(resolveCodecOptions(simple, { channels: 0, sampleRate: 0 })).toMatchObject({
      channels: 2,
      sampleRate: 44_100,
    });
    expect(resolveCodecOptions(pcm, { channels: 0, sampleRate: 0 })).toMatchObject({
      codec: 'pcm_s16le',
      channels: undefined,
      sampleRate: undefined,
    });
  });
});

describe('AudioCommandBuilder', () => {
  test('builds a range extraction with explicit output format', () => {
    const args = createSegmentCommand(
      'in.mp3',
      { index: 0, startMs: 0, endMs: 1_500 },
      { codec: 'pcm_s16le', channels: 1 },
      'wav',
      'out.partial'
    ).build();

    expect(args).toEqual([
      '-ss', '0.000',
      '-t', '1.500',
      '-i', 'in.mp3',
      '-map', '0:a:0',
      '-vn',
      '-c:a', 'pcm_s16le',
      '-ac', '1',
      '-f', 'wav',
      'out.partial',
    ]);
  });

  test('quotes arguments with spaces when rendered for logs', () => {
    const builder = new AudioCommandBuilder()
      .addInput('my file.mp3')
      .setAudioCodec({ codec: 'libmp3lame', bitrate: '96k' })
      .setOutput('out.mp3');

    expect(builder.toString()).toBe('ffmpeg -i "my file.mp3" -c:a libmp3lame -b:a 96k out.mp3');
  });

  test('refuses to build without input or output', () => {
    expect(() => new AudioCommandBuilder().setOutput('x.mp3').build()).toThrow('No input specified');
    expect(() => new AudioCommandBuilder().addInput('x.mp3').build()).toThrow('No output file specified');
  });
});
