import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError, FetchSubprocessError } from '../errors/custom-errors';
import { buildSplitArgs, EpisodeSplitter, parseTimestamp, splitOutputPaths } from './episode-splitter';

const mockExeca = vi.hoisted(() => vi.fn());
vi.mock('execa', () => ({
  execa: mockExeca,
}));

describe('parseTimestamp', () => {
  it('should accept clock times and plain seconds', () => {
    expect(parseTimestamp('25:30')).toBe(1530);
    expect(parseTimestamp('1:02:03.5')).toBe(3723.5);
    expect(parseTimestamp('90')).toBe(90);
  });

  it('should reject anything else', () => {
    expect(parseTimestamp('-10')).toBeUndefined();
    expect(parseTimestamp('0')).toBeUndefined();
    expect(parseTimestamp('12:75')).toBeUndefined();
    expect(parseTimestamp('half time')).toBeUndefined();
  });
});

describe('splitOutputPaths', () => {
  it('should number the halves before the extension', () => {
    expect(splitOutputPaths('/tv/Foo ||| E01-E02 ||| Bar [720p].mp4')).toEqual([
      '/tv/Foo ||| E01-E02 ||| Bar [720p] (1).mp4',
      '/tv/Foo ||| E01-E02 ||| Bar [720p] (2).mp4',
    ]);
  });
});

describe('buildSplitArgs', () => {
  it('should cut the first half with -t and seek the second with -ss', () => {
    expect(buildSplitArgs('/tv/a.mp4', '25:30', 1, '/tv/a (1).mp4')).toEqual([
      '-hide_banner',
      '-loglevel',
      'error',
      '-y',
      '-nostdin',
      '-i',
      '/tv/a.mp4',
      '-t',
      '25:30',
      '-map',
      '0',
      '-c',
      'copy',
      '/tv/a (1).mp4',
    ]);
    expect(buildSplitArgs('/tv/a.mp4', '25:30', 2, '/tv/a (2).mp4').slice(5, 9)).toEqual([
      '-ss',
      '25:30',
      '-i',
      '/tv/a.mp4',
    ]);
  });
});

describe('EpisodeSplitter', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    mockExeca.mockReset();
    dir = await mkdtemp(join(tmpdir(), 'split-test-'));
    file = join(dir, 'double.mp4');
    await writeFile(file, 'two episodes');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should run ffmpeg once per half', async () => {
    mockExeca.mockResolvedValue({ exitCode: 0 });

    const outputs = await new EpisodeSplitter().split(file, '25:30');

    expect(outputs).toEqual([join(dir, 'double (1).mp4'), join(dir, 'double (2).mp4')]);
    expect(mockExeca.mock.calls.map(([binary, args]) => [binary, args.at(-1)])).toEqual([
      ['ffmpeg', join(dir, 'double (1).mp4')],
      ['ffmpeg', join(dir, 'double (2).mp4')],
    ]);
  });

  it('should refuse a bad timestamp without running ffmpeg', async () => {
    await expect(new EpisodeSplitter().split(file, 'soon')).rejects.toBeInstanceOf(ConfigError);
    expect(mockExeca).not.toHaveBeenCalled();
  });

  it('should not overwrite an earlier split', async () => {
    await writeFile(join(dir, 'double (2).mp4'), 'old half');

    await expect(new EpisodeSplitter().split(file, '25:30')).rejects.toThrow(
      `${join(dir, 'double (2).mp4')} already exists`,
    );
  });

  it('should remove both halves when ffmpeg fails', async () => {
    mockExeca.mockImplementationOnce(async () => {
      await writeFile(join(dir, 'double (1).mp4'), 'first half');
      return { exitCode: 0 };
    });
    mockExeca.mockRejectedValueOnce(Object.assign(new Error('Command failed with exit code 1'), { exitCode: 1 }));

    const error = await new EpisodeSplitter().split(file, '25:30').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchSubprocessError);
    expect(error).toMatchObject({ message: `ffmpeg exited with code 1 while splitting ${file}`, exitCode: 1 });
    expect(await readdir(dir)).toEqual(['double.mp4']);
  });
});
