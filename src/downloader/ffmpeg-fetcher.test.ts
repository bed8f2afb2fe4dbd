import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FetchSubprocessError } from '../errors/custom-errors';
import { buildFfmpegArgs, FfmpegFetcher, parseProgressTime } from './ffmpeg-fetcher';

const mockExeca = vi.hoisted(() => vi.fn());
vi.mock('execa', () => ({
  execa: mockExeca,
}));

/**
 * Fake execa subprocess: a promise for the result that also yields output lines
 */
function fakeSubprocess(lines: string[], failure?: Error) {
  const result = failure ? Promise.reject(failure) : Promise.resolve({ exitCode: 0 });
  // Awaited by the fetcher after the output has been read
  result.catch(() => undefined);
  return Object.assign(result, {
    iterable: async function* () {
      yield* lines;
    },
  });
}

describe('buildFfmpegArgs', () => {
  it('should copy streams without subtitles', () => {
    expect(buildFfmpegArgs({ streamUrl: 'https://vod.test/720.m3u8', destination: '/out/a.mp4' })).toEqual([
      '-hide_banner',
      '-loglevel',
      'error',
      '-nostats',
      '-progress',
      'pipe:1',
      '-y',
      '-nostdin',
      '-i',
      'https://vod.test/720.m3u8',
      '-map',
      '0:v',
      '-map',
      '0:a',
      '-c:v',
      'copy',
      '-c:a',
      'copy',
      '/out/a.mp4',
    ]);
  });

  it('should map only the audio track for audio-only output', () => {
    const args = buildFfmpegArgs({
      streamUrl: 'https://vod.test/240.m3u8',
      destination: '/out/a_audio_only.mp4',
      audioOnly: true,
    });

    expect(args.slice(args.indexOf('-map'))).toEqual(['-map', '0:a', '-c:a', 'copy', '/out/a_audio_only.mp4']);
  });

  it('should embed a subtitle track with its language', () => {
    const args = buildFfmpegArgs({
      streamUrl: 'https://vod.test/720.m3u8',
      destination: '/out/a.mp4',
      subtitleUrl: 'https://vod.test/is.vtt',
      subtitleLanguage: 'isl',
    });

    expect(args.slice(8)).toEqual([
      '-i',
      'https://vod.test/720.m3u8',
      '-i',
      'https://vod.test/is.vtt',
      '-map',
      '0:v',
      '-map',
      '0:a',
      '-map',
      '1:0',
      '-c:v',
      'copy',
      '-c:a',
      'copy',
      '-c:s',
      'mov_text',
      '-metadata:s:s:0',
      'language=isl',
      '/out/a.mp4',
    ]);
  });
});

describe('parseProgressTime', () => {
  it('should convert out_time to seconds', () => {
    expect(parseProgressTime('out_time=00:01:02.500000')).toBe(62.5);
    expect(parseProgressTime('out_time=01:00:00.000000')).toBe(3600);
  });

  it('should ignore other lines', () => {
    expect(parseProgressTime('out_time=N/A')).toBeUndefined();
    expect(parseProgressTime('out_time=-577014:32:22.771810')).toBeUndefined();
    expect(parseProgressTime('frame=120')).toBeUndefined();
  });
});

describe('FfmpegFetcher', () => {
  let dir: string;
  let destination: string;

  beforeEach(async () => {
    mockExeca.mockReset();
    dir = await mkdtemp(join(tmpdir(), 'ffmpeg-test-'));
    destination = join(dir, 'nested', 'Foo ||| Pilot ||| None [720p].mp4');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should report progress against the known duration', async () => {
    mockExeca.mockReturnValue(
      fakeSubprocess(['frame=10', 'out_time=00:00:30.000000', 'progress=continue', 'out_time=00:01:00.000000']),
    );
    const onProgress = vi.fn();

    await new FfmpegFetcher().fetch({
      streamUrl: 'https://vod.test/720.m3u8',
      destination,
      durationSeconds: 120,
      onProgress,
    });

    expect(onProgress.mock.calls).toEqual([[{ seconds: 30, percent: 25 }], [{ seconds: 60, percent: 50 }]]);
    expect(mockExeca).toHaveBeenCalledWith(
      'ffmpeg',
      expect.arrayContaining([destination]),
      expect.objectContaining({ all: true, timeout: undefined }),
    );
    expect(await readdir(join(dir, 'nested'))).toEqual([]);
  });

  it('should pass the timeout and cancel signal to the subprocess', async () => {
    mockExeca.mockReturnValue(fakeSubprocess([]));
    const controller = new AbortController();

    await new FfmpegFetcher({ timeoutSeconds: 90 }).fetch({
      streamUrl: 'https://vod.test/720.m3u8',
      destination,
      signal: controller.signal,
    });

    expect(mockExeca).toHaveBeenCalledWith(
      'ffmpeg',
      expect.any(Array),
      expect.objectContaining({ timeout: 90_000, cancelSignal: controller.signal }),
    );
  });

  it('should delete partial output and raise FetchSubprocessError on failure', async () => {
    mockExeca.mockImplementation(() => {
      return fakeSubprocess(
        ['out_time=00:00:10.000000', 'Connection reset by peer', 'Error writing trailer'],
        Object.assign(new Error('Command failed with exit code 1'), { exitCode: 1 }),
      );
    });
    // A truncated file left by the failed transfer
    await mkdir(join(dir, 'nested'), { recursive: true });
    await writeFile(destination, 'partial');

    const error = await new FfmpegFetcher().fetch({ streamUrl: 'x', destination }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchSubprocessError);
    expect(error).toMatchObject({
      message: 'ffmpeg exited with code 1: Error writing trailer',
      destination,
      exitCode: 1,
      outputTail: ['Connection reset by peer', 'Error writing trailer'],
    });
    expect(await readdir(join(dir, 'nested'))).toEqual([]);
  });

  it('should describe a timeout', async () => {
    mockExeca.mockReturnValue(fakeSubprocess([], Object.assign(new Error('timed out'), { timedOut: true })));

    await expect(new FfmpegFetcher({ timeoutSeconds: 5 }).fetch({ streamUrl: 'x', destination })).rejects.toThrow(
      'ffmpeg timed out after 5s',
    );
  });

  it('should describe a cancellation', async () => {
    mockExeca.mockReturnValue(fakeSubprocess([], Object.assign(new Error('aborted'), { isCanceled: true })));

    await expect(new FfmpegFetcher().fetch({ streamUrl: 'x', destination })).rejects.toThrow('ffmpeg cancelled');
  });

  it('should report a missing binary', async () => {
    mockExeca.mockRejectedValue(new Error('spawn ffmpeg ENOENT'));

    expect(await FfmpegFetcher.checkInstalled()).toBe(false);
  });

  it('should detect an installed binary', async () => {
    mockExeca.mockResolvedValue({ stdout: 'ffmpeg version 6.1' });

    expect(await FfmpegFetcher.checkInstalled()).toBe(true);
    expect(mockExeca).toHaveBeenCalledWith('ffmpeg', ['-version']);
  });
});
