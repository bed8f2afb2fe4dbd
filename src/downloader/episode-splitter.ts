import { access, rm } from 'node:fs/promises';
import { extname } from 'node:path';
import { execa } from 'execa';
import { ConfigError, errorMessage, FetchSubprocessError } from '../errors/custom-errors';
import { subprocessFailure } from './ffmpeg-fetcher';

/**
 * Seconds for an ffmpeg time duration: `[HH:]MM:SS[.m...]` or `S+[.m...]`
 *
 * @returns undefined for anything else, and for zero
 */
export function parseTimestamp(value: string): number | undefined {
  const clock = /^(?:(\d+):)?(\d{1,2}):(\d{2}(?:\.\d+)?)$/.exec(value.trim());
  let seconds: number | undefined;
  if (clock) {
    const [, hours = '0', minutes, rest] = clock;
    if (Number(minutes) < 60 && Number(rest) < 60) {
      seconds = Number(hours) * 3600 + Number(minutes) * 60 + Number(rest);
    }
  } else if (/^\d+(?:\.\d+)?$/.test(value.trim())) {
    seconds = Number(value.trim());
  }
  return seconds !== undefined && seconds > 0 ? seconds : undefined;
}

/**
 * Output paths for the two halves: `<name> (1).mp4` and `<name> (2).mp4`
 */
export function splitOutputPaths(file: string): [string, string] {
  const extension = extname(file);
  const stem = file.slice(0, file.length - extension.length);
  return [`${stem} (1)${extension}`, `${stem} (2)${extension}`];
}

export function buildSplitArgs(file: string, timestamp: string, part: 1 | 2, output: string): string[] {
  const args = ['-hide_banner', '-loglevel', 'error', '-y', '-nostdin'];
  if (part === 1) {
    args.push('-i', file, '-t', timestamp);
  } else {
    args.push('-ss', timestamp, '-i', file);
  }
  args.push('-map', '0', '-c', 'copy', output);
  return args;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Splits an episode file in two at a timestamp, copying every stream.
 * Typically used for recordings that hold two episodes back to back.
 */
export class EpisodeSplitter {
  constructor(private readonly binary = 'ffmpeg') {}

  /**
   * @returns Paths of the two new files; the original is left in place
   * @throws ConfigError for a bad timestamp or when an output already exists
   * @throws FetchSubprocessError when ffmpeg fails; partial output is removed
   */
  async split(file: string, timestamp: string): Promise<[string, string]> {
    if (parseTimestamp(timestamp) === undefined) {
      throw new ConfigError(`Invalid timestamp "${timestamp}", expected [HH:]MM:SS[.m] or seconds`);
    }

    const outputs = splitOutputPaths(file);
    for (const output of outputs) {
      // biome-ignore lint/performance/noAwaitInLoops: two paths
      if (await pathExists(output)) {
        throw new ConfigError(`${output} already exists`);
      }
    }

    const [first, second] = outputs;
    try {
      await execa(this.binary, buildSplitArgs(file, timestamp, 1, first));
      await execa(this.binary, buildSplitArgs(file, timestamp, 2, second));
    } catch (error) {
      await Promise.all(outputs.map((output) => rm(output, { force: true })));
      const { exitCode } = subprocessFailure(error);
      const reason = exitCode === undefined ? errorMessage(error) : `exited with code ${exitCode}`;
      throw new FetchSubprocessError(`ffmpeg ${reason} while splitting ${file}`, file, exitCode);
    }

    return outputs;
  }
}
