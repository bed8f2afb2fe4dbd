import * as fsPromises from 'node:fs/promises';
import { dirname } from 'node:path';
import { execa } from 'execa';
import { errorMessage, FetchSubprocessError } from '../errors/custom-errors';

/** Lines of ffmpeg output kept for error reports */
const OUTPUT_TAIL_LINES = 20;

/** Grace period between SIGTERM and SIGKILL */
const FORCE_KILL_DELAY_MS = 5000;

export type FetchProgress = {
  /** Media time written so far, in seconds */
  seconds: number;
  /** 0..100, when the total duration is known */
  percent?: number;
};

export type FetchRequest = {
  streamUrl: string;
  /** Final output path; written in place */
  destination: string;
  /** Subtitle track to embed */
  subtitleUrl?: string;
  /** ISO 639-2 tag for the embedded subtitle stream */
  subtitleLanguage?: string;
  /** Keep only the audio track */
  audioOnly?: boolean;
  /** Expected media duration in seconds, for progress percentages */
  durationSeconds?: number;
  /** Aborting kills the subprocess */
  signal?: AbortSignal;
  onProgress?: (progress: FetchProgress) => void;
};

/**
 * External media fetch. Resolves once a complete file is at `destination`.
 *
 * @throws FetchSubprocessError on any failure, after removing partial output
 */
export type MediaFetcher = {
  fetch(request: FetchRequest): Promise<void>;
};

export type FfmpegFetcherOptions = {
  /** Seconds before the subprocess is killed; 0 disables the limit */
  timeoutSeconds?: number;
  /** Executable name or path */
  binary?: string;
};

/**
 * Build the ffmpeg command line: copy audio and video (or audio alone) from
 * the stream and, when given, embed the subtitle track as mov_text.
 */
export function buildFfmpegArgs(request: FetchRequest): string[] {
  const args = ['-hide_banner', '-loglevel', 'error', '-nostats', '-progress', 'pipe:1', '-y', '-nostdin'];

  args.push('-i', request.streamUrl);
  if (request.subtitleUrl) {
    args.push('-i', request.subtitleUrl);
  }

  if (request.audioOnly) {
    args.push('-map', '0:a');
  } else {
    args.push('-map', '0:v', '-map', '0:a');
  }
  if (request.subtitleUrl) {
    args.push('-map', '1:0');
  }

  if (request.audioOnly) {
    args.push('-c:a', 'copy');
  } else {
    args.push('-c:v', 'copy', '-c:a', 'copy');
  }
  if (request.subtitleUrl) {
    args.push('-c:s', 'mov_text');
    if (request.subtitleLanguage) {
      args.push('-metadata:s:s:0', `language=${request.subtitleLanguage}`);
    }
  }

  args.push(request.destination);
  return args;
}

/**
 * Parse an `out_time=HH:MM:SS.micro` progress line into seconds
 */
export function parseProgressTime(line: string): number | undefined {
  const match = line.match(/^out_time=(\d+):(\d{2}):(\d{2}(?:\.\d+)?)$/);
  if (!match) {
    return undefined;
  }
  const [, hours, minutes, seconds] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}

export type SubprocessFailure = {
  exitCode?: number;
  timedOut: boolean;
  isCanceled: boolean;
};

/**
 * Read the fields execa sets on a failed subprocess
 */
export function subprocessFailure(error: unknown): SubprocessFailure {
  if (typeof error !== 'object' || error === null) {
    return { timedOut: false, isCanceled: false };
  }
  const exitCode = 'exitCode' in error && typeof error.exitCode === 'number' ? error.exitCode : undefined;
  return {
    exitCode,
    timedOut: 'timedOut' in error && error.timedOut === true,
    isCanceled: 'isCanceled' in error && error.isCanceled === true,
  };
}

/**
 * Media fetcher running ffmpeg via execa
 */
export class FfmpegFetcher implements MediaFetcher {
  private readonly binary: string;
  private readonly timeoutMs: number;

  constructor(options: FfmpegFetcherOptions = {}) {
    this.binary = options.binary ?? 'ffmpeg';
    this.timeoutMs = (options.timeoutSeconds ?? 0) * 1000;
  }

  async fetch(request: FetchRequest): Promise<void> {
    const { destination, durationSeconds, onProgress } = request;

    await fsPromises.mkdir(dirname(destination), { recursive: true });

    const outputBuffer: string[] = [];

    try {
      const subprocess = execa(this.binary, buildFfmpegArgs(request), {
        all: true,
        cancelSignal: request.signal,
        timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined,
        forceKillAfterDelay: FORCE_KILL_DELAY_MS,
      });

      for await (const line of subprocess.iterable({ from: 'all' })) {
        const text = line.trim();
        if (!text) continue;

        const seconds = parseProgressTime(text);
        if (seconds !== undefined) {
          const percent =
            durationSeconds && durationSeconds > 0 ? Math.min(100, (seconds / durationSeconds) * 100) : undefined;
          onProgress?.({ seconds, percent });
          continue;
        }

        // Remaining progress keys (frame=, bitrate=, progress=...)
        if (/^[a-z_0-9]+=/.test(text)) continue;

        outputBuffer.push(text);
        if (outputBuffer.length > OUTPUT_TAIL_LINES) {
          outputBuffer.shift();
        }
      }

      await subprocess;
    } catch (error) {
      await fsPromises.rm(destination, { force: true });

      const failure = subprocessFailure(error);
      let reason: string;
      if (failure.timedOut) {
        reason = `timed out after ${this.timeoutMs / 1000}s`;
      } else if (failure.isCanceled) {
        reason = 'cancelled';
      } else if (failure.exitCode !== undefined) {
        reason = `exited with code ${failure.exitCode}`;
      } else {
        reason = errorMessage(error);
      }

      const lastLine = outputBuffer.at(-1);
      throw new FetchSubprocessError(
        `ffmpeg ${reason}${lastLine ? `: ${lastLine}` : ''}`,
        destination,
        failure.exitCode,
        [...outputBuffer],
      );
    }
  }

  /**
   * Check if ffmpeg is installed
   */
  static async checkInstalled(binary = 'ffmpeg'): Promise<boolean> {
    try {
      await execa(binary, ['-version']);
      return true;
    } catch {
      return false;
    }
  }
}
