import { access, rm, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { CatalogClient } from '../catalog/catalog-client';
import { errorMessage, FetchSubprocessError, ReelkeeperError } from '../errors/custom-errors';
import type { CompletionLedger } from '../ledger/completion-ledger';
import { dedupKeyOf, dedupKeyString } from '../ledger/dedup-key';
import { NotificationLevel, type Notifier } from '../notifications/notifier';
import { WorkerPool } from '../queue/worker-pool';
import { selectAudioStream, selectStream } from '../stream/stream-selector';
import { selectSubtitle } from '../stream/subtitle-selector';
import type { Episode, Program, ProgramId } from '../types/catalog.types';
import type { QualityTier } from '../types/quality-tier';
import { formatClock, formatSize } from '../utils/format-utils';
import type { DurationProbe } from '../utils/video-validator';
import {
  type CompletedEpisode,
  createEmptyReport,
  type DownloadReport,
  describeEpisode,
  type EpisodeRef,
  type FailedEpisode,
} from './download-report';
import type { MediaFetcher } from './ffmpeg-fetcher';
import { outputFilenameCandidates } from './output-filename';

export type DownloadOrchestratorOptions = {
  catalog: CatalogClient;
  /** Must be loaded before the first run */
  ledger: CompletionLedger;
  fetcher: MediaFetcher;
  notifier: Notifier;
  downloadDir: string;
  /** Episodes downloaded in parallel */
  concurrency: number;
  subtitles: {
    preferredLanguage: string;
    metadataLanguage: string;
  };
  /** Seconds; a shorter file counts as a failed fetch. 0 disables the check. */
  minDuration?: number;
  /** Required when minDuration > 0 */
  probeDuration?: DurationProbe;
  /** Keep only the audio track, from the lowest-bandwidth variant */
  audioOnly?: boolean;
  /** Stop after the catalog and ledger steps */
  dryRun?: boolean;
};

/**
 * One episode waiting to be downloaded
 */
type WorkItem = {
  program: Program;
  episode: Episode;
  ref: EpisodeRef;
};

function episodeRef(program: Program, episode: Episode): EpisodeRef {
  return {
    programId: program.id,
    programTitle: program.title,
    episodeId: episode.id,
    episodeTitle: episode.title,
    firstrun: episode.firstrun,
  };
}

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
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
 * Drives a download run: fetch programs, drop what the ledger already holds,
 * then select, fetch, verify and record each remaining episode.
 *
 * A program that cannot be fetched, or an episode that fails at any step,
 * is reported and never stops its siblings. Nothing is retried.
 */
export class DownloadOrchestrator {
  private readonly abortController = new AbortController();
  private pool: WorkerPool<WorkItem, CompletedEpisode> | undefined;
  /** Output paths owned by a ledger record or an episode of this run */
  private readonly reservedPaths = new Set<string>();

  constructor(private readonly options: DownloadOrchestratorOptions) {
    if ((options.minDuration ?? 0) > 0 && !options.probeDuration) {
      throw new Error('A duration probe is required when minDuration is set');
    }
  }

  /**
   * Stop the run: no further program or episode is started and running
   * fetches are cancelled. Entries already recorded stay valid.
   */
  stop(): void {
    this.abortController.abort();
    this.pool?.stop();
  }

  isStopped(): boolean {
    return this.abortController.signal.aborted;
  }

  async downloadPrograms(programIds: Iterable<ProgramId>, tier: QualityTier): Promise<DownloadReport> {
    const startedAt = Date.now();
    const ids = [...new Set(programIds)];
    const report = createEmptyReport(tier, ids, this.options.dryRun ?? false);

    const work = await this.collectPendingEpisodes(ids, report);

    if (report.dryRun) {
      report.pending = work.map((item) => item.ref);
    } else if (work.length > 0 && !this.isStopped()) {
      await this.downloadEpisodes(work, report);
    }

    report.interrupted = this.isStopped();
    report.durationMs = Date.now() - startedAt;
    return report;
  }

  /**
   * Fetch each program and partition its episodes against the ledger
   */
  private async collectPendingEpisodes(ids: ProgramId[], report: DownloadReport): Promise<WorkItem[]> {
    const { catalog, ledger, notifier } = this.options;
    const work: WorkItem[] = [];
    const queuedKeys = new Set<string>();

    for (const programId of ids) {
      if (this.isStopped()) break;

      let program: Program;
      try {
        // biome-ignore lint/performance/noAwaitInLoops: programs are fetched one at a time
        program = await catalog.fetchProgram(programId);
      } catch (error) {
        notifier.notify(NotificationLevel.ERROR, `Program ${programId}: ${errorMessage(error)}`);
        report.programErrors.push({ programId, errorName: errorName(error), reason: errorMessage(error) });
        continue;
      }

      let pending = 0;
      for (const episode of program.episodes) {
        const ref = episodeRef(program, episode);
        const key = dedupKeyOf(program, episode);

        const recorded = ledger.get(key);
        if (recorded) {
          report.skipped.push({ ...ref, reason: 'already-downloaded', path: recorded.path });
          continue;
        }

        // The same aired episode listed twice, or requested through two program ids
        const keyString = dedupKeyString(key);
        if (queuedKeys.has(keyString)) {
          report.skipped.push({ ...ref, reason: 'duplicate-in-batch' });
          continue;
        }
        queuedKeys.add(keyString);

        work.push({ program, episode, ref });
        pending++;
      }

      notifier.notify(
        NotificationLevel.INFO,
        `${program.title}: ${program.episodes.length} episode(s), ${pending} new, ${program.episodes.length - pending} skipped`,
      );
    }

    return work;
  }

  private async downloadEpisodes(work: WorkItem[], report: DownloadReport): Promise<void> {
    for (const entry of this.options.ledger.list()) {
      this.reservedPaths.add(resolve(entry.path));
    }

    const pool = new WorkerPool(this.options.concurrency, (item: WorkItem) =>
      this.downloadEpisode(item, report.requestedTier),
    );
    this.pool = pool;

    try {
      const outcomes = await pool.run(work);
      for (const outcome of outcomes) {
        if (outcome.ok) {
          report.completed.push(outcome.value);
        } else {
          report.failed.push(this.recordFailure(outcome.item, outcome.error));
        }
      }
    } finally {
      this.pool = undefined;
    }
  }

  private recordFailure(item: WorkItem, error: unknown): FailedEpisode {
    this.options.notifier.notify(
      NotificationLevel.ERROR,
      `Failed to download ${describeEpisode(item.ref)}: ${errorMessage(error)}`,
    );
    return { ...item.ref, errorName: errorName(error), reason: errorMessage(error) };
  }

  /**
   * Full pipeline for one episode. Throws on any failure; the ledger is only
   * written once the output file has been verified.
   */
  private async downloadEpisode(item: WorkItem, requestedTier: QualityTier): Promise<CompletedEpisode> {
    const { catalog, ledger, fetcher, notifier, subtitles, concurrency, audioOnly = false } = this.options;
    const { program, episode, ref } = item;
    const label = describeEpisode(ref);

    const manifest = await catalog.fetchStreamManifest(episode);
    const selection = audioOnly
      ? selectAudioStream(manifest, episode.id)
      : selectStream(manifest, requestedTier, episode.id);
    if (selection.fallback) {
      notifier.notify(
        NotificationLevel.WARNING,
        `${label}: ${requestedTier} not available, using ${selection.tier} instead`,
      );
    }

    const destination = await this.reserveDestination(item, selection.tier);
    const subtitle = selectSubtitle(episode.subtitles, subtitles.preferredLanguage);

    notifier.notify(
      NotificationLevel.HIGHLIGHT,
      `Downloading ${label} [${selection.tier}]${audioOnly ? ' (audio only)' : ''}`,
    );

    // A single progress line cannot represent parallel fetches
    const showProgress = concurrency === 1;
    try {
      await fetcher.fetch({
        streamUrl: selection.url,
        destination,
        subtitleUrl: subtitle?.url,
        subtitleLanguage: subtitle ? subtitles.metadataLanguage : undefined,
        audioOnly,
        durationSeconds: episode.duration,
        signal: this.abortController.signal,
        onProgress: showProgress
          ? ({ seconds, percent }) => {
              const done = percent === undefined ? formatClock(seconds) : `${percent.toFixed(1)}%`;
              notifier.progress(`[${label}] ${done}`);
            }
          : undefined,
      });
    } finally {
      if (showProgress) {
        notifier.endProgress();
      }
    }

    const size = await this.verifyOutput(destination);

    // Only a verified file is recorded; a LedgerWriteError fails the episode
    const recorded = await ledger.append({
      ...dedupKeyOf(program, episode),
      programId: program.id,
      episodeId: episode.id,
      episodeTitle: episode.title,
      foreignTitle: program.foreignTitle,
      path: destination,
      quality: selection.tier,
      audioOnly: audioOnly || undefined,
      completedAt: new Date().toISOString(),
    });

    notifier.notify(NotificationLevel.SUCCESS, `Downloaded ${label}: ${destination} (${formatSize(size)})`);

    return {
      ...ref,
      path: destination,
      requestedTier,
      tier: selection.tier,
      fallback: selection.fallback,
      audioOnly,
      recorded,
    };
  }

  /**
   * Claim the first free output path for an episode. A path is taken when a
   * ledger record or an earlier episode of this run owns it, or a file is
   * already there; ffmpeg would overwrite it otherwise.
   */
  private async reserveDestination(item: WorkItem, tier: QualityTier): Promise<string> {
    const { downloadDir, audioOnly } = this.options;
    const candidates = outputFilenameCandidates(item.program, item.episode, tier, { audioOnly });

    for (const name of candidates) {
      const path = resolve(downloadDir, name);
      if (this.reservedPaths.has(path)) continue;
      // Claimed before the check so parallel workers never pick the same path
      this.reservedPaths.add(path);
      // biome-ignore lint/performance/noAwaitInLoops: candidates are tried in order
      if (!(await pathExists(path))) {
        return path;
      }
    }

    throw new ReelkeeperError(`No free output filename for ${describeEpisode(item.ref)} in ${downloadDir}`);
  }

  /**
   * Confirm the fetch left a usable file. Anything else is removed and
   * reported as a failed fetch.
   *
   * @returns File size in bytes
   */
  private async verifyOutput(destination: string): Promise<number> {
    const stats = await stat(destination).catch(() => undefined);
    if (!stats?.isFile()) {
      throw new FetchSubprocessError('Downloaded file does not exist', destination);
    }
    if (stats.size === 0) {
      await rm(destination, { force: true });
      throw new FetchSubprocessError('Downloaded file is empty', destination);
    }
    const size = stats.size;

    const { minDuration = 0, probeDuration } = this.options;
    if (minDuration > 0 && probeDuration) {
      let duration: number;
      try {
        duration = await probeDuration(destination);
      } catch (error) {
        await rm(destination, { force: true });
        throw new FetchSubprocessError(errorMessage(error), destination);
      }
      if (duration < minDuration) {
        await rm(destination, { force: true });
        throw new FetchSubprocessError(
          `Video duration ${duration}s is less than minimum ${minDuration}s`,
          destination,
        );
      }
    }

    return size;
  }
}
