import type { ProgramId } from '../types/catalog.types';
import type { QualityTier } from '../types/quality-tier';
import { formatDuration } from '../utils/format-utils';

/**
 * Identifies an episode in report lines
 */
export type EpisodeRef = {
  programId: ProgramId;
  programTitle: string;
  episodeId: string;
  episodeTitle?: string;
  firstrun?: string;
};

export type CompletedEpisode = EpisodeRef & {
  path: string;
  requestedTier: QualityTier;
  tier: QualityTier;
  /** The requested tier was unavailable and `tier` was used instead */
  fallback: boolean;
  audioOnly: boolean;
  /** False when the ledger already held the key at commit time */
  recorded: boolean;
};

export type SkipReason = 'already-downloaded' | 'duplicate-in-batch';

export type SkippedEpisode = EpisodeRef & {
  reason: SkipReason;
  /** File recorded in the ledger, when known */
  path?: string;
};

export type FailedEpisode = EpisodeRef & {
  /** Error class name, e.g. "NoStreamAvailableError" */
  errorName: string;
  reason: string;
};

/** Dry runs list what would be fetched */
export type PendingEpisode = EpisodeRef;

export type ProgramError = {
  programId: ProgramId;
  errorName: string;
  reason: string;
};

/**
 * Outcome of one `downloadPrograms` run
 */
export type DownloadReport = {
  requestedTier: QualityTier;
  /** Distinct program ids, in request order */
  programIds: ProgramId[];
  completed: CompletedEpisode[];
  skipped: SkippedEpisode[];
  failed: FailedEpisode[];
  pending: PendingEpisode[];
  programErrors: ProgramError[];
  dryRun: boolean;
  /** The run was stopped before every episode was attempted */
  interrupted: boolean;
  durationMs: number;
};

export function createEmptyReport(requestedTier: QualityTier, programIds: ProgramId[], dryRun: boolean): DownloadReport {
  return {
    requestedTier,
    programIds,
    completed: [],
    skipped: [],
    failed: [],
    pending: [],
    programErrors: [],
    dryRun,
    interrupted: false,
    durationMs: 0,
  };
}

/**
 * Process exit code: 1 only when every requested program failed to fetch.
 * Episode failures alone never make a run fail.
 */
export function reportExitCode(report: DownloadReport): number {
  const allFailed = report.programIds.length > 0 && report.programErrors.length >= report.programIds.length;
  return allFailed ? 1 : 0;
}

export function describeEpisode(episode: EpisodeRef): string {
  const title = episode.episodeTitle ?? episode.firstrun ?? episode.episodeId;
  return `${episode.programTitle} / ${title}`;
}

/**
 * Human-readable report, one line per episode
 */
export function formatReport(report: DownloadReport): string {
  const lines: string[] = [];

  for (const error of report.programErrors) {
    lines.push(`  ✗ program ${error.programId}: ${error.reason}`);
  }
  for (const episode of report.completed) {
    const fallback = episode.fallback ? ` (fallback from ${episode.requestedTier})` : '';
    const audio = episode.audioOnly ? ' (audio only)' : '';
    lines.push(`  ✓ ${describeEpisode(episode)} [${episode.tier}]${audio}${fallback}`);
  }
  for (const episode of report.pending) {
    lines.push(`  · ${describeEpisode(episode)} (pending)`);
  }
  for (const episode of report.skipped) {
    const why = episode.reason === 'already-downloaded' ? 'already downloaded' : 'duplicate in this run';
    lines.push(`  = ${describeEpisode(episode)} (${why})`);
  }
  for (const episode of report.failed) {
    lines.push(`  ✗ ${describeEpisode(episode)}: ${episode.reason}`);
  }

  const summary = [
    `${report.completed.length} completed`,
    `${report.skipped.length} skipped`,
    `${report.failed.length} failed`,
  ];
  if (report.dryRun) {
    summary.push(`${report.pending.length} pending`);
  }
  if (report.programErrors.length > 0) {
    summary.push(`${report.programErrors.length} program(s) unavailable`);
  }

  const header = report.dryRun ? 'Dry run' : 'Download report';
  const suffix = report.interrupted ? ', interrupted' : '';
  const title = `${header} (${report.requestedTier}, ${formatDuration(report.durationMs)}${suffix}):`;
  return [title, ...lines, summary.join(', ')].join('\n');
}
