import { resolve } from 'node:path';
import { text } from 'node:stream/consumers';
import {
  boolean,
  command,
  extendType,
  flag,
  number,
  option,
  optional,
  positional,
  restPositionals,
  string,
  subcommands,
} from 'cmd-ts';
import { type CatalogClient, GraphqlCatalogClient } from './catalog/catalog-client';
import { loadConfig } from './config/config-loader';
import type { ResolvedConfig } from './config/config-schema';
import { DownloadOrchestrator } from './downloader/download-orchestrator';
import { formatReport, reportExitCode } from './downloader/download-report';
import { EpisodeSplitter } from './downloader/episode-splitter';
import { FfmpegFetcher, type MediaFetcher } from './downloader/ffmpeg-fetcher';
import { ConfigError, errorMessage } from './errors/custom-errors';
import { CompletionLedger } from './ledger/completion-ledger';
import { ConsoleNotifier, NotificationLevel, type Notifier } from './notifications';
import { formatOrganizeReport, LibraryOrganizer } from './organizer/library-organizer';
import { mapConcurrent } from './queue/worker-pool';
import { availableTiers } from './stream/stream-selector';
import type { Program } from './types/catalog.types';
import { parseQualityTier, QUALITY_TIERS, type QualityTier } from './types/quality-tier';
import { formatClock } from './utils/format-utils';
import { LogLevel, logger, parseLogLevel } from './utils/logger';
import { checkFfprobeInstalled, getVideoDuration } from './utils/video-validator';

/** Exit code after SIGINT/SIGTERM */
export const EXIT_INTERRUPTED = 130;

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  checkFfmpegInstalled: () => Promise<boolean>;
  checkFfprobeInstalled: () => Promise<boolean>;
  createNotifier: (config: ResolvedConfig) => Notifier;
  createCatalog: (config: ResolvedConfig, notifier: Notifier) => CatalogClient;
  createFetcher: (config: ResolvedConfig) => MediaFetcher;
  createLedger: (config: ResolvedConfig) => CompletionLedger;
  /** Split a file in two at a timestamp; resolves to the new paths */
  splitEpisode: (file: string, timestamp: string) => Promise<[string, string]>;
  probeDuration: (filePath: string) => Promise<number>;
  /** Piped standard input, or undefined on a terminal */
  readStdin: () => Promise<string | undefined>;
  /** Command results (report, details) */
  print: (output: string) => void;
  /**
   * Call `handler` on the first SIGINT/SIGTERM
   * @returns Function removing the handler
   */
  onInterrupt: (handler: () => void) => () => void;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  checkFfmpegInstalled: () => FfmpegFetcher.checkInstalled(),
  checkFfprobeInstalled,
  createNotifier: (config) => new ConsoleNotifier(config.notifications.consoleMinLevel, logger),
  createCatalog: (config, notifier) =>
    new GraphqlCatalogClient({
      baseUrl: config.catalog.baseUrl,
      requestConcurrency: config.catalog.requestConcurrency,
      requestTimeout: config.catalog.requestTimeout,
      notifier,
    }),
  createFetcher: (config) => new FfmpegFetcher({ timeoutSeconds: config.fetchTimeout }),
  createLedger: (config) => new CompletionLedger(config.ledgerFile, { legacyDownloadDir: config.downloadDir }),
  splitEpisode: (file, timestamp) => new EpisodeSplitter().split(file, timestamp),
  probeDuration: getVideoDuration,
  readStdin: async () => (process.stdin.isTTY ? undefined : text(process.stdin)),
  print: (output) => {
    process.stdout.write(`${output}\n`);
  },
  onInterrupt: (handler) => {
    process.once('SIGINT', handler);
    process.once('SIGTERM', handler);
    return () => {
      process.off('SIGINT', handler);
      process.off('SIGTERM', handler);
    };
  },
};

type BaseOptions = {
  workDir: string;
  config?: string;
  logLevel?: LogLevel;
};

type CommonOptions = BaseOptions & {
  ids: string[];
};

export type DownloadOptions = CommonOptions & {
  quality?: QualityTier;
  concurrency?: number;
  audioOnly?: boolean;
  dryRun: boolean;
};

export type DetailsOptions = CommonOptions;

export type OrganizeOptions = BaseOptions & {
  paths: string[];
  libraryDir?: string;
  dryRun: boolean;
};

export type SplitOptions = BaseOptions & {
  file: string;
  timestamp: string;
};

const FFMPEG_INSTALL_HINT =
  'ffmpeg is not installed. Please install it first:\n' +
  '  - macOS: brew install ffmpeg\n' +
  '  - Linux: apt install ffmpeg\n' +
  '  - Windows: winget install ffmpeg';

/**
 * Program ids from the arguments, or from piped stdin when none were given
 *
 * @throws ConfigError when there are none at all
 */
export async function collectProgramIds(ids: string[], deps: Pick<AppDependencies, 'readStdin'>): Promise<string[]> {
  let collected = ids.flatMap((id) => id.split(/[\s,]+/)).filter(Boolean);
  if (collected.length === 0) {
    const piped = await deps.readStdin();
    collected = piped?.split(/[\s,]+/).filter(Boolean) ?? [];
  }
  if (collected.length === 0) {
    throw new ConfigError('No program ids given (pass them as arguments or on stdin)');
  }
  return collected;
}

function configureLogging(logLevel: LogLevel | undefined): void {
  if (logLevel) {
    logger.setLevel(logLevel);
  }
}

async function prepare(
  options: BaseOptions & { quality?: QualityTier; concurrency?: number; audioOnly?: boolean },
  deps: AppDependencies,
): Promise<{ config: ResolvedConfig; notifier: Notifier }> {
  configureLogging(options.logLevel);

  const config = await deps.loadConfig({
    workDir: options.workDir,
    configPath: options.config,
    // An unset flag must not override `audioOnly: true` from the file
    overrides: { quality: options.quality, concurrency: options.concurrency, audioOnly: options.audioOnly || undefined },
  });
  return { config, notifier: deps.createNotifier(config) };
}

/**
 * `download`: fetch every new episode of the given programs
 *
 * @returns Process exit code
 */
export async function runDownload(
  options: DownloadOptions,
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  const { config, notifier } = await prepare(options, deps);
  const ids = await collectProgramIds(options.ids, deps);

  if (!options.dryRun) {
    logger.debug('Checking ffmpeg installation...');
    if (!(await deps.checkFfmpegInstalled())) {
      throw new ConfigError(FFMPEG_INSTALL_HINT);
    }
    if (config.minDuration > 0 && !(await deps.checkFfprobeInstalled())) {
      throw new ConfigError('ffprobe is required when minDuration is set; it ships with ffmpeg');
    }
  }

  const ledger = deps.createLedger(config);
  const warnings = await ledger.load();
  for (const warning of warnings) {
    notifier.notify(NotificationLevel.WARNING, `Skipping ledger record ${warning.message}`);
  }
  notifier.notify(NotificationLevel.DEBUG, `Ledger ${ledger.getPath()}: ${ledger.size} completed download(s)`);

  const orchestrator = new DownloadOrchestrator({
    catalog: deps.createCatalog(config, notifier),
    ledger,
    fetcher: deps.createFetcher(config),
    notifier,
    downloadDir: config.downloadDir,
    concurrency: config.concurrency,
    subtitles: config.subtitles,
    minDuration: config.minDuration,
    probeDuration: deps.probeDuration,
    audioOnly: config.audioOnly,
    dryRun: options.dryRun,
  });

  const removeInterruptHandler = deps.onInterrupt(() => {
    notifier.notify(NotificationLevel.WARNING, 'Interrupted, stopping downloads...');
    orchestrator.stop();
  });

  try {
    const report = await orchestrator.downloadPrograms(ids, config.quality);
    deps.print(formatReport(report));
    return report.interrupted ? EXIT_INTERRUPTED : reportExitCode(report);
  } finally {
    removeInterruptHandler();
  }
}

function describeProgram(program: Program, tiersByEpisode: Map<string, QualityTier[] | string>): string {
  const lines = [program.title];
  if (program.foreignTitle) {
    lines.push(`  Foreign title: ${program.foreignTitle}`);
  }
  if (program.shortDescription) {
    lines.push(`  ${program.shortDescription}`);
  }
  lines.push(`  Episodes (${program.episodes.length}):`);

  for (const episode of program.episodes) {
    const tiers = tiersByEpisode.get(episode.id);
    const quality = Array.isArray(tiers) ? tiers.join(' ') || 'no streams' : (tiers ?? 'unknown');
    const duration = episode.duration === undefined ? '?' : formatClock(episode.duration);
    lines.push(
      `    ${episode.title ?? '(untitled)'} | ${episode.id} | ${episode.firstrun ?? '?'} | ${duration} | ${quality}`,
    );
    if (episode.manifestUrl) {
      lines.push(`      ${episode.manifestUrl}`);
    }
  }
  return lines.join('\n');
}

/**
 * `details`: print programs, their episodes and the tiers each offers
 *
 * @returns Process exit code: 1 only when no program could be fetched
 */
export async function runDetails(
  options: DetailsOptions,
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  const { config, notifier } = await prepare(options, deps);
  const ids = await collectProgramIds(options.ids, deps);
  const catalog = deps.createCatalog(config, notifier);

  let failures = 0;
  for (const id of [...new Set(ids)]) {
    let program: Program;
    try {
      // biome-ignore lint/performance/noAwaitInLoops: programs are printed in order
      program = await catalog.fetchProgram(id);
    } catch (error) {
      failures++;
      deps.print(`Program ${id}: ${errorMessage(error)}`);
      continue;
    }

    const outcomes = await mapConcurrent(program.episodes, config.catalog.requestConcurrency, (episode) =>
      catalog.fetchStreamManifest(episode),
    );
    const tiersByEpisode = new Map<string, QualityTier[] | string>();
    for (const outcome of outcomes) {
      tiersByEpisode.set(
        outcome.item.id,
        outcome.ok ? availableTiers(outcome.value) : `unavailable (${errorMessage(outcome.error)})`,
      );
    }

    deps.print(describeProgram(program, tiersByEpisode));
  }

  return failures > 0 && failures === new Set(ids).size ? 1 : 0;
}

/**
 * `organize`: move downloaded files into the library's Title/Season layout
 *
 * @returns Process exit code: 1 when a move failed
 */
export async function runOrganize(
  options: OrganizeOptions,
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  const { config, notifier } = await prepare(options, deps);
  if (options.paths.length === 0) {
    throw new ConfigError('No files or directories to organize');
  }

  const organizer = new LibraryOrganizer({
    libraryDir: options.libraryDir ? resolve(config.workDir, options.libraryDir) : config.organize.libraryDir,
    translations: config.organize.translations,
    notifier,
    dryRun: options.dryRun,
  });
  const report = await organizer.organize(options.paths.map((path) => resolve(config.workDir, path)));
  deps.print(formatOrganizeReport(report));
  return report.failed.length > 0 ? 1 : 0;
}

/**
 * `split-episode`: cut one file into two at a timestamp
 *
 * @returns Process exit code
 */
export async function runSplit(options: SplitOptions, deps: AppDependencies = defaultDependencies): Promise<number> {
  const { config, notifier } = await prepare(options, deps);
  if (!(await deps.checkFfmpegInstalled())) {
    throw new ConfigError(FFMPEG_INSTALL_HINT);
  }

  const file = resolve(config.workDir, options.file);
  notifier.notify(NotificationLevel.HIGHLIGHT, `Splitting ${file} at ${options.timestamp}`);
  const [first, second] = await deps.splitEpisode(file, options.timestamp);
  deps.print([first, second].join('\n'));
  return 0;
}

const QualityTierType = extendType(string, {
  displayName: 'tier',
  description: `Quality tier (${QUALITY_TIERS.join(', ')})`,
  async from(value) {
    const tier = parseQualityTier(value);
    if (!tier) {
      throw new Error(`Invalid quality "${value}", expected one of: ${QUALITY_TIERS.join(', ')}`);
    }
    return tier;
  },
});

const ConcurrencyType = extendType(number, {
  displayName: 'n',
  async from(value) {
    if (!Number.isInteger(value) || value < 1 || value > 16) {
      throw new Error(`Concurrency must be an integer between 1 and 16, got ${value}`);
    }
    return value;
  },
});

const LogLevelType = extendType(string, {
  displayName: 'level',
  async from(value) {
    const level = parseLogLevel(value);
    if (!level) {
      throw new Error(`Invalid log level "${value}", expected one of: ${Object.values(LogLevel).join(', ')}`);
    }
    return level;
  },
});

const baseArgs = {
  workDir: option({
    type: string,
    long: 'work-dir',
    short: 'w',
    defaultValue: () => process.cwd(),
    description: 'Base directory for the config file, downloads and ledger (default: current directory)',
  }),
  config: option({
    type: optional(string),
    long: 'config',
    short: 'c',
    description: 'Path to configuration file (default: <work-dir>/reelkeeper.yaml, if present)',
  }),
  logLevel: option({
    type: optional(LogLevelType),
    long: 'log-level',
    description: 'Minimum log level (debug, info, warning, error)',
  }),
};

const commonArgs = {
  ...baseArgs,
  ids: restPositionals({
    type: string,
    displayName: 'program-id',
    description: 'Catalog program ids (read from stdin when omitted)',
  }),
};

/**
 * Run a command and turn its outcome into the process exit code
 */
async function execute(action: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`Configuration error: ${error.message}`);
    } else {
      logger.error(`Fatal error: ${errorMessage(error)}`);
    }
    process.exitCode = 1;
  }
}

export const downloadCommand = command({
  name: 'download',
  description: 'Download episodes that are not in the ledger yet',
  args: {
    ...commonArgs,
    quality: option({
      type: optional(QualityTierType),
      long: 'quality',
      short: 'q',
      description: 'Requested quality tier (default: 1080p, or the config file value)',
    }),
    concurrency: option({
      type: optional(ConcurrencyType),
      long: 'concurrency',
      short: 'j',
      description: 'Episodes downloaded in parallel (default: 1)',
    }),
    audioOnly: flag({
      type: boolean,
      long: 'audio-only',
      description: 'Keep only the audio track, from the smallest stream',
    }),
    dryRun: flag({
      type: boolean,
      long: 'dry-run',
      short: 'n',
      description: 'List pending episodes without downloading',
    }),
  },
  handler: (args) => execute(() => runDownload(args)),
});

export const detailsCommand = command({
  name: 'details',
  description: 'Show programs, their episodes and available quality tiers',
  args: commonArgs,
  handler: (args) => execute(() => runDetails(args)),
});

export const organizeCommand = command({
  name: 'organize',
  description: 'Move downloaded episodes into a Title/Season NN layout',
  args: {
    ...baseArgs,
    paths: restPositionals({
      type: string,
      displayName: 'path',
      description: 'Episode files, or directories holding them',
    }),
    libraryDir: option({
      type: optional(string),
      long: 'library',
      short: 'l',
      description: 'Library root (default: <work-dir>/library, or the config file value)',
    }),
    dryRun: flag({
      type: boolean,
      long: 'dry-run',
      short: 'n',
      description: 'Show the moves without making them',
    }),
  },
  handler: (args) => execute(() => runOrganize(args)),
});

export const splitCommand = command({
  name: 'split-episode',
  description: 'Split an episode file in two at a timestamp',
  args: {
    ...baseArgs,
    file: positional({ type: string, displayName: 'file', description: 'Episode file to split' }),
    timestamp: positional({
      type: string,
      displayName: 'timestamp',
      description: 'Where the second part starts: [HH:]MM:SS[.m] or seconds',
    }),
  },
  handler: (args) => execute(() => runSplit(args)),
});

// Define CLI using cmd-ts
export const cli = subcommands({
  name: 'reelkeeper',
  description: 'Downloads new episodes of catalog programs and remembers what it already has',
  version: '0.1.0',
  cmds: {
    download: downloadCommand,
    details: detailsCommand,
    organize: organizeCommand,
    'split-episode': splitCommand,
  },
});
