import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { mkdir, readdir, rename, stat } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { OUTPUT_EXTENSION, parseOutputFilename } from '../downloader/output-filename';
import { errorMessage } from '../errors/custom-errors';
import { NotificationLevel, type Notifier } from '../notifications/notifier';
import { sanitizeFilename } from '../utils/filename-sanitizer';

const ROMAN_SEASONS: Record<string, number> = {
  I: 1,
  II: 2,
  III: 3,
  IV: 4,
  V: 5,
  VI: 6,
  VII: 7,
  VIII: 8,
  IX: 9,
  X: 10,
};

const SEASON_SUFFIX = /\s+(X|IX|IV|V?I{1,3}|V)$/;

export type EpisodeRange = {
  first: number;
  last: number;
};

/**
 * Episode number(s) from a title: "E23", "E23-E24", or the second word of
 * titles like "Þáttur 1 af 26"
 */
export function guessEpisodeNumber(title: string): EpisodeRange | undefined {
  const range = /^E(\d+)-E(\d+)$/.exec(title);
  if (range) {
    return { first: Number(range[1]), last: Number(range[2]) };
  }
  const single = /^E(\d+)$/.exec(title);
  if (single) {
    return { first: Number(single[1]), last: Number(single[1]) };
  }
  const word = title.split(' ')[1];
  if (word && /^\d+$/.test(word)) {
    return { first: Number(word), last: Number(word) };
  }
  return undefined;
}

/**
 * Split a trailing roman numeral off a title: "Ófærð III" -> season 3
 */
export function splitSeason(title: string): { name: string; season: number } {
  const match = SEASON_SUFFIX.exec(title);
  const season = match?.[1] ? ROMAN_SEASONS[match[1]] : undefined;
  if (!match || season === undefined) {
    return { name: title, season: 1 };
  }
  return { name: title.slice(0, match.index).trim(), season };
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export type LibraryPlacement = { ok: true; path: string } | { ok: false; reason: string };

/**
 * Where a downloaded file belongs in the library:
 * `<library>/<Title>/Season NN/<Title> - SxxEyy [<tier>].mp4`, or
 * `<Title> - Sxx - <episode title>` when no episode number can be read.
 *
 * @param translations - Foreign titles for files that carry none, by program title
 */
export function placeInLibrary(
  fileName: string,
  libraryDir: string,
  translations: Readonly<Record<string, string>>,
): LibraryPlacement {
  const parsed = parseOutputFilename(fileName);
  if (!parsed) {
    return { ok: false, reason: 'not a downloaded episode' };
  }

  const foreignTitle = parsed.foreignTitle ?? translations[parsed.programTitle];
  if (!foreignTitle) {
    return { ok: false, reason: 'no foreign title' };
  }

  const { name, season } = splitSeason(foreignTitle);
  const episodes = guessEpisodeNumber(parsed.episodeTitle);
  let label: string;
  if (!episodes) {
    label = `${name} - S${pad(season)} - ${parsed.episodeTitle}`;
  } else if (episodes.first === episodes.last) {
    label = `${name} - S${pad(season)}E${pad(episodes.first)}`;
  } else {
    label = `${name} - S${pad(season)}E${pad(episodes.first)}-E${pad(episodes.last)}`;
  }

  const tier = parsed.tier ? ` [${parsed.tier}]` : '';
  const audio = parsed.audioOnly ? ' (audio)' : '';
  const target = `${sanitizeFilename(label)}${tier}${audio}.${OUTPUT_EXTENSION}`;
  return { ok: true, path: join(libraryDir, sanitizeFilename(name), `Season ${pad(season)}`, target) };
}

export type OrganizeConflict = {
  from: string;
  to: string;
  /** Both files have the same checksum */
  sameContent: boolean;
};

export type OrganizeReport = {
  moved: Array<{ from: string; to: string }>;
  skipped: Array<{ path: string; reason: string }>;
  conflicts: OrganizeConflict[];
  failed: Array<{ path: string; reason: string }>;
  dryRun: boolean;
};

export type LibraryOrganizerOptions = {
  libraryDir: string;
  translations: Readonly<Record<string, string>>;
  notifier: Notifier;
  /** Report the moves without touching any file */
  dryRun?: boolean;
};

async function md5(path: string): Promise<string> {
  const hash = createHash('md5');
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Moves downloaded episodes into a Title/Season layout. A file whose target
 * already exists is never overwritten; its checksum is compared and reported.
 */
export class LibraryOrganizer {
  constructor(private readonly options: LibraryOrganizerOptions) {}

  /**
   * Expand directories into the episode files directly inside them
   */
  async collectFiles(paths: readonly string[]): Promise<string[]> {
    const files: string[] = [];
    for (const path of paths) {
      // biome-ignore lint/performance/noAwaitInLoops: inputs are listed in order
      const stats = await stat(path);
      if (stats.isDirectory()) {
        const names = (await readdir(path)).filter((name) => name.endsWith(`.${OUTPUT_EXTENSION}`)).sort();
        files.push(...names.map((name) => join(path, name)));
      } else {
        files.push(path);
      }
    }
    return files;
  }

  async organize(paths: readonly string[]): Promise<OrganizeReport> {
    const { libraryDir, translations, notifier, dryRun = false } = this.options;
    const report: OrganizeReport = { moved: [], skipped: [], conflicts: [], failed: [], dryRun };
    const claimed = new Set<string>();

    for (const from of await this.collectFiles(paths)) {
      const placement = placeInLibrary(basename(from), libraryDir, translations);
      if (!placement.ok) {
        notifier.notify(NotificationLevel.WARNING, `Skipping ${from} (${placement.reason})`);
        report.skipped.push({ path: from, reason: placement.reason });
        continue;
      }

      const to = placement.path;
      try {
        // biome-ignore lint/performance/noAwaitInLoops: files are moved one at a time
        const onDisk = await pathExists(to);
        if (onDisk || claimed.has(to)) {
          report.conflicts.push(await this.conflict(from, to, onDisk));
          continue;
        }
        claimed.add(to);

        if (dryRun) {
          notifier.notify(NotificationLevel.INFO, `Would move ${from} to ${to}`);
        } else {
          await mkdir(dirname(to), { recursive: true });
          await rename(from, to);
          notifier.notify(NotificationLevel.SUCCESS, `Moved ${from} to ${to}`);
        }
        report.moved.push({ from, to });
      } catch (error) {
        notifier.notify(NotificationLevel.ERROR, `Failed to move ${from}: ${errorMessage(error)}`);
        report.failed.push({ path: from, reason: errorMessage(error) });
      }
    }

    return report;
  }

  private async conflict(from: string, to: string, onDisk: boolean): Promise<OrganizeConflict> {
    const { notifier } = this.options;

    // In a dry run the file planned for `to` has not moved yet; there is nothing to compare
    let sameContent = false;
    let detail = 'another file in this run goes there';
    if (onDisk) {
      sameContent = (await md5(from)) === (await md5(to));
      detail = sameContent ? 'same checksum' : 'different checksum';
    }
    notifier.notify(NotificationLevel.WARNING, `${to} already exists, not moving ${from} (${detail})`);
    return { from, to, sameContent };
  }
}

/**
 * Plain-text summary printed after `organize`
 */
export function formatOrganizeReport(report: OrganizeReport): string {
  const lines = [report.dryRun ? 'Organize plan (dry run):' : 'Organize report:'];
  for (const { from, to } of report.moved) {
    lines.push(`  ✓ ${basename(from)} -> ${to}`);
  }
  for (const { from, to, sameContent } of report.conflicts) {
    lines.push(`  = ${basename(from)} (${to} exists${sameContent ? ', same content' : ''})`);
  }
  for (const { path, reason } of report.skipped) {
    lines.push(`  - ${basename(path)} (${reason})`);
  }
  for (const { path, reason } of report.failed) {
    lines.push(`  ✗ ${basename(path)}: ${reason}`);
  }
  const verb = report.dryRun ? 'to move' : 'moved';
  lines.push(
    `${report.moved.length} ${verb}, ${report.conflicts.length} conflicts, ` +
      `${report.skipped.length} skipped, ${report.failed.length} failed`,
  );
  return lines.join('\n');
}
