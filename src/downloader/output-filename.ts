import type { Episode, Program } from '../types/catalog.types';
import { isQualityTier, type QualityTier } from '../types/quality-tier';
import { sanitizeFilename, unsanitizeFilename } from '../utils/filename-sanitizer';

export const OUTPUT_EXTENSION = 'mp4';

const SEPARATOR = ' ||| ';

/** Written in place of a missing foreign title */
export const NO_FOREIGN_TITLE = 'None';

/** Marks files holding only the audio track */
export const AUDIO_ONLY_SUFFIX = '_audio_only';

export type OutputFilenameOptions = {
  audioOnly?: boolean;
};

type FilenameProgram = Pick<Program, 'title' | 'foreignTitle' | 'episodes'>;

/**
 * Episode part of the filename.
 *
 * Titles such as "Þáttur 1" are often reused, or missing, within a program.
 * Those episodes get their first air time appended so every episode of a
 * program maps to its own file. `qualify` forces the suffix.
 */
export function episodeTitleSegment(
  program: Pick<Program, 'title' | 'episodes'>,
  episode: Episode,
  qualify = false,
): string {
  const title = episode.title?.trim();
  if (title && !qualify) {
    const sameTitle = program.episodes.filter((other) => other.title?.trim() === title).length;
    if (sameTitle <= 1) {
      return title;
    }
  }
  return `${title || program.title} ${episode.firstrun ?? episode.id}`;
}

function assemble(
  program: FilenameProgram,
  episodeSegment: string,
  tier: QualityTier,
  options: OutputFilenameOptions,
): string {
  const segments = [program.title, episodeSegment, program.foreignTitle ?? NO_FOREIGN_TITLE];
  const suffix = options.audioOnly ? AUDIO_ONLY_SUFFIX : '';
  return `${segments.map(sanitizeFilename).join(SEPARATOR)} [${tier}]${suffix}.${OUTPUT_EXTENSION}`;
}

/**
 * Canonical output filename:
 * `<program title> ||| <episode title> ||| <foreign title> [<tier>].mp4`
 */
export function buildOutputFilename(
  program: FilenameProgram,
  episode: Episode,
  tier: QualityTier,
  options: OutputFilenameOptions = {},
): string {
  return assemble(program, episodeTitleSegment(program, episode), tier, options);
}

/**
 * Filenames to try in order when the canonical one is already taken by
 * another episode: with the first air time, then also with the episode id.
 */
export function outputFilenameCandidates(
  program: FilenameProgram,
  episode: Episode,
  tier: QualityTier,
  options: OutputFilenameOptions = {},
): string[] {
  const qualified = episodeTitleSegment(program, episode, true);
  const names = [
    buildOutputFilename(program, episode, tier, options),
    assemble(program, qualified, tier, options),
    assemble(program, `${qualified} ${episode.id}`, tier, options),
  ];
  return [...new Set(names)];
}

export type ParsedOutputFilename = {
  programTitle: string;
  episodeTitle: string;
  /** Undefined when the file says "None" */
  foreignTitle?: string;
  tier?: QualityTier;
  audioOnly: boolean;
};

const OUTPUT_FILENAME_PATTERN = new RegExp(
  `^(.+?) \\|\\|\\| (.+?) \\|\\|\\| (.+?)((?: \\[[^\\]]+\\])*)(${AUDIO_ONLY_SUFFIX})?\\.${OUTPUT_EXTENSION}$`,
);

/**
 * Read the parts back out of an output filename. Also accepts names with a
 * trailing ` [<episode id>]` tag, as written by earlier releases.
 *
 * @returns undefined when the name does not follow the convention
 */
export function parseOutputFilename(name: string): ParsedOutputFilename | undefined {
  const match = OUTPUT_FILENAME_PATTERN.exec(name);
  if (!match) {
    return undefined;
  }
  const [, program = '', episode = '', foreign = '', tags = '', audio] = match;
  const tier = [...tags.matchAll(/\[([^\]]+)\]/g)].map((tag) => tag[1] ?? '').find(isQualityTier);
  const foreignTitle = unsanitizeFilename(foreign);

  return {
    programTitle: unsanitizeFilename(program),
    episodeTitle: unsanitizeFilename(episode),
    foreignTitle: foreignTitle === NO_FOREIGN_TITLE ? undefined : foreignTitle,
    tier,
    audioOnly: audio !== undefined,
  };
}
