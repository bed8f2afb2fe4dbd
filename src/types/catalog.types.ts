/**
 * Catalog-assigned program identifier. Numeric on the wire, kept as text.
 */
export type ProgramId = string;

/**
 * A subtitle track attached to an episode
 */
export type SubtitleTrack = {
  /** Track language/name as published by the catalog, e.g. "is" */
  name: string;
  /** Location of the track (WebVTT) */
  url: string;
};

/**
 * One aired episode of a program
 */
export type Episode = {
  /** Catalog identifier; not stable across catalog re-syncs */
  id: string;
  /** Owning program, by identifier only */
  programId: ProgramId;
  title?: string;
  /** First air time as published, e.g. "2018-01-18T17:29:00" */
  firstrun?: string;
  /** Duration in seconds */
  duration?: number;
  /** Stream manifest (HLS master playlist) location */
  manifestUrl?: string;
  subtitles: SubtitleTrack[];
};

/**
 * A program with its episodes, in catalog order
 */
export type Program = {
  id: ProgramId;
  title: string;
  foreignTitle?: string;
  shortDescription?: string;
  episodes: Episode[];
};
