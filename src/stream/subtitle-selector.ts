import type { SubtitleTrack } from '../types/catalog.types';

/**
 * Track to embed: the one named `preferredLanguage`, else the first one
 */
export function selectSubtitle(tracks: readonly SubtitleTrack[], preferredLanguage: string): SubtitleTrack | undefined {
  return tracks.find((track) => track.name === preferredLanguage) ?? tracks[0];
}
