import type { Episode, Program } from '../types/catalog.types';
import type { DedupKey } from '../types/ledger.types';

/**
 * Dedup key of an episode within its program.
 *
 * The catalog hands out new episode ids when it re-syncs, so only the program
 * title and first air time identify aired content. An episode published without
 * a first air time (or with a blank one) falls back to its id, the only handle left.
 */
export function dedupKeyOf(program: Pick<Program, 'title'>, episode: Pick<Episode, 'id' | 'firstrun'>): DedupKey {
  return {
    programTitle: program.title,
    firstrun: episode.firstrun?.trim() || `id:${episode.id}`,
  };
}

/**
 * Map key for a dedup key. JSON keeps titles containing separators unambiguous.
 */
export function dedupKeyString(key: DedupKey): string {
  return JSON.stringify([key.programTitle, key.firstrun]);
}
