import type { QualityTier } from './quality-tier';

/**
 * Identity of aired content: program title plus first air time.
 * Catalog ids are deliberately not part of it.
 */
export type DedupKey = {
  programTitle: string;
  firstrun: string;
};

/**
 * One completed download, as persisted in the ledger
 */
export type LedgerEntry = DedupKey & {
  programId?: string;
  episodeId?: string;
  episodeTitle?: string;
  foreignTitle?: string;
  /** Absolute path of the produced file */
  path: string;
  quality: QualityTier;
  /** Only the audio track was kept */
  audioOnly?: boolean;
  /** ISO-8601 completion time; absent on legacy records */
  completedAt?: string;
};
