import type { QualityTier } from './quality-tier';

/**
 * One playable rendition of an episode
 */
export type StreamVariant = {
  tier: QualityTier;
  /** Peak bits per second, when advertised */
  bandwidth?: number;
  url: string;
};

/**
 * Variants available for one episode, best tier first
 */
export type StreamManifest = {
  /** Where the manifest was read from */
  sourceUrl: string;
  variants: StreamVariant[];
};

/**
 * Result of picking a variant for a requested tier
 */
export type StreamSelection = {
  requested: QualityTier;
  tier: QualityTier;
  url: string;
  /** True when `tier` differs from `requested` */
  fallback: boolean;
};
