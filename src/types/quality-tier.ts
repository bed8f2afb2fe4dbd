import { createEnum } from '../utils/create-enum';

/**
 * Quality tiers, best first. The order drives fallback selection.
 */
const qualityTier = createEnum(['1080p', '720p', '480p', '360p', '240p'] as const);

export type QualityTier = typeof qualityTier.type;

export const QualityTierSchema = qualityTier.schema;

export const QUALITY_TIERS: readonly QualityTier[] = qualityTier.values;

export const isQualityTier = qualityTier.is;

/**
 * Tier for a vertical resolution, e.g. 720 -> "720p"
 */
export function tierForHeight(height: number): QualityTier | undefined {
  const candidate = `${height}p`;
  return isQualityTier(candidate) ? candidate : undefined;
}

/**
 * Case-insensitive lookup of a user-supplied tier ("720P" -> "720p")
 */
export function parseQualityTier(value: string): QualityTier | undefined {
  const candidate = value.trim().toLowerCase();
  return isQualityTier(candidate) ? candidate : undefined;
}
