import { NoStreamAvailableError } from '../errors/custom-errors';
import { QUALITY_TIERS, type QualityTier } from '../types/quality-tier';
import type { StreamManifest, StreamSelection, StreamVariant } from '../types/stream.types';

/**
 * Order in which tiers are tried for a request: the requested tier, then each
 * lower tier, then each higher tier nearest first.
 */
export function fallbackOrder(requested: QualityTier): QualityTier[] {
  const index = QUALITY_TIERS.indexOf(requested);
  const lower = QUALITY_TIERS.slice(index + 1);
  const higher = QUALITY_TIERS.slice(0, index).reverse();
  return [requested, ...lower, ...higher];
}

/**
 * Pick the variant to download for a requested tier.
 *
 * A substitution is never silent: `fallback` is set whenever the returned tier
 * differs from the requested one.
 *
 * @param episodeId - Used in the error when nothing is available
 * @throws NoStreamAvailableError when the manifest has no variants
 */
export function selectStream(manifest: StreamManifest, requested: QualityTier, episodeId: string): StreamSelection {
  const byTier = new Map<QualityTier, StreamVariant>();
  for (const variant of manifest.variants) {
    const current = byTier.get(variant.tier);
    if (!current || (variant.bandwidth ?? 0) > (current.bandwidth ?? 0)) {
      byTier.set(variant.tier, variant);
    }
  }

  for (const tier of fallbackOrder(requested)) {
    const variant = byTier.get(tier);
    if (variant) {
      return { requested, tier, url: variant.url, fallback: tier !== requested };
    }
  }

  throw new NoStreamAvailableError(episodeId);
}

/**
 * Pick the variant for an audio-only download: the lowest advertised
 * bandwidth, since the video track is discarded anyway. Variants without a
 * bandwidth rank by tier, lowest first.
 *
 * @throws NoStreamAvailableError when the manifest has no variants
 */
export function selectAudioStream(manifest: StreamManifest, episodeId: string): StreamSelection {
  const rank = (variant: StreamVariant): [number, number] => [
    variant.bandwidth ?? Number.POSITIVE_INFINITY,
    -QUALITY_TIERS.indexOf(variant.tier),
  ];

  let best: StreamVariant | undefined;
  for (const variant of manifest.variants) {
    if (!best) {
      best = variant;
      continue;
    }
    const [bandwidth, tierRank] = rank(variant);
    const [bestBandwidth, bestTierRank] = rank(best);
    if (bandwidth < bestBandwidth || (bandwidth === bestBandwidth && tierRank < bestTierRank)) {
      best = variant;
    }
  }

  if (!best) {
    throw new NoStreamAvailableError(episodeId);
  }
  return { requested: best.tier, tier: best.tier, url: best.url, fallback: false };
}

/**
 * Tiers offered by a manifest, best first
 */
export function availableTiers(manifest: StreamManifest): QualityTier[] {
  const present = new Set(manifest.variants.map((variant) => variant.tier));
  return QUALITY_TIERS.filter((tier) => present.has(tier));
}
