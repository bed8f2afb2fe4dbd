import { QUALITY_TIERS, tierForHeight } from '../types/quality-tier';
import type { StreamManifest, StreamVariant } from '../types/stream.types';

const STREAM_INF = '#EXT-X-STREAM-INF:';

export type ParsedPlaylist = {
  manifest: StreamManifest;
  /** Variants that map to no known tier, described as "<RESOLUTION> <uri>" */
  unmatched: string[];
};

/**
 * Split an attribute list on commas outside quoted strings
 */
function splitAttributes(raw: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const ch of raw) {
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (ch === ',' && !inQuotes) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  if (current.length > 0) {
    parts.push(current);
  }
  return parts;
}

export function parseAttributes(raw: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const part of splitAttributes(raw)) {
    const idx = part.indexOf('=');
    if (idx === -1) continue;

    const key = part.slice(0, idx).trim();
    let value = part.slice(idx + 1).trim();
    if (value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    attrs[key] = value;
  }
  return attrs;
}

function parseHeight(resolution: string | undefined): number | undefined {
  const match = resolution?.match(/^(\d+)x(\d+)$/i);
  return match?.[2] ? Number(match[2]) : undefined;
}

/**
 * Parse an HLS master playlist into a stream manifest.
 *
 * Variant URIs are resolved against `playlistUrl`. Variants whose height is not
 * one of the known tiers are left out and listed in `unmatched`.
 */
export function parseMasterPlaylist(content: string, playlistUrl: string): ParsedPlaylist {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const variants: StreamVariant[] = [];
  const unmatched: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line?.startsWith(STREAM_INF)) continue;

    const uriLine = lines[i + 1];
    if (!uriLine || uriLine.startsWith('#')) continue;
    i++;

    const attrs = parseAttributes(line.slice(STREAM_INF.length));
    const url = new URL(uriLine, playlistUrl).toString();
    const height = parseHeight(attrs.RESOLUTION);
    const tier = height === undefined ? undefined : tierForHeight(height);

    if (!tier) {
      unmatched.push(`${attrs.RESOLUTION ?? 'no resolution'} ${url}`);
      continue;
    }

    const bandwidth = attrs.BANDWIDTH ? Number(attrs.BANDWIDTH) : undefined;
    variants.push({
      tier,
      bandwidth: bandwidth !== undefined && Number.isFinite(bandwidth) ? bandwidth : undefined,
      url,
    });
  }

  variants.sort((a, b) => QUALITY_TIERS.indexOf(a.tier) - QUALITY_TIERS.indexOf(b.tier));

  return { manifest: { sourceUrl: playlistUrl, variants }, unmatched };
}
