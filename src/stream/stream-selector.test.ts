import { describe, expect, it } from 'vitest';
import { NoStreamAvailableError } from '../errors/custom-errors';
import type { QualityTier } from '../types/quality-tier';
import type { StreamManifest } from '../types/stream.types';
import { availableTiers, fallbackOrder, selectAudioStream, selectStream } from './stream-selector';

function manifestOf(...tiers: QualityTier[]): StreamManifest {
  return {
    sourceUrl: 'https://cdn.example.test/master.m3u8',
    variants: tiers.map((tier) => ({ tier, url: `https://cdn.example.test/${tier}.m3u8` })),
  };
}

describe('fallbackOrder', () => {
  it('should try lower tiers before higher ones', () => {
    expect(fallbackOrder('720p')).toEqual(['720p', '480p', '360p', '240p', '1080p']);
    expect(fallbackOrder('360p')).toEqual(['360p', '240p', '480p', '720p', '1080p']);
  });

  it('should walk only upward from the lowest tier', () => {
    expect(fallbackOrder('240p')).toEqual(['240p', '360p', '480p', '720p', '1080p']);
  });
});

describe('selectStream', () => {
  it('should return an exact match without the fallback flag', () => {
    const selection = selectStream(manifestOf('1080p', '720p', '480p'), '720p', 'ep1');

    expect(selection).toEqual({
      requested: '720p',
      tier: '720p',
      url: 'https://cdn.example.test/720p.m3u8',
      fallback: false,
    });
  });

  it('should fall back to the nearest lower tier', () => {
    const selection = selectStream(manifestOf('1080p', '480p', '240p'), '720p', 'ep1');

    expect(selection.tier).toBe('480p');
    expect(selection.fallback).toBe(true);
  });

  it('should fall back to the nearest higher tier when nothing lower exists', () => {
    const selection = selectStream(manifestOf('1080p', '720p'), '360p', 'ep1');

    expect(selection.tier).toBe('720p');
    expect(selection.requested).toBe('360p');
    expect(selection.fallback).toBe(true);
  });

  it('should prefer the highest bandwidth among variants of one tier', () => {
    const manifest: StreamManifest = {
      sourceUrl: 'https://cdn.example.test/master.m3u8',
      variants: [
        { tier: '720p', bandwidth: 2_000_000, url: 'https://cdn.example.test/low.m3u8' },
        { tier: '720p', bandwidth: 3_500_000, url: 'https://cdn.example.test/high.m3u8' },
        { tier: '720p', url: 'https://cdn.example.test/unknown.m3u8' },
      ],
    };

    expect(selectStream(manifest, '720p', 'ep1').url).toBe('https://cdn.example.test/high.m3u8');
  });

  it('should throw NoStreamAvailableError for an empty manifest', () => {
    expect(() => selectStream(manifestOf(), '1080p', 'ep7')).toThrow(NoStreamAvailableError);
  });
});

describe('availableTiers', () => {
  it('should list distinct tiers best first', () => {
    expect(availableTiers(manifestOf('240p', '720p', '240p', '1080p'))).toEqual(['1080p', '720p', '240p']);
  });
});

describe('selectAudioStream', () => {
  it('should pick the lowest bandwidth', () => {
    const manifest: StreamManifest = {
      sourceUrl: 'https://cdn.example.test/master.m3u8',
      variants: [
        { tier: '1080p', bandwidth: 5_000_000, url: 'https://cdn.example.test/1080p.m3u8' },
        { tier: '360p', bandwidth: 800_000, url: 'https://cdn.example.test/360p.m3u8' },
        { tier: '480p', bandwidth: 1_200_000, url: 'https://cdn.example.test/480p.m3u8' },
      ],
    };

    expect(selectAudioStream(manifest, 'ep1')).toEqual({
      requested: '360p',
      tier: '360p',
      url: 'https://cdn.example.test/360p.m3u8',
      fallback: false,
    });
  });

  it('should fall back to the lowest tier without bandwidths', () => {
    expect(selectAudioStream(manifestOf('1080p', '240p', '720p'), 'ep1').tier).toBe('240p');
  });

  it('should throw when there is nothing to choose from', () => {
    expect(() => selectAudioStream(manifestOf(), 'ep9')).toThrow(NoStreamAvailableError);
  });
});
