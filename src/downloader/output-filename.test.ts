import { describe, expect, it } from 'vitest';
import type { Episode, Program } from '../types/catalog.types';
import {
  buildOutputFilename,
  episodeTitleSegment,
  outputFilenameCandidates,
  parseOutputFilename,
} from './output-filename';

function episode(id: string, title: string | undefined, firstrun: string | undefined): Episode {
  return { id, programId: '1', title, firstrun, subtitles: [] };
}

function program(episodes: Episode[], foreignTitle?: string): Program {
  return { id: '1', title: 'Foo', foreignTitle, episodes };
}

describe('buildOutputFilename', () => {
  it('should follow the canonical layout', () => {
    const pilot = episode('a', 'Pilot', '2024-01-01T20:00:00');

    expect(buildOutputFilename(program([pilot], 'Le Foo'), pilot, '720p')).toBe(
      'Foo ||| Pilot ||| Le Foo [720p].mp4',
    );
  });

  it('should write None for a missing foreign title', () => {
    const pilot = episode('a', 'Pilot', '2024-01-01T20:00:00');

    expect(buildOutputFilename(program([pilot]), pilot, '480p')).toBe('Foo ||| Pilot ||| None [480p].mp4');
  });

  it('should sanitize each segment', () => {
    const odd = episode('a', 'A/B: part 1?', '2024-01-01T20:00:00');
    const show: Program = { id: '1', title: 'Q|A', foreignTitle: 'X ||| Y', episodes: [odd] };

    expect(buildOutputFilename(show, odd, '1080p')).toBe(
      'Q%7CA ||| A%2FB%3A part 1%3F ||| X %7C%7C%7C Y [1080p].mp4',
    );
  });

  it('should be stable for the same episode and tier', () => {
    const pilot = episode('a', 'Pilot', '2024-01-01T20:00:00');
    const show = program([pilot]);

    expect(buildOutputFilename(show, pilot, '720p')).toBe(buildOutputFilename(show, { ...pilot }, '720p'));
  });

  it('should give distinct files to episodes sharing a title', () => {
    const first = episode('a', 'Fréttir', '2024-01-01T19:00:00');
    const second = episode('b', 'Fréttir', '2024-01-02T19:00:00');
    const show = program([first, second]);

    expect(buildOutputFilename(show, first, '720p')).toBe(
      'Foo ||| Fréttir 2024-01-01T19%3A00%3A00 ||| None [720p].mp4',
    );
    expect(buildOutputFilename(show, second, '720p')).toBe(
      'Foo ||| Fréttir 2024-01-02T19%3A00%3A00 ||| None [720p].mp4',
    );
  });
});

describe('outputFilenameCandidates', () => {
  it('should try the plain name, then the air time, then the episode id', () => {
    const pilot = episode('a1', 'Pilot', '2024-01-01');

    expect(outputFilenameCandidates(program([pilot]), pilot, '720p')).toEqual([
      'Foo ||| Pilot ||| None [720p].mp4',
      'Foo ||| Pilot 2024-01-01 ||| None [720p].mp4',
      'Foo ||| Pilot 2024-01-01 a1 ||| None [720p].mp4',
    ]);
  });

  it('should not repeat a name that is already qualified', () => {
    const first = episode('a', 'Fréttir', '2024-01-01');
    const second = episode('b', 'Fréttir', '2024-01-02');

    expect(outputFilenameCandidates(program([first, second]), first, '720p')).toEqual([
      'Foo ||| Fréttir 2024-01-01 ||| None [720p].mp4',
      'Foo ||| Fréttir 2024-01-01 a ||| None [720p].mp4',
    ]);
  });

  it('should mark audio-only files', () => {
    const pilot = episode('a', 'Pilot', '2024-01-01');

    expect(outputFilenameCandidates(program([pilot]), pilot, '240p', { audioOnly: true })[0]).toBe(
      'Foo ||| Pilot ||| None [240p]_audio_only.mp4',
    );
  });
});

describe('parseOutputFilename', () => {
  it('should read back a canonical name', () => {
    expect(parseOutputFilename('Q%7CA ||| A%2FB%3A part 1%3F ||| X %7C%7C%7C Y [1080p].mp4')).toEqual({
      programTitle: 'Q|A',
      episodeTitle: 'A/B: part 1?',
      foreignTitle: 'X ||| Y',
      tier: '1080p',
      audioOnly: false,
    });
  });

  it('should map None to a missing foreign title', () => {
    expect(parseOutputFilename('Foo ||| Pilot ||| None [240p]_audio_only.mp4')).toEqual({
      programTitle: 'Foo',
      episodeTitle: 'Pilot',
      foreignTitle: undefined,
      tier: '240p',
      audioOnly: true,
    });
  });

  it('should accept names carrying an episode id tag', () => {
    expect(parseOutputFilename('Foo ||| Þáttur 2 af 6 ||| The Foo II [720p] [5a1b2c].mp4')).toMatchObject({
      episodeTitle: 'Þáttur 2 af 6',
      foreignTitle: 'The Foo II',
      tier: '720p',
    });
  });

  it('should reject other files', () => {
    expect(parseOutputFilename('holiday.mp4')).toBeUndefined();
    expect(parseOutputFilename('Foo ||| Pilot ||| None [720p].mkv')).toBeUndefined();
  });
});

describe('episodeTitleSegment', () => {
  it('should use the program title and air time for untitled episodes', () => {
    const untitled = episode('a', undefined, '2024-01-01T19:00:00');

    expect(episodeTitleSegment(program([untitled]), untitled)).toBe('Foo 2024-01-01T19:00:00');
  });

  it('should fall back to the episode id without an air time', () => {
    const bare = episode('x1', '  ', undefined);

    expect(episodeTitleSegment(program([bare]), bare)).toBe('Foo x1');
  });
});
