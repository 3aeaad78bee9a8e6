import { describe, it, expect, vi, beforeEach } from 'vitest';
import { enrichReleases } from '../enrichment';
import type { LookupPoster, LookupRating, ReleaseRecord } from '../types';

const release: ReleaseRecord = {
  title: 'Jay Kelly',
  date: '2025-12-05',
  platform: 'Netflix',
  synopsis: '',
  kind: 'streaming',
};

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

describe('enrichReleases', () => {
  it('attaches rating, rating url and poster', async () => {
    const lookupRating = vi.fn<LookupRating>().mockResolvedValue({
      url: 'https://letterboxd.com/film/jay-kelly/',
      rating: 3.6,
      poster: 'https://letterboxd.example/jay-kelly.jpg',
    });
    const lookupPoster = vi.fn<LookupPoster>().mockResolvedValue('https://image.tmdb.org/t/p/w154/jk.jpg');

    const [enriched] = await enrichReleases([release], { lookupRating, lookupPoster });

    expect(lookupRating).toHaveBeenCalledWith('Jay Kelly', '2025');
    expect(lookupPoster).toHaveBeenCalledWith('Jay Kelly', '2025');
    expect(enriched).toEqual({
      ...release,
      rating: 3.6,
      ratingUrl: 'https://letterboxd.com/film/jay-kelly/',
      poster: 'https://image.tmdb.org/t/p/w154/jk.jpg',
    });
  });

  it('leaves fields empty when lookups find nothing', async () => {
    const [enriched] = await enrichReleases([release], {
      lookupRating: vi.fn<LookupRating>().mockResolvedValue(null),
      lookupPoster: vi.fn<LookupPoster>().mockResolvedValue(null),
    });

    expect(enriched).toEqual({ ...release, rating: null, ratingUrl: null, poster: null });
  });

  it('keeps the release when a lookup throws', async () => {
    const releases = await enrichReleases([release, { ...release, title: 'Second Film' }], {
      lookupRating: vi.fn<LookupRating>().mockRejectedValueOnce(new Error('timeout')).mockResolvedValue(null),
      lookupPoster: vi.fn<LookupPoster>().mockRejectedValue(new Error('TMDB API error: 401')),
    });

    expect(releases.map((r) => [r.title, r.rating, r.poster])).toEqual([
      ['Jay Kelly', null, null],
      ['Second Film', null, null],
    ]);
  });

  it('keeps an existing poster when no poster lookup is given', async () => {
    const theatrical: ReleaseRecord = {
      ...release,
      kind: 'theatrical',
      platform: 'Limited',
      poster: 'https://image.tmdb.org/t/p/w154/existing.jpg',
    };

    const [enriched] = await enrichReleases([theatrical], {
      lookupRating: vi.fn<LookupRating>().mockResolvedValue({ url: 'u', rating: 4.1, poster: null }),
    });

    expect(enriched.poster).toBe('https://image.tmdb.org/t/p/w154/existing.jpg');
    expect(enriched.rating).toBe(4.1);
  });
});
