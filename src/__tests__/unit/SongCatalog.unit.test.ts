/**
 * Unit Tests — SongCatalog
 *
 * The catalog resolves (title, artist name, duration) to song/artist ids
 * by exact match; anything else throws JoinMissError.
 */
import { SongCatalog } from '@application/transforms/SongCatalog';
import type { ArtistRow } from '@domain/entities/Artist';
import type { SongRow } from '@domain/entities/Song';
import { JoinMissError } from '@shared/errors/AppError';

const songs: SongRow[] = [
  { song_id: 'SOA', title: 'Paper Lanterns', artist_id: 'AR1', year: 2009, duration: 201.5 },
  { song_id: 'SOB', title: 'Paper Lanterns', artist_id: 'AR1', year: 2010, duration: 201.5 },
  { song_id: 'SOC', title: 'Copper Sky', artist_id: 'AR2', year: null, duration: null },
  { song_id: 'SOD', title: null, artist_id: 'AR1', year: 2001, duration: 100 },
];

const artists: ArtistRow[] = [
  { artist_id: 'AR1', name: 'The Quiet Harbors', location: null, latitude: null, longitude: null },
  { artist_id: 'AR2', name: 'Glass Orchard', location: null, latitude: null, longitude: null },
];

describe('SongCatalog', () => {
  let catalog: SongCatalog;

  beforeEach(() => {
    catalog = new SongCatalog(songs, artists);
  });

  it('should resolve an exact (title, artist, duration) match', () => {
    expect(catalog.resolve('Paper Lanterns', 'The Quiet Harbors', 201.5)).toEqual({
      songId: 'SOA',
      artistId: 'AR1',
    });
  });

  it('should keep the first song in table order when two share a triple', () => {
    expect(catalog.resolve('Paper Lanterns', 'The Quiet Harbors', 201.5).songId).toBe('SOA');
  });

  it('should match a null duration only against a null duration', () => {
    expect(catalog.resolve('Copper Sky', 'Glass Orchard', null).songId).toBe('SOC');
    expect(() => catalog.resolve('Copper Sky', 'Glass Orchard', 245.25)).toThrow(JoinMissError);
  });

  it('should throw JoinMissError when the duration differs', () => {
    expect(() => catalog.resolve('Paper Lanterns', 'The Quiet Harbors', 201.4)).toThrow(
      JoinMissError,
    );
  });

  it('should be case-sensitive on title and artist', () => {
    expect(() => catalog.resolve('paper lanterns', 'The Quiet Harbors', 201.5)).toThrow(
      JoinMissError,
    );
  });

  it('should never match when the event has no title or artist', () => {
    expect(() => catalog.resolve(null, 'The Quiet Harbors', 100)).toThrow(JoinMissError);
    expect(() => catalog.resolve('Paper Lanterns', null, 201.5)).toThrow(JoinMissError);
  });

  it('should skip songs without a title or a known artist', () => {
    const orphan: SongRow = { song_id: 'SOX', title: 'Lost', artist_id: 'AR9', year: 2000, duration: 1 };
    const withOrphan = new SongCatalog([...songs, orphan], artists);

    // SOA/SOB share one key, SOC has its own, SOD has no title, SOX has no artist row
    expect(withOrphan.size).toBe(2);
  });

  it('should report the unmatched triple on the error', () => {
    try {
      catalog.resolve('Unlisted Track', 'Nobody In Particular', 99.9);
      throw new Error('expected a JoinMissError');
    } catch (err) {
      expect(err).toBeInstanceOf(JoinMissError);
      if (err instanceof JoinMissError) {
        expect(err.title).toBe('Unlisted Track');
        expect(err.artist).toBe('Nobody In Particular');
        expect(err.length).toBe(99.9);
      }
    }
  });
});
