/**
 * Unit Tests — SongRecordAdapter
 *
 * I verify the adapter maps raw snake_case song JSON onto SongRecord,
 * normalizes missing optional attributes to null, and fails fast with a
 * StructuralError when song_id or artist_id is absent.
 */
import { SongRecordAdapter } from '@infrastructure/adapters/SongRecordAdapter';
import { StructuralError } from '@shared/errors/AppError';

import { asSource, rawGlassSong, rawHarborSong } from '../helpers/fixtures';

describe('SongRecordAdapter', () => {
  let adapter: SongRecordAdapter;

  beforeEach(() => {
    adapter = new SongRecordAdapter();
  });

  describe('normalize() — well-formed records', () => {
    it('should map every raw field onto the SongRecord', () => {
      expect(adapter.normalize(asSource(rawHarborSong))).toEqual({
        songId: 'SOLANTERN1',
        title: 'Paper Lanterns',
        artistId: 'ARHARBOR01',
        artistName: 'The Quiet Harbors',
        artistLocation: 'Halifax, NS',
        artistLatitude: 44.5,
        artistLongitude: -63.6,
        year: 2009,
        duration: 201.5,
      });
    });

    it('should keep empty strings and nulls as they are', () => {
      const result = adapter.normalize(asSource(rawGlassSong));

      expect(result.artistLocation).toBe('');
      expect(result.artistLatitude).toBeNull();
      expect(result.year).toBe(0);
    });

    it('should turn missing optional keys into null', () => {
      const result = adapter.normalize(asSource({ song_id: 'SO1', artist_id: 'AR1' }));

      expect(result).toEqual({
        songId: 'SO1',
        title: null,
        artistId: 'AR1',
        artistName: null,
        artistLocation: null,
        artistLatitude: null,
        artistLongitude: null,
        year: null,
        duration: null,
      });
    });
  });

  describe('normalize() — structural failures', () => {
    it('should throw StructuralError when song_id is missing', () => {
      const { song_id: _omitted, ...noSongId } = rawHarborSong;

      expect(() => adapter.normalize(asSource(noSongId, 0, 0, 'song_data/A/A/A/x.json'))).toThrow(
        StructuralError,
      );
    });

    it('should throw StructuralError when artist_id is empty', () => {
      expect(() => adapter.normalize(asSource({ ...rawHarborSong, artist_id: '  ' }))).toThrow(
        'artist_id: must be a non-empty string',
      );
    });

    it('should name the source file and offset in the message', () => {
      expect(() => adapter.normalize(asSource({ artist_id: 'AR1' }, 3, 0, 'song_data/A/B/C/t.json'))).toThrow(
        '(song_data/A/B/C/t.json#0)',
      );
    });

    it('should reject a value that is not an object', () => {
      expect(() => adapter.normalize(asSource([1, 2, 3]))).toThrow(StructuralError);
    });
  });
});
