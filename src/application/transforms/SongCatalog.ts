/**
 * Song Catalog — Natural-Key Lookup for the Songplay Join
 * Layer: Application (transforms)
 *
 * A log event only knows the title, artist name and length of the track
 * that played. The catalog indexes the finished `songs` and `artists`
 * dimensions by exactly that triple so the Log Pipeline can recover
 * song_id and artist_id.
 *
 * Matching is exact: same title string, same artist name string, same
 * duration number. A song or event without a title or artist name can
 * never match. Anything else is a JoinMissError, which the caller turns
 * into null keys on that one row. When two songs share a triple, the one
 * that comes first in the `songs` table (sorted by song_id) wins.
 */
import type { ArtistRow } from '@domain/entities/Artist';
import type { SongRow } from '@domain/entities/Song';
import { JoinMissError } from '@shared/errors/AppError';

export interface SongMatch {
  songId: string;
  artistId: string;
}

export class SongCatalog {
  private readonly index = new Map<string, SongMatch>();

  constructor(songs: readonly SongRow[], artists: readonly ArtistRow[]) {
    const artistNames = new Map(artists.map((a) => [a.artist_id, a.name]));
    for (const song of songs) {
      const artistName = artistNames.get(song.artist_id) ?? null;
      if (song.title === null || artistName === null) continue;
      const key = catalogKey(song.title, artistName, song.duration);
      if (!this.index.has(key)) {
        this.index.set(key, { songId: song.song_id, artistId: song.artist_id });
      }
    }
  }

  get size(): number {
    return this.index.size;
  }

  /** Throws JoinMissError when the triple is not in the catalog. */
  resolve(title: string | null, artist: string | null, length: number | null): SongMatch {
    const match =
      title === null || artist === null ? undefined : this.index.get(catalogKey(title, artist, length));
    if (!match) throw new JoinMissError(title, artist, length);
    return match;
  }
}

function catalogKey(title: string, artist: string, duration: number | null): string {
  return JSON.stringify([title, artist, duration]);
}
