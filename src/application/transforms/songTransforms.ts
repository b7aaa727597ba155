/**
 * Song Pipeline Transforms
 * Layer: Application (transforms)
 *
 * Pure functions from normalized song records to the two dimensions the
 * song dataset feeds. Neither function touches I/O; SongPipeline reads,
 * calls these, and hands the results to the writer.
 *
 *   deriveSongs   — one row per song_id; duplicates are resolved by
 *                   stable-sorting on song_id and keeping the first row.
 *   deriveArtists — one row per artist_id; first occurrence in scan order.
 */
import type { ArtistRow } from '@domain/entities/Artist';
import type { SongRow } from '@domain/entities/Song';
import type { SongRecord } from '@domain/entities/SongRecord';

import { firstByKey, firstBySortedKey } from './dedupe';

export function deriveSongs(records: readonly SongRecord[]): SongRow[] {
  const rows = records.map(
    (r): SongRow => ({
      song_id: r.songId,
      title: r.title,
      artist_id: r.artistId,
      year: r.year,
      duration: r.duration,
    }),
  );
  return firstBySortedKey(rows, (row) => row.song_id);
}

export function deriveArtists(records: readonly SongRecord[]): ArtistRow[] {
  const rows = records.map(
    (r): ArtistRow => ({
      artist_id: r.artistId,
      name: r.artistName,
      location: r.artistLocation,
      latitude: r.artistLatitude,
      longitude: r.artistLongitude,
    }),
  );
  return firstByKey(rows, (row) => row.artist_id);
}
