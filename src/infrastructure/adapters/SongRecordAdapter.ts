/**
 * Song Record Adapter — song metadata JSON → SongRecord
 * Layer: Infrastructure (adapters)
 * Pattern: Adapter Pattern (implements IDataSourceAdapter<SongRecord>)
 *
 * The raw song files use snake_case keys and repeat the artist's
 * attributes on every song. Only `song_id` and `artist_id` are required;
 * the pipeline fails fast with a StructuralError if either is absent or
 * empty. Extra keys (e.g. `num_songs`) are ignored.
 */
import type { SongRecord } from '@domain/entities/SongRecord';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import type { SourceRecord } from '@shared/types';
import { injectable } from 'tsyringe';
import { z } from 'zod/v4';

import { nullableNumber, nullableText, parseOrThrow, requiredId } from './schemaFields';

export const rawSongRecordSchema = z.object({
  song_id: requiredId,
  artist_id: requiredId,
  title: nullableText,
  artist_name: nullableText,
  artist_location: nullableText,
  artist_latitude: nullableNumber,
  artist_longitude: nullableNumber,
  year: nullableNumber,
  duration: nullableNumber,
});

@injectable()
export class SongRecordAdapter implements IDataSourceAdapter<SongRecord> {
  normalize(raw: SourceRecord): SongRecord {
    const r = parseOrThrow(rawSongRecordSchema, raw, 'song');
    return {
      songId: r.song_id,
      title: r.title,
      artistId: r.artist_id,
      artistName: r.artist_name,
      artistLocation: r.artist_location,
      artistLatitude: r.artist_latitude,
      artistLongitude: r.artist_longitude,
      year: r.year,
      duration: r.duration,
    };
  }
}
