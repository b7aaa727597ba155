/**
 * Log Pipeline Transforms
 * Layer: Application (transforms)
 *
 * Everything downstream of the page filter operates on song plays only:
 *
 *   filterSongPlays  — keep raw records whose page is "NextSong". Runs on
 *                      raw JSON, before required fields are enforced.
 *   deriveUsers      — one row per user_id, first occurrence in scan order.
 *                      A user whose level changes mid-log keeps the level
 *                      of their first play; recency is not considered.
 *   deriveTime       — one row per distinct start_time.
 *   deriveSongplays  — one row per play, joined to the song catalog, with
 *                      a synthetic monotonic songplay_id.
 */
import type { LogEvent } from '@domain/entities/LogEvent';
import type { SongplayRow } from '@domain/entities/Songplay';
import type { TimeRow } from '@domain/entities/TimeSlot';
import type { UserRow } from '@domain/entities/User';
import { NEXT_SONG_PAGE } from '@shared/constants';
import { JoinMissError } from '@shared/errors/AppError';
import type { SourceRecord } from '@shared/types';
import { z } from 'zod/v4';

import { firstByKey } from './dedupe';
import type { SongCatalog } from './SongCatalog';
import { SongplayIdGenerator } from './SongplayIdGenerator';
import { decomposeStartTime, toStartTime } from './timestamp';

/** A normalized play together with the source partition it was read from. */
export interface ScannedEvent {
  event: LogEvent;
  partition: number;
}

export interface SongplayDerivation {
  rows: SongplayRow[];
  misses: JoinMissError[];
}

const songPlaySchema = z.object({ page: z.literal(NEXT_SONG_PAGE) });

export function filterSongPlays(records: readonly SourceRecord[]): SourceRecord[] {
  return records.filter((r) => songPlaySchema.safeParse(r.value).success);
}

export function deriveUsers(events: readonly LogEvent[]): UserRow[] {
  const rows = events.map(
    (e): UserRow => ({
      user_id: e.userId,
      first_name: e.firstName,
      last_name: e.lastName,
      gender: e.gender,
      level: e.level,
    }),
  );
  return firstByKey(rows, (row) => row.user_id);
}

export function deriveTime(events: readonly LogEvent[]): TimeRow[] {
  const rows = events.map((e) => decomposeStartTime(toStartTime(e.ts)));
  return firstByKey(rows, (row) => row.start_time.getTime());
}

/**
 * `scanned` must be in scan order (partitions non-decreasing); ids are
 * assigned in that order. A catalog miss leaves song_id/artist_id null and
 * is reported in `misses` instead of failing the derivation.
 */
export function deriveSongplays(
  scanned: readonly ScannedEvent[],
  catalog: SongCatalog,
): SongplayDerivation {
  const ids = new SongplayIdGenerator();
  const rows: SongplayRow[] = [];
  const misses: JoinMissError[] = [];

  for (const { event, partition } of scanned) {
    const startTime = toStartTime(event.ts);
    let songId: string | null = null;
    let artistId: string | null = null;

    try {
      const match = catalog.resolve(event.song, event.artist, event.length);
      songId = match.songId;
      artistId = match.artistId;
    } catch (err) {
      if (!(err instanceof JoinMissError)) throw err;
      misses.push(err);
    }

    rows.push({
      songplay_id: ids.next(partition),
      start_time: startTime,
      user_id: event.userId,
      level: event.level,
      song_id: songId,
      artist_id: artistId,
      session_id: event.sessionId,
      location: event.location,
      user_agent: event.userAgent,
      year: startTime.getUTCFullYear(),
      month: startTime.getUTCMonth() + 1,
    });
  }

  return { rows, misses };
}
