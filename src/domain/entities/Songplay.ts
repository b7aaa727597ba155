/**
 * Songplay — The Fact Table
 * Layer: Domain
 *
 * One row per NextSong event. songplay_id is synthetic (see
 * SongplayIdGenerator); song_id and artist_id come from the catalog join
 * and are null when the played track is not in the song dataset. year and
 * month duplicate start_time's calendar fields so the table can be
 * partitioned on them.
 */
export interface SongplayRow {
  songplay_id: number;
  start_time: Date;
  user_id: string;
  level: string | null;
  song_id: string | null;
  artist_id: string | null;
  session_id: number | null;
  location: string | null;
  user_agent: string | null;
  year: number;
  month: number;
}
