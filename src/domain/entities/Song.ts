/** Row of the `songs` dimension, keyed by song_id. */
export interface SongRow {
  song_id: string;
  title: string | null;
  artist_id: string;
  year: number | null;
  duration: number | null;
}
