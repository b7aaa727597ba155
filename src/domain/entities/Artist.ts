/** Row of the `artists` dimension, keyed by artist_id. */
export interface ArtistRow {
  artist_id: string;
  name: string | null;
  location: string | null;
  latitude: number | null;
  longitude: number | null;
}
