/**
 * Song Record — One Entry of the Song Metadata Dataset
 * Layer: Domain
 *
 * Each song metadata file holds a single JSON object describing one track
 * and the artist who recorded it. That shape is denormalized on purpose
 * (artist attributes repeat on every song by the same artist); the Song
 * Pipeline splits it into the `songs` and `artists` dimensions.
 *
 * Only songId and artistId are guaranteed — they are the natural keys of
 * the two tables. Everything else may be missing in the raw data and is
 * carried as null.
 */
export interface SongRecord {
  songId: string;
  title: string | null;
  artistId: string;
  artistName: string | null;
  artistLocation: string | null;
  artistLatitude: number | null;
  artistLongitude: number | null;
  year: number | null;
  duration: number | null;
}
