/**
 * Row of the `users` dimension, keyed by user_id.
 *
 * `level` (free/paid) is a snapshot: a user who upgrades mid-log keeps
 * whichever level the first NextSong event in scan order carried.
 */
export interface UserRow {
  user_id: string;
  first_name: string | null;
  last_name: string | null;
  gender: string | null;
  level: string | null;
}
