/**
 * Log Event — One Line of the Application Usage Log
 * Layer: Domain
 *
 * The app logs every page a listener touches: Home, Login, Settings,
 * NextSong and so on. Only NextSong events are song plays, and only those
 * are guaranteed to carry a user and a timestamp — a logged-out "Home" hit
 * has an empty userId. That is why the Log Pipeline filters on `page`
 * BEFORE the LogEventAdapter enforces required fields.
 *
 * `song`, `artist` and `length` are copies of the track that played; they
 * are the only link back to the song catalog (the log never carries
 * song_id or artist_id).
 */
export interface LogEvent {
  userId: string;
  firstName: string | null;
  lastName: string | null;
  gender: string | null;
  level: string | null;
  /** Milliseconds since the Unix epoch. */
  ts: number;
  sessionId: number | null;
  page: string;
  location: string | null;
  userAgent: string | null;
  song: string | null;
  artist: string | null;
  /** Duration of the played track, in seconds. */
  length: number | null;
}
