/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * I keep shared raw records here so tests don't repeat the same JSON in
 * every file. raw* = a JSON value exactly as it would sit in a source file;
 * `asSource()` wraps one the way the reader does. Ids, titles and names are
 * invented. 1541990258796 ms is 2018-11-12T02:37:38.796Z.
 */
import type { SourceRecord } from '@shared/types';

export const PLAY_TS = 1541990258796;
export const PLAY_START_TIME = new Date('2018-11-12T02:37:38.000Z');

export function asSource(value: unknown, partition = 0, offset = 0, file = 'memory.json'): SourceRecord {
  return { value, partition, offset, file };
}

/** Song by an artist with full location data. */
export const rawHarborSong = {
  num_songs: 1,
  artist_id: 'ARHARBOR01',
  artist_latitude: 44.5,
  artist_longitude: -63.6,
  artist_location: 'Halifax, NS',
  artist_name: 'The Quiet Harbors',
  song_id: 'SOLANTERN1',
  title: 'Paper Lanterns',
  duration: 201.5,
  year: 2009,
};

/** Second song by the same artist, different location text. */
export const rawHarborSongTwo = {
  num_songs: 1,
  artist_id: 'ARHARBOR01',
  artist_latitude: null,
  artist_longitude: null,
  artist_location: 'Nova Scotia',
  artist_name: 'The Quiet Harbors',
  song_id: 'SOTIDEPOOL',
  title: 'Tide Pool',
  duration: 180,
  year: 2011,
};

/** Song with unknown year and no coordinates. */
export const rawGlassSong = {
  num_songs: 1,
  artist_id: 'ARGLASS002',
  artist_latitude: null,
  artist_longitude: null,
  artist_location: '',
  artist_name: 'Glass Orchard',
  song_id: 'SOCOPPERSK',
  title: 'Copper Sky',
  duration: 245.25,
  year: 0,
};

/** A NextSong event that matches rawHarborSong in the catalog. */
export const rawLanternPlay = {
  artist: 'The Quiet Harbors',
  auth: 'Logged In',
  firstName: 'Mara',
  gender: 'F',
  itemInSession: 3,
  lastName: 'Quill',
  length: 201.5,
  level: 'free',
  location: 'Springfield, IL',
  method: 'PUT',
  page: 'NextSong',
  registration: 1540000000000,
  sessionId: 77,
  song: 'Paper Lanterns',
  status: 200,
  ts: PLAY_TS,
  userAgent: 'TestAgent/1.0',
  userId: '12',
};

/** A NextSong event for a track that is not in the catalog. */
export const rawUnknownPlay = {
  ...rawLanternPlay,
  artist: 'Nobody In Particular',
  song: 'Unlisted Track',
  length: 99.9,
  ts: PLAY_TS + 60_000,
};

/** A logged-out Home page hit: no user, must never reach any table. */
export const rawHomeHit = {
  artist: null,
  auth: 'Logged Out',
  firstName: null,
  gender: null,
  itemInSession: 0,
  lastName: null,
  length: null,
  level: 'free',
  location: null,
  method: 'GET',
  page: 'Home',
  registration: null,
  sessionId: 78,
  song: null,
  status: 200,
  ts: PLAY_TS + 120_000,
  userAgent: null,
  userId: '',
};
