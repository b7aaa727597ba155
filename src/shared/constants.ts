import type { ColumnOf, TableName } from './types';

/** Log `page` value that marks a song play. */
export const NEXT_SONG_PAGE = 'NextSong';

/** Directory name used for a null partition value (Hive convention). */
export const HIVE_DEFAULT_PARTITION = '__HIVE_DEFAULT_PARTITION__';

/** Empty marker written once a table has been fully persisted. */
export const SUCCESS_MARKER = '_SUCCESS';

/** Where each table lands under the output root, and how it is partitioned. */
export const TABLE_LAYOUT: { [N in TableName]: { path: string; partitionBy: readonly ColumnOf<N>[] } } = {
  songs: { path: 'songs.parquet', partitionBy: ['year', 'artist_id'] },
  artists: { path: 'artists.parquet', partitionBy: [] },
  users: { path: 'users.parquet', partitionBy: [] },
  time: { path: 'time.parquet', partitionBy: ['year', 'month'] },
  songplays: { path: 'songplays.parquet', partitionBy: ['year', 'month'] },
};
