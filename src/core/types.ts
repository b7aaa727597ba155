/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * In our DI system (tsyringe), every injectable dependency needs a unique
 * identifier so the container knows "when someone asks for X, give them Y."
 *
 * Think of these tokens as **name badges at a conference**. When the
 * SongPipeline says "I need the TableWriter", it holds up the
 * TOKENS.TableWriter badge, and the container matches it to the registered
 * implementation (ParquetTableWriter).
 *
 * They are grouped by architectural layer so you can scan which dependencies
 * exist at each level. Register a new token here before wiring it in
 * container.ts.
 */
export const TOKENS = {
  // Infrastructure — low-level tools the run needs to function
  Config: Symbol.for('Config'),
  Logger: Symbol.for('Logger'),

  // Storage — the two collaborators around the transformation core
  RecordReader: Symbol.for('RecordReader'),
  TableWriter: Symbol.for('TableWriter'),

  // Adapters — raw JSON → typed record bridges
  SongRecordAdapter: Symbol.for('SongRecordAdapter'),
  LogEventAdapter: Symbol.for('LogEventAdapter'),

  // Pipelines and services — application-level orchestrators
  SongPipeline: Symbol.for('SongPipeline'),
  LogPipeline: Symbol.for('LogPipeline'),
  WarehouseService: Symbol.for('WarehouseService'),
} as const;
