/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * Pino writes one JSON object per log line, so a finished ETL run leaves a
 * machine-parseable trail: which pipeline ran, how many rows each table got,
 * how many plays failed to resolve against the song catalog.
 *
 * In development, raw JSON is hard to read, so we pipe it through `pino-pretty`
 * which adds colors, readable timestamps, and strips noisy fields like pid.
 *
 * The exported `Logger` type lets pipelines declare "I need a logger" without
 * coupling to Pino directly — tests hand them `pino({ level: 'silent' })`.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
