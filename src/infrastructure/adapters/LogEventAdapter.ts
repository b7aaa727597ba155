/**
 * Log Event Adapter — usage log JSON → LogEvent
 * Layer: Infrastructure (adapters)
 * Pattern: Adapter Pattern (implements IDataSourceAdapter<LogEvent>)
 *
 * Only ever called on records that already passed the NextSong filter, so
 * `userId` and `ts` are required here even though other page types may
 * legitimately lack them. The log writes userId as a string ("39"), but a
 * numeric id is accepted and stringified so the users table keys stay one
 * type.
 */
import type { LogEvent } from '@domain/entities/LogEvent';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import type { SourceRecord } from '@shared/types';
import { injectable } from 'tsyringe';
import { z } from 'zod/v4';

import { nullableInteger, nullableNumber, nullableText, parseOrThrow, requiredId } from './schemaFields';

export const rawLogEventSchema = z.object({
  userId: z.union([z.string(), z.number().int()]).transform(String).pipe(requiredId),
  ts: z.number().int().nonnegative(),
  page: z.string(),
  firstName: nullableText,
  lastName: nullableText,
  gender: nullableText,
  level: nullableText,
  sessionId: nullableInteger,
  location: nullableText,
  userAgent: nullableText,
  song: nullableText,
  artist: nullableText,
  length: nullableNumber,
});

@injectable()
export class LogEventAdapter implements IDataSourceAdapter<LogEvent> {
  normalize(raw: SourceRecord): LogEvent {
    return parseOrThrow(rawLogEventSchema, raw, 'log');
  }
}
