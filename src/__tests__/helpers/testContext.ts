import pino from 'pino';

import type { Logger } from '@core/logger';

/** Pino logger that drops everything; pipelines still call every log method. */
export const silentLogger: Logger = pino({ level: 'silent' });

/** The slice of AppConfig the pipelines and writer read. */
export const testEtlSettings = {
  etl: { rowGroupSize: 2, progressInterval: 2 },
};
