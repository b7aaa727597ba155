/**
 * ETL Run Script — Single Warehouse Build
 * Layer: Entry Point (CLI)
 *
 * I'm the only way a run starts: `npm run etl`. No flags — every location
 * and tuning knob comes from the environment through src/core/config.ts. I
 * resolve the WarehouseService from the container, run the Song Pipeline and
 * then the Log Pipeline once, and print a per-table summary. Exit code 0
 * means all five tables were written; anything else exits 1 after logging
 * the error.
 */
import 'reflect-metadata';

import { config } from '@core/config';
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { WarehouseService } from '@application/services/WarehouseService';
import { AppError } from '@shared/errors/AppError';

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString();
}

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;

  log('');
  log('╔══════════════════════════════════════════════════╗');
  log('║          Songplay Warehouse — ETL Run            ║');
  log('╚══════════════════════════════════════════════════╝');
  log('');
  log(`  Input:      ${config.input.rootDir}`);
  log(`  Songs:      ${config.input.songPattern}`);
  log(`  Logs:       ${config.input.logPattern}`);
  log(`  Output:     ${config.output.rootDir}`);
  log('');

  const service = container.resolve<WarehouseService>(TOKENS.WarehouseService);
  const result = await service.run();

  log('  ✓ Warehouse build complete');
  log(`    songs:          ${formatNumber(result.songs.songs)}`);
  log(`    artists:        ${formatNumber(result.songs.artists)}`);
  log(`    users:          ${formatNumber(result.logs.users)}`);
  log(`    time:           ${formatNumber(result.logs.time)}`);
  log(
    `    songplays:      ${formatNumber(result.logs.songplays)} (${formatNumber(result.logs.unresolvedSongplays)} unmatched)`,
  );
  log(`    Duration:       ${formatDuration(result.durationMs)}`);
  log('');
}

main().catch((err: unknown) => {
  if (err instanceof AppError) {
    logger.error({ err, code: err.code }, 'ETL run failed');
  } else {
    logger.fatal({ err }, 'ETL run crashed');
  }
  process.exitCode = 1;
});
