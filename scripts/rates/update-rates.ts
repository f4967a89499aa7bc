#!/usr/bin/env npx tsx
/**
 * One-off rates refresh
 *
 * Usage:
 *   npx tsx scripts/rates/update-rates.ts [source...]
 *
 * Without arguments every enabled source is refreshed. Exits 1 when the
 * run failed entirely.
 */

import { RatesService } from '../../src/index.js';
import { loadConfigOrExit, log, logFatal } from './script-log.js';

async function main(): Promise<void> {
  const sources = process.argv.slice(2);
  const config = loadConfigOrExit();

  const service = new RatesService(config);
  await service.initialize();

  try {
    const result = await service.runUpdate(sources.length > 0 ? sources : undefined);
    log(result.status === 'failed' ? 'ERROR' : 'INFO', 'update_result', {
      status: result.status,
      totalRates: result.totalRates,
      successfulSources: result.successfulSources,
      failedSources: result.failedSources,
      lastRefresh: result.lastRefresh,
    });
    process.exitCode = result.status === 'failed' ? 1 : 0;
  } finally {
    await service.close();
  }
}

main().catch(logFatal);
