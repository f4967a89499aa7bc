#!/usr/bin/env npx tsx
/**
 * Look up a single rate
 *
 * Usage:
 *   npx tsx scripts/rates/get-rate.ts FROM TO
 *
 * Refreshes first when the snapshot is missing or stale.
 */

import { RatesService } from '../../src/index.js';
import { loadConfigOrExit, log, logFatal } from './script-log.js';

async function main(): Promise<void> {
  const [from, to] = process.argv.slice(2);
  if (!from || !to) {
    log('ERROR', 'usage', { message: 'Usage: get-rate.ts FROM TO' });
    process.exit(1);
  }

  const config = loadConfigOrExit();
  const service = new RatesService(config);
  await service.initialize();

  try {
    const result = await service.getRate(from, to);
    if (!result.ok) {
      log('ERROR', 'rate_unavailable', {
        from,
        to,
        errorCode: result.error.code,
        message: result.error.message,
      });
      process.exitCode = 1;
      return;
    }
    log('INFO', 'rate', { ...result.value });
  } finally {
    await service.close();
  }
}

main().catch(logFatal);
