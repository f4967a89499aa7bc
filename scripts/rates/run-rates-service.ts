#!/usr/bin/env npx tsx
/**
 * Rates Service Runner
 *
 * Long-running process that refreshes rates on the configured interval
 * until SIGINT/SIGTERM.
 *
 * Usage:
 *   npx tsx scripts/rates/run-rates-service.ts
 *
 * Environment Variables:
 *   EXCHANGERATE_API_KEY - ExchangeRate-API key (fiat source reports unavailable without it)
 *   RATES_UPDATE_INTERVAL_MINUTES - Refresh interval (default: 30)
 *   RATES_ENABLED_SOURCES - Comma-separated sources (default: exchangerate,coingecko)
 *   See config/rates.config.ts for the full list.
 */

import { RatesService } from '../../src/index.js';
import { loadConfigOrExit, log, logFatal } from './script-log.js';

async function main(): Promise<void> {
  log('INFO', 'startup', { message: 'Rates service starting...' });

  const config = loadConfigOrExit();
  log('INFO', 'config_loaded', {
    enabledSources: config.enabledSources,
    baseCurrency: config.baseCurrency,
    updateIntervalMs: config.updateIntervalMs,
    cacheTtlMs: config.cacheTtlMs,
    journalPath: config.journalPath,
    snapshotPath: config.snapshotPath,
    apiKeyConfigured: config.exchangeRateApiKey.length > 0,
  });

  if (config.enabledSources.includes('exchangerate') && !config.exchangeRateApiKey) {
    log('WARN', 'api_key_missing', {
      message: 'EXCHANGERATE_API_KEY is not set; fiat rates will be reported unavailable',
    });
  }

  const service = new RatesService(config);
  await service.initialize();
  service.startScheduler();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log('INFO', 'shutdown_initiated', { signal });

    await service.close();
    log('INFO', 'shutdown_complete', { message: 'Shutdown complete' });
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(logFatal);
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(logFatal);
  });

  log('INFO', 'running', { message: 'Rates service is running. Press Ctrl+C to stop.' });
}

main().catch(logFatal);
