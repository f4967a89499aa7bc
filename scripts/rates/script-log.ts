/**
 * Shared helpers for the rates scripts: JSON line logging and
 * validated configuration loading.
 */

import { loadRatesConfig, validateRatesConfig } from '../../config/rates.config.js';
import type { RatesConfig } from '../../src/index.js';

interface LogEntry {
  timestamp: string;
  level: 'INFO' | 'WARN' | 'ERROR';
  event: string;
  message?: string;
  [key: string]: unknown;
}

export function log(level: LogEntry['level'], event: string, data: Record<string, unknown> = {}): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    event,
    _service: 'rates-hub',
    _app: 'rates',
    _env: process.env.NODE_ENV || 'development',
    ...data,
  };
  console.log(JSON.stringify(entry));
}

/**
 * Load configuration from the environment, exiting on invalid settings
 */
export function loadConfigOrExit(): RatesConfig {
  const config = loadRatesConfig();
  const issues = validateRatesConfig(config);
  if (issues.length > 0) {
    log('ERROR', 'config_error', { message: 'Invalid rates configuration', issues });
    process.exit(1);
  }
  return config;
}

export function logFatal(error: unknown): never {
  log('ERROR', 'fatal_error', {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
}
