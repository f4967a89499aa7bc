/**
 * Tests for RatesLogger
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  RatesLogger,
  createRatesLogger,
  createSilentLogger,
  LogEvents,
  type IRatesLogger,
  type LogEntry,
} from './rates-logger.js';

function loggedEntries(): LogEntry[] {
  return vi.mocked(console.log).mock.calls.map((call) => JSON.parse(String(call[0])));
}

function rawLines(): string[] {
  return vi.mocked(console.log).mock.calls.map((call) => String(call[0]));
}

describe('RatesLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should be enabled by default', () => {
      const logger = new RatesLogger({ component: 'aggregator' });
      expect(logger.isEnabled()).toBe(true);
    });

    it('should use default service metadata', () => {
      const logger = new RatesLogger({ component: 'aggregator' });
      logger.info(LogEvents.RATES_UPDATE_STARTED);

      const [entry] = loggedEntries();
      expect(entry._service).toBe('rates-hub');
      expect(entry._app).toBe('rates');
    });
  });

  describe('levels', () => {
    it('should log INFO with the base structure', () => {
      const logger = new RatesLogger({ component: 'aggregator' });
      logger.info(LogEvents.RATES_UPDATE_COMPLETED, { rateCount: 14, status: 'success' });

      const [entry] = loggedEntries();
      expect(entry.level).toBe('INFO');
      expect(entry.component).toBe('aggregator');
      expect(entry.event).toBe('rates_update_completed');
      expect(entry.rateCount).toBe(14);
      expect(entry.status).toBe('success');
      expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });

    it('should log WARN', () => {
      const logger = new RatesLogger({ component: 'http' });
      logger.warn(LogEvents.SOURCE_REQUEST_RETRY, { source: 'coingecko', attempt: 1, delayMs: 1000 });

      const [entry] = loggedEntries();
      expect(entry.level).toBe('WARN');
      expect(entry.event).toBe('source_request_retry');
      expect(entry.delayMs).toBe(1000);
    });

    it('should log ERROR', () => {
      const logger = new RatesLogger({ component: 'store' });
      logger.error(LogEvents.PERSISTENCE_ERROR, { error: 'EACCES', errorCode: 'PERSISTENCE_ERROR' });

      const [entry] = loggedEntries();
      expect(entry.level).toBe('ERROR');
      expect(entry.error).toBe('EACCES');
      expect(entry.errorCode).toBe('PERSISTENCE_ERROR');
    });
  });

  describe('disabled logging', () => {
    it('should not log when disabled', () => {
      const logger = new RatesLogger({ component: 'test', enabled: false });
      logger.info(LogEvents.SCHEDULER_STARTED);
      logger.warn(LogEvents.SOURCE_FETCH_FAILED);
      logger.error(LogEvents.ERROR);

      expect(console.log).not.toHaveBeenCalled();
      expect(logger.isEnabled()).toBe(false);
    });

    it('should keep children silent', () => {
      const child = createSilentLogger().child('scheduler');
      child.info(LogEvents.SCHEDULER_STARTED);

      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('child', () => {
    it('should inherit metadata and replace the component', () => {
      const parent = new RatesLogger({
        component: 'service',
        service: 'svc',
        app: 'app',
        environment: 'staging',
      });
      parent.child('scheduler').info(LogEvents.SCHEDULER_STARTED, { intervalMs: 1800000 });

      const [entry] = loggedEntries();
      expect(entry.component).toBe('scheduler');
      expect(entry._service).toBe('svc');
      expect(entry._app).toBe('app');
      expect(entry._env).toBe('staging');
      expect(entry.intervalMs).toBe(1800000);
    });
  });

  describe('JSON format', () => {
    it('should output single-line JSON even with newlines in values', () => {
      const logger = new RatesLogger({ component: 'test' });
      logger.info(LogEvents.ERROR, { message: 'Line1\nLine2\tTabbed' });

      const [line] = rawLines();
      expect(line).not.toContain('\n');
      expect(loggedEntries()[0].message).toBe('Line1\nLine2\tTabbed');
    });

    it('should prevent context from overriding base fields', () => {
      const logger = new RatesLogger({ component: 'aggregator' });
      const hostile = { message: 'x', level: 'ERROR', component: 'spoofed' };
      logger.info(LogEvents.RATES_UPDATE_STARTED, hostile);

      const [entry] = loggedEntries();
      expect(entry.component).toBe('aggregator');
      expect(entry.level).toBe('INFO');
      expect(entry.event).toBe('rates_update_started');
    });
  });

  describe('sanitizeErrorMessage', () => {
    it('should truncate long error messages', () => {
      const result = RatesLogger.sanitizeErrorMessage(new Error('a'.repeat(300)));
      expect(result.length).toBe(203);
      expect(result.endsWith('...')).toBe(true);
    });

    it('should keep short messages and stringify non-errors', () => {
      expect(RatesLogger.sanitizeErrorMessage(new Error('Short error'))).toBe('Short error');
      expect(RatesLogger.sanitizeErrorMessage('string error')).toBe('string error');
      expect(RatesLogger.sanitizeErrorMessage(123)).toBe('123');
      expect(RatesLogger.sanitizeErrorMessage(null)).toBe('null');
    });
  });
});

describe('createRatesLogger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should set the component and allow overriding options', () => {
    const logger: IRatesLogger = createRatesLogger('query', { service: 'custom-service' });
    logger.info(LogEvents.RATE_REFRESH_TRIGGERED);

    const [entry] = loggedEntries();
    expect(entry.component).toBe('query');
    expect(entry._service).toBe('custom-service');
  });
});
