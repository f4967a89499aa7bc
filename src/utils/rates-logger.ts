/**
 * Rates Logger
 *
 * Structured JSON logging for the rates subsystem.
 * Emits one JSON object per line to stdout so logs can be filtered by
 * component, event, source and pair.
 *
 * Key features:
 * - Consistent context fields: timestamp, level, component, event
 * - No API keys in log context
 * - Error messages truncated to keep lines short
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * Standard event names for consistent filtering
 */
export const LogEvents = {
  // Refresh runs
  RATES_UPDATE_STARTED: 'rates_update_started',
  RATES_UPDATE_COMPLETED: 'rates_update_completed',
  UNKNOWN_SOURCE: 'unknown_source',

  // Source clients
  SOURCE_FETCH_SUCCEEDED: 'source_fetch_succeeded',
  SOURCE_FETCH_FAILED: 'source_fetch_failed',
  SOURCE_REQUEST_RETRY: 'source_request_retry',
  SOURCE_RATE_SKIPPED: 'source_rate_skipped',

  // Persistence
  STORE_INITIALIZED: 'store_initialized',
  JOURNAL_APPENDED: 'journal_appended',
  JOURNAL_PRUNED: 'journal_pruned',
  SNAPSHOT_REPLACED: 'snapshot_replaced',
  SNAPSHOT_UNREADABLE: 'snapshot_unreadable',
  PERSISTENCE_ERROR: 'persistence_error',

  // Queries
  RATE_REFRESH_TRIGGERED: 'rate_refresh_triggered',
  RATE_UNAVAILABLE: 'rate_unavailable',

  // Scheduler
  SCHEDULER_STARTED: 'scheduler_started',
  SCHEDULER_STOPPED: 'scheduler_stopped',
  SCHEDULER_CYCLE_COMPLETED: 'scheduler_cycle_completed',
  SCHEDULER_LOOP_ERROR: 'scheduler_loop_error',

  // General
  ERROR: 'error',
} as const;

export type LogEventType = (typeof LogEvents)[keyof typeof LogEvents];

/**
 * Base log entry with required fields
 */
export interface BaseLogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  /** Emitting component (e.g. 'aggregator', 'scheduler') */
  component: string;
  /** Event type for filtering (e.g. 'source_fetch_failed') */
  event: LogEventType;
  _service: string;
  _app: string;
  _env: string;
}

/**
 * Context fields for log entries (excludes base fields)
 */
export interface LogContext {
  /** Source config key or display name */
  source?: string;
  /** Pair key (e.g. 'BTC_USD') */
  pair?: string;
  /** Requested currencies */
  from?: string;
  to?: string;
  rate?: number;
  /** 1-based attempt number */
  attempt?: number;
  maxAttempts?: number;
  /** Backoff before the next attempt */
  delayMs?: number;
  /** Request duration */
  durationMs?: number;
  /** Error message */
  error?: string;
  /** Error code (for categorization) */
  errorCode?: string;
  /** Human-readable message */
  message?: string;
  /** Number of rates in a fetch or run */
  rateCount?: number;
  successfulSources?: string[];
  failedSourceCount?: number;
  status?: string;
  lastRefresh?: string;
  /** Rows written or removed */
  recordCount?: number;
  intervalMs?: number;
  path?: string;
}

/**
 * Full log entry combining base fields and context
 */
export interface LogEntry extends BaseLogEntry, LogContext {}

/**
 * Configuration for RatesLogger
 */
export interface RatesLoggerConfig {
  /** Component name to include in all logs */
  component: string;
  /** Whether to enable logging (default: true) */
  enabled?: boolean;
  /** Service name (default: 'rates-hub') */
  service?: string;
  /** Application name (default: 'rates') */
  app?: string;
  /** Environment (e.g., 'production', 'staging', 'development') */
  environment?: string;
}

// ============================================================================
// IRatesLogger Interface
// ============================================================================

/**
 * Interface for rates loggers
 *
 * Enables dependency injection and testability.
 */
export interface IRatesLogger {
  info(event: LogEventType, context?: LogContext): void;
  warn(event: LogEventType, context?: LogContext): void;
  error(event: LogEventType, context?: LogContext): void;
  isEnabled(): boolean;
  /** Logger with the same settings for another component */
  child(component: string): IRatesLogger;
}

// ============================================================================
// RatesLogger Implementation
// ============================================================================

/** Maximum error message length to prevent log bloat */
const MAX_ERROR_MESSAGE_LENGTH = 200;

/**
 * Structured JSON logger for the rates subsystem
 *
 * @example
 * const logger = new RatesLogger({ component: 'aggregator' });
 *
 * logger.warn(LogEvents.SOURCE_FETCH_FAILED, {
 *   source: 'coingecko',
 *   errorCode: 'TIMEOUT_ERROR',
 * });
 *
 * // Outputs:
 * // {"source":"coingecko","errorCode":"TIMEOUT_ERROR","timestamp":"2026-01-08T14:23:45.123Z","level":"WARN",...}
 */
export class RatesLogger implements IRatesLogger {
  private readonly config: {
    readonly component: string;
    readonly service: string;
    readonly app: string;
    readonly environment: string;
  };
  private readonly enabled: boolean;

  constructor(config: RatesLoggerConfig) {
    this.enabled = config.enabled ?? true;
    this.config = {
      component: config.component,
      service: config.service ?? 'rates-hub',
      app: config.app ?? 'rates',
      environment: config.environment ?? process.env.NODE_ENV ?? 'development',
    };
  }

  // ============================================================================
  // Public API
  // ============================================================================

  /**
   * Normal operational events: runs completed, scheduler started/stopped
   */
  info(event: LogEventType, context?: LogContext): void {
    this.log('INFO', event, context);
  }

  /**
   * Non-fatal issues: a source failed, a request will be retried
   */
  warn(event: LogEventType, context?: LogContext): void {
    this.log('WARN', event, context);
  }

  /**
   * Failures needing attention: persistence errors, runs with no rates
   */
  error(event: LogEventType, context?: LogContext): void {
    this.log('ERROR', event, context);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  child(component: string): IRatesLogger {
    return new RatesLogger({
      component,
      enabled: this.enabled,
      service: this.config.service,
      app: this.config.app,
      environment: this.config.environment,
    });
  }

  /**
   * Sanitize error message to prevent log bloat and sensitive data leakage
   */
  static sanitizeErrorMessage(error: unknown): string {
    const msg = error instanceof Error ? error.message : String(error);
    if (msg.length > MAX_ERROR_MESSAGE_LENGTH) {
      return msg.substring(0, MAX_ERROR_MESSAGE_LENGTH) + '...';
    }
    return msg;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  /**
   * Base fields are applied after context so context cannot override them.
   */
  private log(level: LogLevel, event: LogEventType, context?: LogContext): void {
    if (!this.enabled) {
      return;
    }

    const entry: LogEntry = {
      ...context,
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      event,
      _service: this.config.service,
      _app: this.config.app,
      _env: this.config.environment,
    };

    console.log(JSON.stringify(entry));
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a logger for a rates component
 */
export function createRatesLogger(
  component: string,
  options?: Partial<Omit<RatesLoggerConfig, 'component'>>
): IRatesLogger {
  return new RatesLogger({
    component,
    ...options,
  });
}

/**
 * Logger that drops everything (used when logging is disabled)
 */
export function createSilentLogger(component = 'silent'): IRatesLogger {
  return new RatesLogger({ component, enabled: false });
}
