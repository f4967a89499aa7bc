/**
 * RatesScheduler - background refresh loop
 *
 * stopped -> running -> stopping -> stopped
 *
 * start() is refused in both running and stopping; await stop() before
 * starting again.
 *
 * The loop runs an update, logs its outcome, then waits for the interval.
 * The wait is cut short by stop(); a run already in progress is allowed to
 * finish, and stop() gives up waiting for it after `stopTimeoutMs`.
 */

import type { IRatesUpdater, UpdateResult } from '../types/rates.types.js';
import { LogEvents, RatesLogger, createSilentLogger, type IRatesLogger } from '../utils/rates-logger.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_UPDATE_INTERVAL_MS = 30 * 60 * 1000;
export const DEFAULT_ERROR_COOLDOWN_MS = 60 * 1000;
export const DEFAULT_STOP_TIMEOUT_MS = 10 * 1000;

/** Longest delay a single timer accepts; longer waits are chained */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

// ============================================================================
// Types
// ============================================================================

export type SchedulerState = 'stopped' | 'running' | 'stopping';

export interface RatesSchedulerConfig {
  updater: IRatesUpdater;
  /** Wait between the end of one run and the start of the next */
  intervalMs?: number;
  /** Wait after a run threw unexpectedly */
  errorCooldownMs?: number;
  /** Longest stop() waits for the loop to exit */
  stopTimeoutMs?: number;
  logger?: IRatesLogger;
}

/**
 * Resolve after `ms`, or as soon as the signal aborts
 */
function interruptibleWait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const finish = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', finish);
      resolve();
    };
    const schedule = (): void => {
      const delay = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= delay;
      timer = setTimeout(remaining > 0 ? schedule : finish, delay);
    };
    signal.addEventListener('abort', finish, { once: true });
    schedule();
  });
}

// ============================================================================
// RatesScheduler Implementation
// ============================================================================

export class RatesScheduler {
  private readonly updater: IRatesUpdater;
  private readonly intervalMs: number;
  private readonly errorCooldownMs: number;
  private readonly stopTimeoutMs: number;
  private readonly logger: IRatesLogger;

  private state: SchedulerState = 'stopped';
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private cycleCount = 0;

  constructor(config: RatesSchedulerConfig) {
    this.updater = config.updater;
    this.intervalMs = config.intervalMs ?? DEFAULT_UPDATE_INTERVAL_MS;
    this.errorCooldownMs = config.errorCooldownMs ?? DEFAULT_ERROR_COOLDOWN_MS;
    this.stopTimeoutMs = config.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.logger = config.logger ?? createSilentLogger('scheduler');
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  getState(): SchedulerState {
    return this.state;
  }

  /**
   * Launch the loop. Returns false if it is already running, or if a stop()
   * has not settled yet (state 'stopping').
   */
  start(): boolean {
    if (this.state !== 'stopped') {
      return false;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.state = 'running';
    this.cycleCount = 0;
    this.loop = this.runLoop(controller.signal);

    this.logger.info(LogEvents.SCHEDULER_STARTED, { intervalMs: this.intervalMs });
    return true;
  }

  /**
   * Signal the loop to exit and wait for it, at most `stopTimeoutMs`.
   * Returns false if the scheduler was not running.
   */
  async stop(): Promise<boolean> {
    if (this.state !== 'running') {
      return false;
    }

    this.state = 'stopping';
    this.abortController?.abort();

    const exited = this.loop ? await this.joinLoop(this.loop) : true;
    if (!exited) {
      this.logger.warn(LogEvents.SCHEDULER_STOPPED, {
        durationMs: this.stopTimeoutMs,
        message: 'Refresh still in progress at stop timeout; it will finish in the background',
      });
    }

    this.abortController = null;
    this.loop = null;
    this.state = 'stopped';
    this.logger.info(LogEvents.SCHEDULER_STOPPED, { message: `${this.cycleCount} cycles completed` });
    return true;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let waitMs = this.intervalMs;

      try {
        const result = await this.updater.runUpdate();
        this.cycleCount++;
        this.logCycle(result);
      } catch (error) {
        waitMs = this.errorCooldownMs;
        this.logger.error(LogEvents.SCHEDULER_LOOP_ERROR, {
          error: RatesLogger.sanitizeErrorMessage(error),
          delayMs: waitMs,
        });
      }

      await interruptibleWait(waitMs, signal);
    }
  }

  private logCycle(result: UpdateResult): void {
    const context = {
      status: result.status,
      successfulSources: [...result.successfulSources],
      failedSourceCount: result.failedSources.length,
      rateCount: result.totalRates,
      lastRefresh: result.lastRefresh,
    };
    if (result.status === 'failed') {
      this.logger.error(LogEvents.SCHEDULER_CYCLE_COMPLETED, context);
    } else {
      this.logger.info(LogEvents.SCHEDULER_CYCLE_COMPLETED, context);
    }
  }

  /**
   * @returns true if the loop exited within the stop timeout
   */
  private joinLoop(loop: Promise<void>): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), this.stopTimeoutMs);
      void loop.then(
        () => {
          clearTimeout(timer);
          resolve(true);
        },
        (error: unknown) => {
          clearTimeout(timer);
          this.logger.error(LogEvents.SCHEDULER_LOOP_ERROR, {
            error: RatesLogger.sanitizeErrorMessage(error),
          });
          resolve(true);
        }
      );
    });
  }
}
