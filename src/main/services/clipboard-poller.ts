/**
 * ClipboardPoller: watches a ClipboardSource on a fixed cadence and reports
 * genuine changes.
 *
 * State machine: idle → polling → (idle | stopped). Ticks are chained with
 * setTimeout, so there is never more than one read in flight. A failed read
 * (or a failed change handler) is logged and the next tick is delayed by the
 * error backoff instead of the normal interval; the loop itself never ends on
 * its own.
 *
 * Each start() opens a new run generation. stop() closes it, so a tick that is
 * still waiting on the source when stop() returns can no longer call the
 * handler or schedule another read.
 *
 * @module clipboard-poller
 */

import { createLogger } from './logger';
import type { ClipboardSource } from './clipboard-source';
import { ClipTrailError, ErrorCode } from '../../shared/types/errors';
import {
  DEFAULT_ERROR_BACKOFF_MS,
  DEFAULT_MIN_CONTENT_LENGTH,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_READ_TIMEOUT_MS,
  DEFAULT_STOP_GRACE_MS,
} from '../../shared/constants';
import type { PollerState } from '../../shared/types';

const log = createLogger('ClipboardPoller');

/** Receives every accepted clipboard value, in detection order. */
export type ChangeHandler = (content: string) => unknown;

export interface PollerSettings {
  /** Delay between ticks (ms) */
  intervalMs: number;
  /** Delay after a failed tick (ms) */
  errorBackoffMs: number;
  /** Min non-whitespace characters */
  minLength: number;
  /** Upper bound for one read (ms) */
  readTimeoutMs: number;
  /** How long stop() waits for an in-flight tick (ms) */
  stopGraceMs: number;
}

export const DEFAULT_POLLER_SETTINGS: PollerSettings = {
  intervalMs: DEFAULT_POLL_INTERVAL_MS,
  errorBackoffMs: DEFAULT_ERROR_BACKOFF_MS,
  minLength: DEFAULT_MIN_CONTENT_LENGTH,
  readTimeoutMs: DEFAULT_READ_TIMEOUT_MS,
  stopGraceMs: DEFAULT_STOP_GRACE_MS,
};

/** True when `value` carries at least `minLength` non-whitespace characters. */
export function isCapturable(value: string, minLength: number): boolean {
  const visible = value.replace(/\s/g, '').length;
  return visible > 0 && visible >= minLength;
}

/** Unchanged, blank or too-short values are noise. */
export function isNoise(value: string, lastObserved: string, minLength: number): boolean {
  return value === lastObserved || !isCapturable(value, minLength);
}

/**
 * Read once, giving up after `timeoutMs`. Failures come back as
 * `ADAPTER_READ_ERROR` and a read that never settles as `ADAPTER_TIMEOUT`.
 */
export function readWithTimeout(source: ClipboardSource, timeoutMs: number): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(
        new ClipTrailError(`Clipboard read timed out after ${timeoutMs}ms`, ErrorCode.ADAPTER_TIMEOUT, {
          severity: 'warning',
          recoverable: true,
        }),
      );
    }, timeoutMs);

    Promise.resolve()
      .then(() => source.read())
      .then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(ClipTrailError.from(err, ErrorCode.ADAPTER_READ_ERROR));
        },
      );
  });
}

export class ClipboardPoller {
  private state: PollerState = 'idle';
  private running = false;
  private runId = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private lastObserved = '';
  private startedAt: string | null = null;
  private settings: PollerSettings;

  constructor(
    private readonly source: ClipboardSource,
    private readonly onChangeDetected: ChangeHandler,
    settings: Partial<PollerSettings> = {},
  ) {
    this.settings = { ...DEFAULT_POLLER_SETTINGS, ...settings };
  }

  // ─── Lifecycle ───

  /**
   * Seed the last observed value from one read ('' on failure) and begin
   * polling. No-op while already running. Resolves once seeding is done.
   */
  start(): Promise<void> {
    if (this.running) {
      return this.inFlight ?? Promise.resolve();
    }

    this.running = true;
    this.runId++;
    this.state = 'idle';
    this.startedAt = new Date().toISOString();
    log.info('Clipboard monitoring started');

    return this.track(this.seed(this.runId));
  }

  /**
   * Stop polling. Safe to call repeatedly or before start(). Waits up to
   * `stopGraceMs` for an in-flight tick; past that the tick is abandoned.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    const wasRunning = this.running;
    this.running = false;
    this.runId++;
    this.startedAt = null;
    if (wasRunning) {
      this.state = 'stopped';
    }

    const pending = this.inFlight;
    if (pending) {
      const settled = await settleWithin(pending, this.settings.stopGraceMs);
      if (!settled) {
        log.warn(`In-flight clipboard read did not finish within ${this.settings.stopGraceMs}ms, abandoning it`);
      }
    }

    if (wasRunning) {
      log.info('Clipboard monitoring stopped');
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  getState(): PollerState {
    return this.state;
  }

  getStartedAt(): string | null {
    return this.startedAt;
  }

  getSettings(): PollerSettings {
    return { ...this.settings };
  }

  /** New settings apply from the next tick on. */
  configure(settings: Partial<PollerSettings>): void {
    this.settings = { ...this.settings, ...settings };
  }

  /**
   * Treat `value` as already seen, e.g. after the app itself wrote it to the
   * clipboard for a paste.
   */
  markObserved(value: string): void {
    this.lastObserved = value;
  }

  getLastObserved(): string {
    return this.lastObserved;
  }

  // ─── Private: Polling ───

  private async seed(runId: number): Promise<void> {
    let initial = '';
    try {
      initial = await readWithTimeout(this.source, this.settings.readTimeoutMs);
    } catch (err) {
      if (this.isCurrent(runId)) {
        log.warn('Initial clipboard read failed, starting from empty:', err);
      }
    }

    if (!this.isCurrent(runId)) return;
    this.lastObserved = initial;
    this.schedule(runId, this.settings.intervalMs);
  }

  private schedule(runId: number, delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.track(this.tick(runId));
    }, delayMs);
  }

  private async tick(runId: number): Promise<void> {
    if (!this.isCurrent(runId)) return;
    this.state = 'polling';

    let delay = this.settings.intervalMs;
    try {
      const value = await readWithTimeout(this.source, this.settings.readTimeoutMs);
      if (!this.isCurrent(runId)) return;

      if (!isNoise(value, this.lastObserved, this.settings.minLength)) {
        this.lastObserved = value;
        await this.onChangeDetected(value);
      }
    } catch (err) {
      if (!this.isCurrent(runId)) return;
      delay = this.settings.errorBackoffMs;
      log.warn(`Clipboard poll failed, retrying in ${delay}ms:`, err);
    }

    if (!this.isCurrent(runId)) return;
    this.state = 'idle';
    this.schedule(runId, delay);
  }

  private isCurrent(runId: number): boolean {
    return this.running && runId === this.runId;
  }

  private track(task: Promise<void>): Promise<void> {
    this.inFlight = task;
    void task.finally(() => {
      if (this.inFlight === task) this.inFlight = null;
    });
    return task;
  }
}

/** Resolves true when `task` settles within `ms`, false otherwise. */
function settleWithin(task: Promise<void>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    const done = () => {
      clearTimeout(timer);
      resolve(true);
    };
    task.then(done, done);
  });
}
