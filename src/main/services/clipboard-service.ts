/**
 * Clipboard pipeline: ties the clipboard source, the poller and the history
 * store together for the presentation layer.
 *
 * Features:
 * - Background clipboard monitoring (polling-based, auto-start from config)
 * - Every accepted change goes to HistoryStore.insert (dedup + retention)
 * - Re-paste: writes a stored entry back to the clipboard without recording it again
 * - Manual capture of the current clipboard value
 * - Live reconfiguration when the config changes
 *
 * @module clipboard-service
 */

import { createLogger } from './logger';
import { ClipboardPoller, isCapturable, readWithTimeout } from './clipboard-poller';
import type { PollerSettings } from './clipboard-poller';
import type { ClipboardSource } from './clipboard-source';
import type { ConfigService } from './config';
import type { HistoryStore } from './history-store';
import type { ClipTrailConfigParsed } from '../../shared/schemas/config-schema';
import type { ClipboardStatus, InsertResult } from '../../shared/types';

const log = createLogger('Clipboard');

const POLLER_KEYS = [
  'clipboardPollIntervalMs',
  'clipboardErrorBackoffMs',
  'clipboardMinLength',
  'clipboardReadTimeoutMs',
  'clipboardStopGraceMs',
] as const;

function pollerSettingsFrom(config: ClipTrailConfigParsed): PollerSettings {
  return {
    intervalMs: config.clipboardPollIntervalMs,
    errorBackoffMs: config.clipboardErrorBackoffMs,
    minLength: config.clipboardMinLength,
    readTimeoutMs: config.clipboardReadTimeoutMs,
    stopGraceMs: config.clipboardStopGraceMs,
  };
}

export class ClipboardService {
  private readonly poller: ClipboardPoller;
  private unsubscribers: Array<() => void> = [];

  constructor(
    private readonly store: HistoryStore,
    private readonly source: ClipboardSource,
    private readonly config: ConfigService,
  ) {
    this.poller = new ClipboardPoller(source, (content) => this.onChangeDetected(content), pollerSettingsFrom(config.getAll()));
  }

  /**
   * Apply config, subscribe to config changes, optionally start monitoring.
   */
  async initialize(): Promise<void> {
    log.info('Initializing clipboard pipeline...');

    this.store.setMaxUnpinned(this.config.get('clipboardMaxUnpinned'));

    this.unsubscribers.push(
      this.config.onChange('clipboardMaxUnpinned', (next) => {
        this.store.setMaxUnpinned(next);
      }),
      this.config.onAnyChange((changedKeys, config) => {
        if (POLLER_KEYS.some((key) => changedKeys.includes(key))) {
          this.poller.configure(pollerSettingsFrom(config));
        }
      }),
      this.config.onChange('clipboardMonitoring', (enabled) => {
        const toggle = enabled ? this.startMonitoring() : this.stopMonitoring();
        toggle.catch((err: unknown) => log.error('Failed to toggle clipboard monitoring:', err));
      }),
    );

    if (this.config.get('clipboardMonitoring')) {
      await this.startMonitoring();
    }

    log.info('Clipboard pipeline initialized');
  }

  /**
   * Stop monitoring and drop config subscriptions.
   */
  async shutdown(): Promise<void> {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
    await this.stopMonitoring();
    log.info('Clipboard pipeline shut down');
  }

  // ─── Public API ───

  startMonitoring(): Promise<void> {
    return this.poller.start();
  }

  stopMonitoring(): Promise<void> {
    return this.poller.stop();
  }

  isMonitoring(): boolean {
    return this.poller.isRunning();
  }

  /**
   * Put a stored entry back on the clipboard. The poller is told about the
   * value first, so the write is not recorded as a new copy. A failed write
   * hands the previous value back to the poller.
   *
   * @returns false when the entry does not exist; rejects when the clipboard write fails
   */
  async paste(id: number): Promise<boolean> {
    const content = await this.store.getContent(id);
    if (content === null) return false;

    const previous = this.poller.getLastObserved();
    this.poller.markObserved(content);
    try {
      await this.source.write(content);
    } catch (err) {
      // A value the poller saw during the write stays
      if (this.poller.getLastObserved() === content) {
        this.poller.markObserved(previous);
      }
      throw err;
    }
    log.debug(`Pasted entry #${id}`);
    return true;
  }

  /**
   * Record the current clipboard value right away, outside the poll cadence.
   * Blank or too-short values are ignored. The read is bounded by
   * `clipboardReadTimeoutMs`.
   */
  async captureNow(): Promise<InsertResult> {
    const text = await readWithTimeout(this.source, this.config.get('clipboardReadTimeoutMs'));
    if (!isCapturable(text, this.config.get('clipboardMinLength'))) {
      return { created: false, reason: 'empty' };
    }

    this.poller.markObserved(text);
    return this.store.insert(text);
  }

  async getStatus(): Promise<ClipboardStatus> {
    const stats = await this.store.getStats();
    return {
      monitoring: this.poller.isRunning(),
      state: this.poller.getState(),
      totalEntries: stats.total,
      pinnedEntries: stats.pinned,
      sensitiveEntries: stats.sensitive,
      startedAt: this.poller.getStartedAt() ?? undefined,
    };
  }

  // ─── Private ───

  private async onChangeDetected(content: string): Promise<void> {
    const result = await this.store.insert(content);
    if (result.created) {
      log.info(`New clipboard entry #${result.entry.id} (${content.length} chars)`);
    }
  }
}
