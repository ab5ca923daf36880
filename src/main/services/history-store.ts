/**
 * HistoryStore: the ordered, capacity-bounded clipboard history.
 *
 * Every operation is funnelled through a single-concurrency queue, and every
 * mutation runs as one SQLite transaction, so the poller's insert+cleanup and
 * a foreground pin/delete/clear never interleave. Reads go through the same
 * queue and only ever see committed state.
 *
 * Unknown ids are not errors: operations return `false` / `null`.
 * Storage failures reject with ClipTrailError(DB_*).
 *
 * @module history-store
 */

import PQueue from 'p-queue';
import { createLogger } from './logger';
import { planRetention } from './retention-policy';
import type { DatabaseService } from './database-service';
import { DEFAULT_MAX_UNPINNED, DEFAULT_SENSITIVE_ALIAS, LOG_PREVIEW_LENGTH } from '../../shared/constants';
import type { Entry, HistoryStats, InsertResult, SensitivityChange } from '../../shared/types';

const log = createLogger('HistoryStore');

export interface HistoryStoreOptions {
  /** Retention ceiling for unpinned entries */
  maxUnpinned?: number;
  /** Clock for `createdAt` */
  now?: () => Date;
}

export class HistoryStore {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly now: () => Date;
  private maxUnpinned: number;

  constructor(
    private readonly db: DatabaseService,
    options: HistoryStoreOptions = {},
  ) {
    this.maxUnpinned = options.maxUnpinned ?? DEFAULT_MAX_UNPINNED;
    this.now = options.now ?? (() => new Date());
  }

  getMaxUnpinned(): number {
    return this.maxUnpinned;
  }

  /**
   * Change the retention ceiling. Applies from the next insertion on;
   * existing overflow is not evicted retroactively.
   */
  setMaxUnpinned(maxUnpinned: number): boolean {
    if (!Number.isInteger(maxUnpinned) || maxUnpinned < 1) {
      log.warn(`Ignoring invalid retention ceiling: ${maxUnpinned}`);
      return false;
    }
    this.maxUnpinned = maxUnpinned;
    return true;
  }

  // ─── Mutations ───

  /**
   * Record a new clipboard value. Content equal to the most recent entry is
   * rejected as a duplicate. The retention pass runs in the same transaction.
   */
  insert(content: string): Promise<InsertResult> {
    if (content.trim().length === 0) {
      return Promise.resolve({ created: false, reason: 'empty' });
    }

    return this.exclusive(() =>
      this.db.transaction((): InsertResult => {
        const latest = this.db.getLatestEntry();
        if (latest && latest.content === content) {
          return { created: false, reason: 'duplicate' };
        }

        const entry = this.db.insertEntry(content, this.now().toISOString());
        const evicted = this.evictOverflow();

        log.debug(`Added entry #${entry.id}: ${preview(content)}`);
        return { created: true, entry, evicted };
      }),
    );
  }

  /** Pinning never triggers retention; unpinning does not evict retroactively. */
  togglePin(id: number): Promise<boolean> {
    return this.exclusive(() => this.db.togglePinned(id));
  }

  /**
   * Flip sensitivity. Enabling stores `alias`, or the default placeholder when
   * it is missing or blank; disabling clears the alias. `null` when the entry
   * does not exist.
   */
  toggleSensitive(id: number, alias?: string): Promise<SensitivityChange | null> {
    return this.exclusive(() =>
      this.db.transaction((): SensitivityChange | null => {
        const entry = this.db.getEntry(id);
        if (!entry) return null;

        if (entry.sensitive) {
          this.db.setSensitivity(id, false, null);
          return { kind: 'disabled' };
        }

        const label = alias !== undefined && alias.trim().length > 0 ? alias : DEFAULT_SENSITIVE_ALIAS;
        this.db.setSensitivity(id, true, label);
        return { kind: 'enabled', alias: label };
      }),
    );
  }

  /** Succeeds only for an existing, sensitive entry and a non-blank alias. */
  updateAlias(id: number, alias: string): Promise<boolean> {
    if (alias.trim().length === 0) {
      return Promise.resolve(false);
    }
    return this.exclusive(() => this.db.updateAlias(id, alias));
  }

  delete(id: number): Promise<boolean> {
    return this.exclusive(() => this.db.deleteEntry(id));
  }

  /** Remove every unpinned entry; returns how many were removed. */
  clearUnpinned(): Promise<number> {
    return this.exclusive(() => {
      const removed = this.db.deleteUnpinned();
      log.info(`Cleared ${removed} clipboard entries`);
      return removed;
    });
  }

  /**
   * Standalone cleanup pass. Idempotent: a second call right after the
   * first evicts nothing.
   */
  enforceRetention(): Promise<number> {
    return this.exclusive(() => this.db.transaction(() => this.evictOverflow()));
  }

  // ─── Reads ───

  /** Pinned first, then newest first. */
  list(): Promise<Entry[]> {
    return this.exclusive(() => this.db.listEntries());
  }

  get(id: number): Promise<Entry | null> {
    return this.exclusive(() => this.db.getEntry(id));
  }

  /** Point lookup used before pasting. */
  getContent(id: number): Promise<string | null> {
    return this.exclusive(() => this.db.getContent(id));
  }

  getStats(): Promise<HistoryStats> {
    return this.exclusive(() => this.db.getStats());
  }

  /** Resolves once every queued operation has settled. */
  drain(): Promise<void> {
    return this.queue.onIdle();
  }

  // ─── Private ───

  private exclusive<T>(fn: () => T): Promise<T> {
    return this.queue.add(() => fn());
  }

  private evictOverflow(): number {
    const plan = planRetention(this.db.listEntries(), this.maxUnpinned);
    if (plan.evict.length === 0) return 0;

    const removed = this.db.deleteEntries(plan.evict.map((e) => e.id));
    log.debug(`Retention evicted ${removed} entries (ceiling ${this.maxUnpinned})`);
    return removed;
  }
}

function preview(content: string): string {
  const flat = content.replace(/\s+/g, ' ');
  return flat.length > LOG_PREVIEW_LENGTH ? `${flat.slice(0, LOG_PREVIEW_LENGTH)}...` : flat;
}
