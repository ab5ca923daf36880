/**
 * Clipboard history types: shared between the core services and any
 * presentation layer built on top of them.
 *
 * @module clipboard
 */

/** Single clipboard history entry */
export interface Entry {
  /** Monotonically assigned identifier, never reused */
  id: number;
  /** Raw text content */
  content: string;
  /** Pinned entries are exempt from capacity-based eviction */
  pinned: boolean;
  /** Sensitive entries are displayed through their alias */
  sensitive: boolean;
  /** Display label, only set while the entry is sensitive */
  alias: string | null;
  /** ISO timestamp of insertion */
  createdAt: string;
}

/** Result of a HistoryStore.insert() call */
export type InsertResult =
  | { created: true; entry: Entry; evicted: number }
  | { created: false; reason: 'duplicate' | 'empty' };

/**
 * Outcome of toggling sensitivity. Enabling always yields the alias that
 * was stored; disabling clears it.
 */
export type SensitivityChange = { kind: 'enabled'; alias: string } | { kind: 'disabled' };

/** Entry counts */
export interface HistoryStats {
  total: number;
  pinned: number;
  sensitive: number;
}

/** Poller lifecycle state */
export type PollerState = 'idle' | 'polling' | 'stopped';

/** Clipboard pipeline status */
export interface ClipboardStatus {
  /** Whether monitoring is currently active */
  monitoring: boolean;
  /** Current poller state */
  state: PollerState;
  /** Total entries in history */
  totalEntries: number;
  /** Pinned entries count */
  pinnedEntries: number;
  /** Sensitive entries count */
  sensitiveEntries: number;
  /** Monitoring started at (ISO) */
  startedAt?: string;
}
