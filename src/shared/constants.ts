/**
 * Shared constants: default values and limits.
 */

/** Max unpinned entries kept after an insertion */
export const DEFAULT_MAX_UNPINNED = 100;

/** Clipboard poll cadence (ms) */
export const DEFAULT_POLL_INTERVAL_MS = 500;

/** Wait after a failed clipboard read before retrying (ms) */
export const DEFAULT_ERROR_BACKOFF_MS = 1000;

/** Min non-whitespace characters for a clipboard value to be recorded */
export const DEFAULT_MIN_CONTENT_LENGTH = 2;

/** Upper bound for a single clipboard read/write (ms) */
export const DEFAULT_READ_TIMEOUT_MS = 2000;

/** How long stop() waits for an in-flight tick (ms) */
export const DEFAULT_STOP_GRACE_MS = 1000;

/** Alias used when an entry is marked sensitive without one */
export const DEFAULT_SENSITIVE_ALIAS = '*** Sensitive Data ***';

/** Characters of content shown in log lines */
export const LOG_PREVIEW_LENGTH = 50;
