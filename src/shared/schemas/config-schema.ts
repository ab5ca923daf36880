/**
 * Zod schema for ClipTrail configuration.
 *
 * Single source of truth for config shape, defaults, and validation.
 * The ClipTrailConfig type is derived from this schema via z.infer<>.
 *
 * @module shared/schemas/config-schema
 */

import { z } from 'zod';
import {
  DEFAULT_ERROR_BACKOFF_MS,
  DEFAULT_MAX_UNPINNED,
  DEFAULT_MIN_CONTENT_LENGTH,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_READ_TIMEOUT_MS,
  DEFAULT_STOP_GRACE_MS,
} from '../constants';

// ─── Main config schema ───

// Unknown keys are stripped on load and dropped on the next save.
export const ClipTrailConfigSchema = z.object({
  /** Schema version for migrations */
  _version: z.number().default(1),

  // ── Logging ──
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // ── Storage ──
  /** Overrides <dataDir>/cliptrail.db */
  databasePath: z.string().min(1).optional(),

  // ── Clipboard monitoring ──
  clipboardMonitoring: z.boolean().default(true),
  clipboardMaxUnpinned: z.number().int().min(1).default(DEFAULT_MAX_UNPINNED),
  clipboardPollIntervalMs: z.number().int().min(50).default(DEFAULT_POLL_INTERVAL_MS),
  clipboardErrorBackoffMs: z.number().int().min(50).default(DEFAULT_ERROR_BACKOFF_MS),
  clipboardMinLength: z.number().int().min(1).default(DEFAULT_MIN_CONTENT_LENGTH),
  clipboardReadTimeoutMs: z.number().int().min(100).default(DEFAULT_READ_TIMEOUT_MS),
  clipboardStopGraceMs: z.number().int().min(0).default(DEFAULT_STOP_GRACE_MS),
});

// ─── Derived types ───

/** Full config after parsing (defaults applied, all fields present) */
export type ClipTrailConfigParsed = z.infer<typeof ClipTrailConfigSchema>;

// ─── Config migrations ───

export const CURRENT_CONFIG_VERSION = 1;

export type ConfigMigration = (config: Record<string, unknown>) => Record<string, unknown>;

/**
 * Ordered migrations: key = source version, value = transform to next version.
 * Example: `0: (cfg) => ({ ...cfg, newField: 'default' })` migrates v0 → v1.
 */
export const CONFIG_MIGRATIONS: Record<number, ConfigMigration> = {
  0: (cfg) => ({ ...cfg, _version: 1 }),
};
