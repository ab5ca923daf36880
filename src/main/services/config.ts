/**
 * ConfigService: typed, reactive, validated configuration management.
 *
 * Features:
 * - Zod schema validation on load (corrupted JSON → safe defaults)
 * - Typed get<K>/set<K>; updates are validated against the same schema
 * - setBatch() for multiple key updates in a single save
 * - onChange<K>() reactive subscriptions for dependent services
 * - Debounced save (200ms): multiple set() calls → single write
 * - Atomic write (temp file + rename)
 * - Config version tracking + ordered migrations
 *
 * @module main/services/config
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { createLogger } from './logger';
import { ClipTrailError, ErrorCode } from '../../shared/types/errors';
import {
  ClipTrailConfigSchema,
  CURRENT_CONFIG_VERSION,
  CONFIG_MIGRATIONS,
} from '../../shared/schemas/config-schema';
import type { ClipTrailConfigParsed } from '../../shared/schemas/config-schema';
import type { ConfigKey } from '../../shared/types/config';

export type { ClipTrailConfig } from '../../shared/types/config';

const log = createLogger('Config');

/** Delay before flushing config to disk (ms). Multiple set() calls within this window = single write. */
const SAVE_DELAY_MS = 200;

const CONFIG_KEYS: ReadonlySet<string> = new Set(Object.keys(ClipTrailConfigSchema.shape));

function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.has(key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─── Change listener types ───

type ChangeCallback<K extends ConfigKey> = (newVal: ClipTrailConfigParsed[K], oldVal: ClipTrailConfigParsed[K]) => void;

type AnyChangeCallback = (changedKeys: ConfigKey[], config: ClipTrailConfigParsed) => void;

type KeyListener = (next: ClipTrailConfigParsed, previous: ClipTrailConfigParsed) => void;

// ─── ConfigService ───

export class ConfigService {
  private configPath: string;
  private config: ClipTrailConfigParsed;
  private saveTimer: ReturnType<typeof setTimeout> | null = null;
  private saving = false;
  /** Another save was requested while one was in progress */
  private pendingSave = false;

  private keyListeners = new Map<ConfigKey, Set<KeyListener>>();
  private anyListeners = new Set<AnyChangeCallback>();

  constructor(configPath: string) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  // ────────────── Load / Save ──────────────

  private loadConfig(): ClipTrailConfigParsed {
    let raw: Record<string, unknown> = {};

    try {
      if (fs.existsSync(this.configPath)) {
        const parsed: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
        if (isRecord(parsed)) {
          raw = parsed;
        } else {
          log.warn('Config file does not contain an object, using defaults');
        }
      }
    } catch (error) {
      log.error(
        'Failed to read config file, using defaults:',
        ClipTrailError.from(error, ErrorCode.CONFIG_LOAD_ERROR, { configPath: this.configPath }),
      );
    }

    raw = this.migrateConfig(raw);

    const result = ClipTrailConfigSchema.safeParse(raw);
    if (result.success) {
      return result.data;
    }

    log.warn('Config validation failed, applying defaults. Issues:', result.error.issues);
    // Partial recovery: keep every field that is valid on its own
    const recovered = ClipTrailConfigSchema.safeParse(this.pickValidFields(raw));
    return recovered.success ? recovered.data : ClipTrailConfigSchema.parse({});
  }

  /**
   * Pick fields from raw config that individually pass validation.
   * Used for partial recovery when overall validation fails.
   */
  private pickValidFields(raw: Record<string, unknown>): Record<string, unknown> {
    const recovered: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (!isConfigKey(key)) continue;
      const partial = ClipTrailConfigSchema.safeParse({ [key]: value });
      if (partial.success && partial.data[key] !== undefined) {
        recovered[key] = value;
      }
    }
    return recovered;
  }

  /**
   * Run ordered migrations on raw config data.
   */
  private migrateConfig(raw: Record<string, unknown>): Record<string, unknown> {
    let version = typeof raw._version === 'number' ? raw._version : 0;
    let migrated = { ...raw };

    while (version < CURRENT_CONFIG_VERSION) {
      const migration = CONFIG_MIGRATIONS[version];
      if (migration) {
        log.info(`Migrating config v${version} → v${version + 1}`);
        migrated = migration(migrated);
      }
      version++;
    }

    migrated._version = CURRENT_CONFIG_VERSION;
    return migrated;
  }

  private scheduleSave(): void {
    if (this.saveTimer) clearTimeout(this.saveTimer);
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      void this.flushSave();
    }, SAVE_DELAY_MS);
  }

  /**
   * Atomic write: write to temp file, then rename.
   */
  private async flushSave(): Promise<void> {
    if (this.saving) {
      this.pendingSave = true;
      return;
    }
    this.saving = true;
    try {
      await fsp.mkdir(path.dirname(this.configPath), { recursive: true });
      const tmpPath = this.configPath + '.tmp';
      await fsp.writeFile(tmpPath, JSON.stringify(this.config, null, 2), 'utf8');
      await fsp.rename(tmpPath, this.configPath);
    } catch (error) {
      log.error('Failed to save config:', ClipTrailError.from(error, ErrorCode.CONFIG_SAVE_ERROR));
    } finally {
      this.saving = false;
      if (this.pendingSave) {
        this.pendingSave = false;
        void this.flushSave();
      }
    }
  }

  /**
   * Force immediate save, used during shutdown.
   */
  async forceSave(): Promise<void> {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
    await this.flushSave();
  }

  getPath(): string {
    return this.configPath;
  }

  // ────────────── Typed accessors ──────────────

  get<K extends ConfigKey>(key: K): ClipTrailConfigParsed[K] {
    return this.config[key];
  }

  /**
   * Set a single config value. Throws CONFIG_VALIDATION_ERROR when the value
   * does not satisfy the schema; the current config is left untouched then.
   */
  set<K extends ConfigKey>(key: K, value: ClipTrailConfigParsed[K]): void {
    if (this.config[key] === value) return;
    this.commit({ ...this.config, [key]: value }, [key]);
  }

  /**
   * Set multiple config values atomically. Single save, single change notification.
   */
  setBatch(updates: Partial<ClipTrailConfigParsed>): void {
    const changed: ConfigKey[] = [];
    for (const [key, value] of Object.entries(updates)) {
      if (isConfigKey(key) && value !== undefined && this.config[key] !== value) {
        changed.push(key);
      }
    }
    if (changed.length === 0) return;

    this.commit({ ...this.config, ...updates }, changed);
  }

  /**
   * Get a shallow copy of the full config.
   */
  getAll(): ClipTrailConfigParsed {
    return { ...this.config };
  }

  private commit(candidate: Record<string, unknown>, changedKeys: ConfigKey[]): void {
    const result = ClipTrailConfigSchema.safeParse(candidate);
    if (!result.success) {
      throw new ClipTrailError(`Invalid config value for ${changedKeys.join(', ')}`, ErrorCode.CONFIG_VALIDATION_ERROR, {
        severity: 'warning',
        context: { keys: changedKeys, issues: result.error.issues },
      });
    }

    const previous = this.config;
    this.config = result.data;
    this.notifyChange(changedKeys, previous);
    this.scheduleSave();
  }

  // ────────────── Reactive subscriptions ──────────────

  /**
   * Subscribe to changes of a specific config key.
   * Returns an unsubscribe function.
   *
   * @example
   * const unsub = config.onChange('clipboardMaxUnpinned', (next) => {
   *   store.setMaxUnpinned(next);
   * });
   */
  onChange<K extends ConfigKey>(key: K, callback: ChangeCallback<K>): () => void {
    const listener: KeyListener = (next, previous) => callback(next[key], previous[key]);

    let listeners = this.keyListeners.get(key);
    if (!listeners) {
      listeners = new Set();
      this.keyListeners.set(key, listeners);
    }
    listeners.add(listener);

    return () => {
      this.keyListeners.get(key)?.delete(listener);
    };
  }

  /**
   * Subscribe to any config change. Callback receives the changed keys and the new config.
   */
  onAnyChange(callback: AnyChangeCallback): () => void {
    this.anyListeners.add(callback);
    return () => {
      this.anyListeners.delete(callback);
    };
  }

  private notifyChange(changedKeys: ConfigKey[], previous: ClipTrailConfigParsed): void {
    for (const key of changedKeys) {
      const listeners = this.keyListeners.get(key);
      if (!listeners) continue;
      for (const listener of listeners) {
        try {
          listener(this.config, previous);
        } catch (err) {
          log.error(`Config onChange listener error for key "${key}":`, err);
        }
      }
    }

    for (const cb of this.anyListeners) {
      try {
        cb(changedKeys, this.getAll());
      } catch (err) {
        log.error('Config onAnyChange listener error:', err);
      }
    }
  }

  // ────────────── Shutdown ──────────────

  async shutdown(): Promise<void> {
    await this.forceSave();
    this.keyListeners.clear();
    this.anyListeners.clear();
  }
}
