/**
 * ServiceContainer: lightweight DI container for the ClipTrail services.
 *
 * Provides typed access, centralized init, and ordered graceful shutdown.
 *
 * Usage:
 *   const container = new ServiceContainer();
 *   await container.init();
 *   const history = container.get('history');
 *   ...
 *   await container.shutdown();
 */

import { createLogger, setLogLevel } from './logger';
import { ConfigService } from './config';
import { DatabaseService } from './database-service';
import { HistoryStore } from './history-store';
import { PowerShellClipboardSource } from './clipboard-source';
import type { ClipboardSource } from './clipboard-source';
import { ClipboardService } from './clipboard-service';
import { configFilePath, defaultDatabasePath, resolveDataDir } from '../paths';

const log = createLogger('Container');

// ─── Service Map: typed registry of all services ───

export interface ServiceMap {
  config: ConfigService;
  database: DatabaseService;
  history: HistoryStore;
  clipboardSource: ClipboardSource;
  clipboard: ClipboardService;
}

export type ServiceKey = keyof ServiceMap;

export interface ContainerOptions {
  /** Where config and database live; defaults to resolveDataDir() */
  dataDir?: string;
  /** Overrides the database location from config */
  databasePath?: string;
  /** Clipboard implementation; defaults to PowerShell */
  clipboardSource?: ClipboardSource;
}

export class ServiceContainer {
  private services: { [K in ServiceKey]: ServiceMap[K] | null } = {
    config: null,
    database: null,
    history: null,
    clipboardSource: null,
    clipboard: null,
  };
  private initialized = false;

  constructor(private readonly options: ContainerOptions = {}) {}

  /**
   * Get a registered service by key (typed).
   * Throws if the container hasn't been initialized yet or service doesn't exist.
   */
  get<K extends ServiceKey>(key: K): ServiceMap[K] {
    if (!this.initialized) {
      throw new Error(`ServiceContainer not initialized, call init() first`);
    }
    const svc = this.services[key];
    if (!svc) {
      throw new Error(`Service '${key}' not found in container`);
    }
    return svc;
  }

  has(key: ServiceKey): boolean {
    return this.services[key] !== null;
  }

  /**
   * Initialize all services in dependency order.
   */
  async init(): Promise<void> {
    if (this.initialized) {
      throw new Error('ServiceContainer already initialized');
    }

    log.info('Initializing services...');
    const t0 = Date.now();

    // ── Phase 1: Config + logging ──
    const dataDir = this.options.dataDir ?? resolveDataDir();
    const config = new ConfigService(configFilePath(dataDir));
    this.set('config', config);

    setLogLevel(config.get('logLevel'));
    config.onChange('logLevel', (level) => setLogLevel(level));

    // ── Phase 2: Storage ──
    const database = new DatabaseService(
      this.options.databasePath ?? config.get('databasePath') ?? defaultDatabasePath(dataDir),
    );
    this.set('database', database);
    database.initialize();

    const history = new HistoryStore(database, { maxUnpinned: config.get('clipboardMaxUnpinned') });
    this.set('history', history);

    // ── Phase 3: Clipboard pipeline ──
    let clipboardSource = this.options.clipboardSource;
    if (!clipboardSource) {
      const powerShell = new PowerShellClipboardSource({ timeoutMs: config.get('clipboardReadTimeoutMs') });
      config.onChange('clipboardReadTimeoutMs', (timeoutMs) => powerShell.setTimeout(timeoutMs));
      clipboardSource = powerShell;
    }
    this.set('clipboardSource', clipboardSource);

    const clipboard = new ClipboardService(history, clipboardSource, config);
    this.set('clipboard', clipboard);

    this.initialized = true;
    await clipboard.initialize();

    log.info(`All services initialized in ${Date.now() - t0}ms`);
  }

  /**
   * Graceful shutdown. Stops services in reverse dependency order.
   */
  async shutdown(): Promise<void> {
    if (!this.initialized) return;

    log.info('Graceful shutdown started');
    const t0 = Date.now();

    // ── Phase 1: Stop producing new work ──
    await this.tryAsync('clipboard', (s) => s.shutdown());

    // ── Phase 2: Let queued store operations finish ──
    await this.tryAsync('history', (s) => s.drain());

    // ── Phase 3: Persist config, close database (must be last) ──
    await this.tryAsync('config', (s) => s.shutdown());
    this.trySync('database', (s) => s.close());

    this.initialized = false;
    log.info(`Graceful shutdown completed in ${Date.now() - t0}ms`);
  }

  // ─── Private helpers ───

  private set<K extends ServiceKey>(key: K, service: ServiceMap[K]): void {
    this.services[key] = service;
  }

  /** Safely call a sync method on a service, logging errors. */
  private trySync<K extends ServiceKey>(key: K, fn: (service: ServiceMap[K]) => void): void {
    const svc = this.services[key];
    if (!svc) return;
    try {
      fn(svc);
    } catch (err) {
      log.error(`${key} shutdown error:`, err);
    }
  }

  /** Safely call an async method on a service, logging errors. */
  private async tryAsync<K extends ServiceKey>(key: K, fn: (service: ServiceMap[K]) => Promise<unknown>): Promise<void> {
    const svc = this.services[key];
    if (!svc) return;
    try {
      await fn(svc);
    } catch (err) {
      log.error(`${key} shutdown error:`, err);
    }
  }
}
