/**
 * DatabaseService: SQLite-backed persistent storage for the clipboard history.
 *
 * Owns the better-sqlite3 connection, the versioned schema (migrations are
 * tracked in `schema_version`, never probed at runtime) and the prepared
 * statements over `clipboard_items`. It knows nothing about pinning rules or
 * retention; HistoryStore builds those on top of the row operations here.
 *
 * Query failures are rethrown as ClipTrailError(DB_QUERY_ERROR).
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import { createLogger } from './logger';
import { ClipTrailError, ErrorCode } from '../../shared/types/errors';
import type { Entry, HistoryStats } from '../../shared/types/clipboard';

const log = createLogger('DatabaseService');

// ─── Schema version for migrations ───
const SCHEMA_VERSION = 1;

/** In-process database, used by tests */
export const IN_MEMORY = ':memory:';

export interface EntryRow {
  id: number;
  content: string;
  is_pinned: number;
  is_sensitive: number;
  alias: string | null;
  created_at: string;
}

interface StatsRow {
  total: number;
  pinned: number | null;
  sensitive: number | null;
}

const ENTRY_COLUMNS = 'id, content, is_pinned, is_sensitive, alias, created_at';

export class DatabaseService {
  private db: Database.Database | null = null;
  private dbPath: string;
  private stmtCache: Map<string, Database.Statement> = new Map();

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  // ─── Lifecycle ───

  initialize(): void {
    if (this.db) return;

    const inMemory = this.dbPath === IN_MEMORY;
    if (!inMemory) {
      const dbDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
      }
    }

    log.info(`Opening database at ${this.dbPath}`);

    try {
      this.db = new Database(this.dbPath);
    } catch (err) {
      throw ClipTrailError.from(err, ErrorCode.DB_CONNECTION_ERROR, { dbPath: this.dbPath });
    }

    if (!inMemory) {
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
    }
    this.db.pragma('temp_store = MEMORY');

    this.runMigrations();
    this.prepareStatements();

    log.info('Database initialized successfully');
  }

  close(): void {
    if (this.db) {
      this.stmtCache.clear();
      try {
        if (this.dbPath !== IN_MEMORY) {
          this.db.pragma('wal_checkpoint(TRUNCATE)');
        }
        this.db.close();
        log.info('Database closed');
      } catch (err) {
        log.error('Error closing database:', err);
      }
      this.db = null;
    }
  }

  isReady(): boolean {
    return this.db !== null;
  }

  getPath(): string {
    return this.dbPath;
  }

  // ─── Migrations ───

  private runMigrations(): void {
    const db = this.requireDb();

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);

    const currentVersion = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as { v: number | null };
    const version = currentVersion.v ?? 0;

    if (version > SCHEMA_VERSION) {
      throw new ClipTrailError(
        `Database schema v${version} is newer than supported v${SCHEMA_VERSION}`,
        ErrorCode.DB_MIGRATION_ERROR,
        { severity: 'fatal', recoverable: false, context: { dbPath: this.dbPath } },
      );
    }

    try {
      if (version < 1) {
        this.migrateV1();
      }
      // Future migrations go here:
      // if (version < 2) this.migrateV2();
    } catch (err) {
      throw ClipTrailError.from(err, ErrorCode.DB_MIGRATION_ERROR, { fromVersion: version });
    }
  }

  private migrateV1(): void {
    const db = this.requireDb();

    log.info('Running migration v1: clipboard_items');

    db.transaction(() => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS clipboard_items (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          content TEXT NOT NULL CHECK(length(content) > 0),
          is_pinned INTEGER NOT NULL DEFAULT 0,
          is_sensitive INTEGER NOT NULL DEFAULT 0,
          alias TEXT DEFAULT NULL,
          created_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_clipboard_items_order
          ON clipboard_items(is_pinned DESC, created_at DESC, id DESC);
        CREATE INDEX IF NOT EXISTS idx_clipboard_items_recent
          ON clipboard_items(created_at DESC, id DESC);

        INSERT INTO schema_version (version) VALUES (1);
      `);
    })();

    log.info('Migration v1 complete');
  }

  // ─── Prepared statements ───

  private prepareStatements(): void {
    const db = this.requireDb();

    this.stmtCache.set(
      'insertEntry',
      db.prepare(`
        INSERT INTO clipboard_items (content, is_pinned, is_sensitive, alias, created_at)
        VALUES (@content, 0, 0, NULL, @created_at)
      `),
    );

    this.stmtCache.set('getEntry', db.prepare(`SELECT ${ENTRY_COLUMNS} FROM clipboard_items WHERE id = ?`));

    this.stmtCache.set(
      'getLatestEntry',
      db.prepare(`
        SELECT ${ENTRY_COLUMNS} FROM clipboard_items
        ORDER BY created_at DESC, id DESC
        LIMIT 1
      `),
    );

    this.stmtCache.set(
      'listEntries',
      db.prepare(`
        SELECT ${ENTRY_COLUMNS} FROM clipboard_items
        ORDER BY is_pinned DESC, created_at DESC, id DESC
      `),
    );

    this.stmtCache.set('getContent', db.prepare('SELECT content FROM clipboard_items WHERE id = ?'));

    this.stmtCache.set(
      'togglePinned',
      db.prepare('UPDATE clipboard_items SET is_pinned = NOT is_pinned WHERE id = ?'),
    );

    this.stmtCache.set(
      'setSensitivity',
      db.prepare('UPDATE clipboard_items SET is_sensitive = @sensitive, alias = @alias WHERE id = @id'),
    );

    this.stmtCache.set(
      'updateAlias',
      db.prepare('UPDATE clipboard_items SET alias = @alias WHERE id = @id AND is_sensitive = 1'),
    );

    this.stmtCache.set('deleteEntry', db.prepare('DELETE FROM clipboard_items WHERE id = ?'));

    this.stmtCache.set('deleteUnpinned', db.prepare('DELETE FROM clipboard_items WHERE is_pinned = 0'));

    this.stmtCache.set(
      'getStats',
      db.prepare(`
        SELECT COUNT(*) as total,
               SUM(CASE WHEN is_pinned = 1 THEN 1 ELSE 0 END) as pinned,
               SUM(CASE WHEN is_sensitive = 1 THEN 1 ELSE 0 END) as sensitive
        FROM clipboard_items
      `),
    );
  }

  private getStmt(name: string): Database.Statement {
    const stmt = this.stmtCache.get(name);
    if (!stmt) throw new Error(`Prepared statement '${name}' not found`);
    return stmt;
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new ClipTrailError('Database is not initialized', ErrorCode.DB_CONNECTION_ERROR, {
        context: { dbPath: this.dbPath },
      });
    }
    return this.db;
  }

  /**
   * Run `fn` as one SQLite transaction; any throw rolls back every write made
   * inside it. Nested calls become savepoints.
   */
  transaction<T>(fn: () => T): T {
    const db = this.requireDb();
    try {
      return db.transaction(fn)();
    } catch (err) {
      throw ClipTrailError.from(err, ErrorCode.DB_QUERY_ERROR);
    }
  }

  private run<T>(operation: string, fn: () => T): T {
    this.requireDb();
    try {
      return fn();
    } catch (err) {
      throw ClipTrailError.from(err, ErrorCode.DB_QUERY_ERROR, { operation });
    }
  }

  // ─── Entry Operations ───

  insertEntry(content: string, createdAt: string): Entry {
    return this.run('insertEntry', () => {
      const result = this.getStmt('insertEntry').run({ content, created_at: createdAt });
      return {
        id: Number(result.lastInsertRowid),
        content,
        pinned: false,
        sensitive: false,
        alias: null,
        createdAt,
      };
    });
  }

  getEntry(id: number): Entry | null {
    return this.run('getEntry', () => {
      const row = this.getStmt('getEntry').get(id) as EntryRow | undefined;
      return row ? this.rowToEntry(row) : null;
    });
  }

  /** Most recent insertion, regardless of pin state */
  getLatestEntry(): Entry | null {
    return this.run('getLatestEntry', () => {
      const row = this.getStmt('getLatestEntry').get() as EntryRow | undefined;
      return row ? this.rowToEntry(row) : null;
    });
  }

  /** All entries: pinned first, then newest first */
  listEntries(): Entry[] {
    return this.run('listEntries', () => {
      const rows = this.getStmt('listEntries').all() as EntryRow[];
      return rows.map((row) => this.rowToEntry(row));
    });
  }

  getContent(id: number): string | null {
    return this.run('getContent', () => {
      const row = this.getStmt('getContent').get(id) as { content: string } | undefined;
      return row ? row.content : null;
    });
  }

  togglePinned(id: number): boolean {
    return this.run('togglePinned', () => this.getStmt('togglePinned').run(id).changes > 0);
  }

  setSensitivity(id: number, sensitive: boolean, alias: string | null): boolean {
    return this.run(
      'setSensitivity',
      () => this.getStmt('setSensitivity').run({ id, sensitive: sensitive ? 1 : 0, alias }).changes > 0,
    );
  }

  /** Only touches sensitive entries */
  updateAlias(id: number, alias: string): boolean {
    return this.run('updateAlias', () => this.getStmt('updateAlias').run({ id, alias }).changes > 0);
  }

  deleteEntry(id: number): boolean {
    return this.run('deleteEntry', () => this.getStmt('deleteEntry').run(id).changes > 0);
  }

  deleteEntries(ids: readonly number[]): number {
    if (ids.length === 0) return 0;
    return this.run('deleteEntries', () => {
      const stmt = this.getStmt('deleteEntry');
      let removed = 0;
      for (const id of ids) {
        removed += stmt.run(id).changes;
      }
      return removed;
    });
  }

  deleteUnpinned(): number {
    return this.run('deleteUnpinned', () => this.getStmt('deleteUnpinned').run().changes);
  }

  getStats(): HistoryStats {
    return this.run('getStats', () => {
      const row = this.getStmt('getStats').get() as StatsRow;
      return {
        total: row.total,
        pinned: row.pinned ?? 0,
        sensitive: row.sensitive ?? 0,
      };
    });
  }

  // ─── Helpers ───

  private rowToEntry(row: EntryRow): Entry {
    return {
      id: row.id,
      content: row.content,
      pinned: row.is_pinned === 1,
      sensitive: row.is_sensitive === 1,
      alias: row.is_sensitive === 1 ? row.alias : null,
      createdAt: row.created_at,
    };
  }
}
