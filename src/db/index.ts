/**
 * Database Layer
 *
 * SQLite connection lifecycle for the tag graph.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { SchemaVersion } from '../types';
import { DatabaseError } from '../errors';
import { runMigrations, getCurrentVersion, CURRENT_SCHEMA_VERSION } from './migrations';

function configure(db: Database.Database): void {
  db.pragma('foreign_keys = ON');
  // Readers keep working while an import holds the write lock
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('temp_store = MEMORY');
}

function applySchema(db: Database.Database): void {
  const schema = fs.readFileSync(path.join(__dirname, 'schema.sql'), 'utf-8');
  db.exec(schema);
}

/**
 * Database connection wrapper with lifecycle management
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  private constructor(db: Database.Database, dbPath: string) {
    this.db = db;
    this.dbPath = dbPath;
  }

  /**
   * Create the database at the given path and bring it to the current schema
   */
  static initialize(dbPath: string): DatabaseConnection {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    let db: Database.Database;
    try {
      db = new Database(dbPath);
    } catch (error) {
      throw new DatabaseError(`Failed to create database: ${dbPath}`, error);
    }

    try {
      configure(db);
      applySchema(db);
      runMigrations(db, getCurrentVersion(db));
    } catch (error) {
      db.close();
      throw new DatabaseError(`Failed to initialize database: ${dbPath}`, error);
    }

    return new DatabaseConnection(db, dbPath);
  }

  /**
   * Open an existing database, applying pending migrations. A file without
   * a schema version (e.g. an empty file) receives the initial schema first.
   */
  static open(dbPath: string): DatabaseConnection {
    if (!fs.existsSync(dbPath)) {
      throw new DatabaseError(`Database not found: ${dbPath}`);
    }

    let db: Database.Database;
    try {
      db = new Database(dbPath);
    } catch (error) {
      throw new DatabaseError(`Failed to open database: ${dbPath}`, error);
    }

    try {
      configure(db);
      if (getCurrentVersion(db) === 0) {
        applySchema(db);
      }
      const currentVersion = getCurrentVersion(db);
      if (currentVersion < CURRENT_SCHEMA_VERSION) {
        runMigrations(db, currentVersion);
      }
    } catch (error) {
      db.close();
      throw new DatabaseError(`Failed to migrate database: ${dbPath}`, error);
    }

    return new DatabaseConnection(db, dbPath);
  }

  /**
   * Open the database if the file exists, create it otherwise
   */
  static openOrCreate(dbPath: string): DatabaseConnection {
    return fs.existsSync(dbPath)
      ? DatabaseConnection.open(dbPath)
      : DatabaseConnection.initialize(dbPath);
  }

  getDb(): Database.Database {
    return this.db;
  }

  getPath(): string {
    return this.dbPath;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Get current schema version
   */
  getSchemaVersion(): SchemaVersion | null {
    const row = this.db
      .prepare('SELECT version, applied_at, description FROM schema_versions ORDER BY version DESC LIMIT 1')
      .get() as { version: number; applied_at: number; description: string | null } | undefined;

    if (!row) return null;

    return {
      version: row.version,
      appliedAt: row.applied_at,
      description: row.description ?? undefined,
    };
  }

  /**
   * Execute a function within a deferred transaction
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Execute a function within a transaction that takes the write lock up
   * front. Nested calls become savepoints of the outer transaction.
   */
  immediateTransaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  /**
   * Vacuum and analyze
   */
  optimize(): void {
    this.db.exec('VACUUM');
    this.db.exec('ANALYZE');
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

/**
 * Default database filename
 */
export const DATABASE_FILENAME = 'tags.db';
