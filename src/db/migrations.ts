/**
 * Database Migrations
 *
 * Version 1 is the initial schema in schema.sql. Later versions are applied
 * here, each in its own transaction.
 */

import Database from 'better-sqlite3';

export const CURRENT_SCHEMA_VERSION = 1;

interface Migration {
  version: number;
  description: string;
  up: (db: Database.Database) => void;
}

/**
 * Migrations after version 1, in order
 */
const migrations: Migration[] = [];

/**
 * Get the current schema version from the database
 */
export function getCurrentVersion(db: Database.Database): number {
  try {
    const row = db
      .prepare('SELECT MAX(version) as version FROM schema_versions')
      .get() as { version: number | null } | undefined;
    return row?.version ?? 0;
  } catch {
    // schema_versions not created yet
    return 0;
  }
}

function recordMigration(db: Database.Database, version: number, description: string): void {
  db.prepare(
    'INSERT INTO schema_versions (version, applied_at, description) VALUES (?, ?, ?)'
  ).run(version, Date.now(), description);
}

/**
 * Run all migrations newer than `fromVersion`
 */
export function runMigrations(db: Database.Database, fromVersion: number): void {
  const pending = migrations
    .filter((m) => m.version > fromVersion)
    .sort((a, b) => a.version - b.version);

  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db);
      recordMigration(db, migration.version, migration.description);
    })();
  }
}

export function needsMigration(db: Database.Database): boolean {
  return getCurrentVersion(db) < CURRENT_SCHEMA_VERSION;
}

/**
 * Get migration history from database
 */
export function getMigrationHistory(
  db: Database.Database
): Array<{ version: number; appliedAt: number; description: string | null }> {
  const rows = db
    .prepare('SELECT version, applied_at, description FROM schema_versions ORDER BY version')
    .all() as Array<{ version: number; applied_at: number; description: string | null }>;

  return rows.map((row) => ({
    version: row.version,
    appliedAt: row.applied_at,
    description: row.description,
  }));
}
