import type Database from 'better-sqlite3';

export function ensureSchema(db: Database.Database): void {
  db.exec(`
    PRAGMA journal_mode = WAL;

    CREATE TABLE IF NOT EXISTS trees (
      treeId TEXT PRIMARY KEY,
      entriesJson TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS snapshots (
      snapshotId TEXT PRIMARY KEY,
      treeId TEXT NOT NULL,
      time TEXT NOT NULL,
      hostname TEXT NOT NULL,
      username TEXT NOT NULL,
      pathsJson TEXT NOT NULL,
      tagsJson TEXT NOT NULL,
      parent TEXT
    );

    CREATE TABLE IF NOT EXISTS locks (
      lockId TEXT PRIMARY KEY,
      exclusive INTEGER NOT NULL,
      pid INTEGER NOT NULL,
      createdAt TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_snapshots_time ON snapshots (time, snapshotId);
  `);
}
