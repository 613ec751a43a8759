import Database from 'better-sqlite3'

const CREATE_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS collections (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  kind TEXT NOT NULL CHECK (kind IN ('bundle', 'directory')),
  source TEXT NOT NULL,
  name TEXT NOT NULL,
  tags TEXT NOT NULL DEFAULT '[]',
  added_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
)`

/** Open/create the catalog database in WAL mode with a busy timeout for concurrent CLI runs */
export function initializeCatalogDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath)

  db.pragma('journal_mode = WAL')
  db.pragma('busy_timeout = 5000')

  db.exec(CREATE_TABLE_SQL)

  return db
}
