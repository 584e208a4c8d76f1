import Database from "better-sqlite3";
import path from "path";
import fs from "fs";

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS owners (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    latitude REAL NOT NULL DEFAULT 52.52,
    longitude REAL NOT NULL DEFAULT 13.40,
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS rooms (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    owner_id INTEGER NOT NULL REFERENCES owners(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE (owner_id, name)
  );

  CREATE TABLE IF NOT EXISTS room_settings (
    room_id INTEGER PRIMARY KEY REFERENCES rooms(id) ON DELETE CASCADE,
    owner_id INTEGER NOT NULL,
    timezone TEXT NOT NULL DEFAULT 'Europe/Berlin',
    target_day REAL NOT NULL DEFAULT 21.0,
    target_night REAL NOT NULL DEFAULT 18.0,
    night_start TEXT NOT NULL DEFAULT '22:00:00',
    night_end TEXT NOT NULL DEFAULT '06:00:00'
  );

  -- No foreign key to rooms: room deletion clears its samples explicitly
  CREATE TABLE IF NOT EXISTS samples (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    series TEXT NOT NULL CHECK (series IN ('room-temperature', 'outdoor-weather')),
    owner_id INTEGER NOT NULL,
    room_id INTEGER,
    timestamp INTEGER NOT NULL,
    value REAL NOT NULL
  );

  CREATE INDEX IF NOT EXISTS samples_by_series_time
    ON samples (series, owner_id, room_id, timestamp);
`;

/**
 * Opens (and migrates) the SQLite database. Pass ":memory:" for a throwaway
 * database; any other path gets its parent folder created first.
 */
export function openDatabase(filePath: string): SqliteDatabase {
  if (filePath !== ":memory:") {
    const folder = path.dirname(path.resolve(process.cwd(), filePath));
    if (!fs.existsSync(folder)) {
      fs.mkdirSync(folder, { recursive: true });
    }
  }

  const db = new Database(filePath);
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);
  return db;
}
