import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import * as schema from "./schema.js";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  close(): void;
}

const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS hosts (
  id TEXT PRIMARY KEY,
  subject_id TEXT NOT NULL UNIQUE,
  email TEXT NOT NULL,
  display_name TEXT,
  status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'suspended')),
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS events (
  id TEXT PRIMARY KEY,
  host_id TEXT NOT NULL REFERENCES hosts(id),
  title TEXT NOT NULL,
  description TEXT,
  status TEXT NOT NULL CHECK (status IN ('draft', 'active', 'suspended', 'deleted')),
  access_password_hash TEXT,
  share_token TEXT NOT NULL UNIQUE,
  cover_image_ref TEXT,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS events_host_idx ON events(host_id);

CREATE TABLE IF NOT EXISTS photos (
  id TEXT PRIMARY KEY,
  event_id TEXT NOT NULL REFERENCES events(id) ON DELETE CASCADE,
  storage_ref TEXT NOT NULL,
  caption TEXT,
  mime_type TEXT,
  file_size INTEGER,
  approval_status TEXT NOT NULL CHECK (approval_status IN ('pending', 'approved', 'rejected')),
  uploaded_at INTEGER NOT NULL,
  moderated_by TEXT,
  moderated_at INTEGER
);
CREATE INDEX IF NOT EXISTS photos_event_idx ON photos(event_id, approval_status);
`;

export function openDatabase(databasePath: string): DatabaseHandle {
  if (databasePath !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
  }

  const sqlite = new Database(databasePath);

  if (databasePath !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }

  sqlite.pragma("foreign_keys = ON");
  sqlite.exec(SCHEMA_DDL);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close()
  };
}

export function isUniqueViolation(error: unknown) {
  return error instanceof Database.SqliteError && error.code === "SQLITE_CONSTRAINT_UNIQUE";
}
