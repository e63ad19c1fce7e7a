/**
 * SQLite initialization (drizzle-orm over better-sqlite3)
 */

import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { logger } from "../lib/logger";
import * as schema from "./schema";

export type SqliteDb = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: SqliteDb;
  close(): void;
}

// Tables are created on startup; drizzle.config.ts generates migrations for
// schema changes.
const BOOTSTRAP_SQL = `
CREATE TABLE IF NOT EXISTS monitors (
  id TEXT PRIMARY KEY NOT NULL,
  slug TEXT NOT NULL,
  environment TEXT NOT NULL,
  version INTEGER NOT NULL,
  data TEXT NOT NULL,
  updatedAt TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS check_ins (
  seq INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
  id TEXT NOT NULL,
  monitorId TEXT NOT NULL,
  slug TEXT NOT NULL,
  environment TEXT NOT NULL,
  checkInId TEXT,
  status TEXT NOT NULL,
  outcome TEXT NOT NULL,
  runId TEXT,
  timestamp TEXT NOT NULL,
  durationSeconds REAL,
  receivedAt TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS check_ins_monitor_idx ON check_ins (monitorId, seq);
`;

/**
 * Open a database from a `sqlite:` URL (sqlite:./path, sqlite:/path or sqlite::memory:)
 */
export function openDatabase(databaseUrl: string): DatabaseHandle {
  const sqlitePath = databaseUrl.replace(/^sqlite:/, "");
  logger.info({ path: sqlitePath }, "Initializing SQLite database...");

  const connection = new Database(sqlitePath);
  if (sqlitePath !== ":memory:") {
    connection.pragma("journal_mode = WAL");
  }
  connection.pragma("busy_timeout = 2000");
  connection.exec(BOOTSTRAP_SQL);

  const db = drizzle(connection, { schema });
  logger.info("SQLite database connection established");

  return {
    db,
    close() {
      connection.close();
      logger.info("Database connection closed");
    },
  };
}

export { schema };
