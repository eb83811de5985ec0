import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import * as schema from "./schema.js";
import { applyMigrations } from "./migrate.js";

export type Db = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: Db;
  sqlite: Database.Database;
  close(): void;
}

/**
 * Open the SQLite database and apply the schema.
 * The caller owns the returned handle and must close it on shutdown.
 */
export function openDatabase(url: string): DatabaseHandle {
  if (url !== ":memory:") {
    mkdirSync(dirname(url), { recursive: true });
  }

  const sqlite = new Database(url);
  if (url !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.pragma("foreign_keys = ON");
  sqlite.pragma("busy_timeout = 5000");

  applyMigrations(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close() {
      if (sqlite.open) {
        sqlite.close();
      }
    },
  };
}

export { schema };
