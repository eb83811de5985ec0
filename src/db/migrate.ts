import Database from "better-sqlite3";
import { existsSync, readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/db when run from sources, dist/src/db once built
const MIGRATION_CANDIDATES = [
  join(__dirname, "../../drizzle/0000_init.sql"),
  join(__dirname, "../../../drizzle/0000_init.sql"),
];

function migrationPath(): string {
  const found = MIGRATION_CANDIDATES.find((candidate) => existsSync(candidate));
  if (!found) {
    throw new Error(`Migration file not found (looked in ${MIGRATION_CANDIDATES.join(", ")})`);
  }
  return found;
}

export function applyMigrations(sqlite: Database.Database): void {
  sqlite.exec(readFileSync(migrationPath(), "utf-8"));
}

export function runMigrations(dbPath: string): void {
  const sqlite = new Database(dbPath);
  sqlite.pragma("foreign_keys = ON");

  applyMigrations(sqlite);
  console.log("Database migrations applied successfully");

  sqlite.close();
}

// Run migrations if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const dbPath = process.env.DATABASE_URL || "./data/mailbox-mirror.db";
  runMigrations(dbPath);
}
