import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import { runMigrations } from "./migrations.js";

export type SqliteDatabase = Database.Database;

export type SqliteOpenOptions = {
  filename: string;
};

export const DEFAULT_MIGRATIONS_PATH = fileURLToPath(
  new URL("../../../migrations", import.meta.url)
);

export function openSqliteDatabase(options: SqliteOpenOptions): SqliteDatabase {
  const filename = options.filename.trim();
  if (filename !== ":memory:") {
    const dir = path.dirname(filename);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(filename);
  if (filename !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }

  runMigrations(db, DEFAULT_MIGRATIONS_PATH);
  return db;
}
