import fs from "node:fs";
import path from "node:path";
import type { SqliteDatabase } from "./db.js";

function ensureMigrationsTable(db: SqliteDatabase) {
  db.exec(
    "CREATE TABLE IF NOT EXISTS _migrations (name TEXT PRIMARY KEY, run_at TEXT NOT NULL)"
  );
}

function loadAppliedMigrations(db: SqliteDatabase): Set<string> {
  const rows = db.prepare("SELECT name FROM _migrations").all() as { name: string }[];
  return new Set(rows.map((row) => row.name));
}

function readMigrationFiles(migrationsPath: string): string[] {
  if (!fs.existsSync(migrationsPath)) {
    return [];
  }
  return fs
    .readdirSync(migrationsPath)
    .filter((file) => file.endsWith(".sql"))
    .sort();
}

export function runMigrations(db: SqliteDatabase, migrationsPath: string): string[] {
  ensureMigrationsTable(db);
  const applied = loadAppliedMigrations(db);
  const pending = readMigrationFiles(migrationsPath).filter(
    (file) => !applied.has(file)
  );

  const insert = db.prepare("INSERT INTO _migrations (name, run_at) VALUES (?, ?)");
  for (const file of pending) {
    const sql = fs.readFileSync(path.join(migrationsPath, file), "utf-8");
    const apply = db.transaction(() => {
      db.exec(sql);
      insert.run(file, new Date().toISOString());
    });
    apply();
  }
  return pending;
}
