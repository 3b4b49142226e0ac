import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";

export const MIGRATIONS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "migrations"
);

/** Applies every not-yet-applied `*.sql` file in name order; returns the ones applied. */
export function runMigrations(
  db: Database.Database,
  migrationsDir: string = MIGRATIONS_DIR
): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    )
  `);

  const applied = new Set(
    (db.prepare("SELECT name FROM _migrations").all() as { name: string }[]).map(
      (r) => r.name
    )
  );

  const pending = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql") && !applied.has(f))
    .sort();

  const apply = db.transaction((file: string) => {
    db.exec(fs.readFileSync(path.join(migrationsDir, file), "utf8"));
    db.prepare("INSERT INTO _migrations (name, applied_at) VALUES (?, unixepoch())").run(file);
  });

  for (const file of pending) {
    apply(file);
    console.log(`Migration applied: ${file}`);
  }
  return pending;
}
