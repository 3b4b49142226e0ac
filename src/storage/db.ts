import Database from "better-sqlite3";
import { runMigrations } from "./migrate.js";

/** Opens the event log database, creating it if needed, and brings its schema up to date. */
export function openDb(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
    // the REPL reads while the daemon appends
    db.pragma("busy_timeout = 2000");
  }
  runMigrations(db);
  return db;
}
