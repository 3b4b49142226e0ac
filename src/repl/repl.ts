#!/usr/bin/env tsx
/**
 * Inspection REPL — run via:  npm run repl
 *
 * Opens the same SQLite DB as the daemon (WAL mode) and prints the
 * recorded presence and lock history without touching the live process.
 */

import * as readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { openDb } from "../storage/db.js";
import { EventLog } from "../storage/event.log.js";
import { createCommands } from "./commands.js";

const dbPath = process.env.SQLITE_PATH ?? "./proximity.db";
const db = openDb(dbPath);
const commands = createCommands(new EventLog(db), (line) => console.log(line));

const rl = readline.createInterface({ input, output });

async function main() {
  console.log(`bt-proximity-lock REPL — db: ${dbPath}`);
  console.log(`Type "help" for available commands.\n`);

  while (true) {
    let line: string;
    try {
      line = await rl.question("proximity> ");
    } catch {
      // Ctrl+D
      break;
    }

    const parts = line.trim().split(/\s+/);
    const cmd = parts[0];
    const args = parts.slice(1);

    if (!cmd) continue;
    if (cmd === "exit" || cmd === "quit") break;

    const handler = commands[cmd];
    if (!handler) {
      console.log(`Unknown command: "${cmd}". Type "help" for available commands.`);
      continue;
    }

    try {
      handler(args);
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  rl.close();
  db.close();
  console.log("Bye.");
}

await main();
