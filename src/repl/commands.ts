import type { EventLog } from "../storage/event.log.js";

export type Print = (line: string) => void;

export type CommandTable = Record<string, (args: string[]) => void>;

export function fmtTs(ts: number | null | undefined): string {
  if (!ts) return "—";
  return new Date(ts * 1000).toLocaleString();
}

function parseLimit(arg: string | undefined, fallback: number): number | null {
  if (arg === undefined) return fallback;
  const n = Number(arg);
  return Number.isInteger(n) && n > 0 ? n : null;
}

export function createCommands(log: EventLog, print: Print): CommandTable {
  return {
    help() {
      print(`
Commands:
  status              Last recorded state of every device
  events [n]          Last n presence changes (default 20)
  locks  [n]          Last n lock decisions (default 20)
  help                Show this help
  exit                Quit
`);
    },

    status() {
      const rows = log.latestPresence();
      if (rows.length === 0) {
        print("No presence changes recorded.");
        return;
      }
      for (const r of rows) {
        const rssi = r.rssi === null ? "" : ` ${r.rssi} dBm`;
        print(`  ${r.device}: ${r.state}${rssi} (since ${fmtTs(r.ts)})`);
      }
    },

    events([n]) {
      const limit = parseLimit(n, 20);
      if (limit === null) { print("Usage: events [n]"); return; }
      const rows = log.recentPresence(limit);
      if (rows.length === 0) {
        print("No presence changes recorded.");
        return;
      }
      for (const r of rows) {
        const rssi = r.rssi === null ? "no reading" : `${r.rssi} dBm`;
        print(`  ${fmtTs(r.ts)} ${r.device} → ${r.state} (${rssi})`);
      }
    },

    locks([n]) {
      const limit = parseLimit(n, 20);
      if (limit === null) { print("Usage: locks [n]"); return; }
      const rows = log.recentLocks(limit);
      if (rows.length === 0) {
        print("No lock decisions recorded.");
        return;
      }
      for (const r of rows) {
        const detail = r.detail ? ` — ${r.detail}` : "";
        print(`  ${fmtTs(r.ts)} [${r.action}] ${r.event_kind} from ${r.device}${detail}`);
      }
    },
  };
}
