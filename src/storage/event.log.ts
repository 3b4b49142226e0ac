import type Database from "better-sqlite3";
import type { ConfirmedTransition, PresenceChange } from "../presence/presence.tracker.js";
import type { PolicyDecision } from "../lock/aggregation.policy.js";

export type PresenceEventRow = {
  device: string;
  state: "present" | "away";
  rssi: number | null;
  ts: number;
};

export type LockEventRow = {
  event_kind: ConfirmedTransition["kind"];
  device: string;
  action: PolicyDecision["action"];
  detail: string | null;
  ts: number;
};

const toSec = (ms: number) => Math.floor(ms / 1000);

/** Append-only history of presence flips and lock decisions (unix seconds). */
export class EventLog {
  constructor(private readonly db: Database.Database) {}

  recordPresence(change: PresenceChange): void {
    this.db
      .prepare("INSERT INTO presence_events (device, state, rssi, ts) VALUES (?, ?, ?, ?)")
      .run(change.deviceId, change.present ? "present" : "away", change.rssi, toSec(change.at));
  }

  recordDecision(event: ConfirmedTransition, decision: PolicyDecision): void {
    const detail =
      decision.action === "skipped"
        ? decision.reason
        : decision.action === "failed"
          ? decision.error
          : null;
    this.db
      .prepare(
        "INSERT INTO lock_events (event_kind, device, action, detail, ts) VALUES (?, ?, ?, ?, ?)"
      )
      .run(event.kind, event.deviceId, decision.action, detail, toSec(event.at));
  }

  recentPresence(limit = 20): PresenceEventRow[] {
    return this.db
      .prepare(
        "SELECT device, state, rssi, ts FROM presence_events ORDER BY ts DESC, id DESC LIMIT ?"
      )
      .all(limit) as PresenceEventRow[];
  }

  recentLocks(limit = 20): LockEventRow[] {
    return this.db
      .prepare(
        "SELECT event_kind, device, action, detail, ts FROM lock_events ORDER BY ts DESC, id DESC LIMIT ?"
      )
      .all(limit) as LockEventRow[];
  }

  /**
   * Deletes presence and lock events older than `maxAgeSec` relative to
   * `nowSec`; returns how many rows went.
   */
  prune(maxAgeSec: number, nowSec: number = toSec(Date.now())): number {
    const cutoff = nowSec - maxAgeSec;
    const run = this.db.transaction(() => {
      const presence = this.db.prepare("DELETE FROM presence_events WHERE ts < ?").run(cutoff);
      const locks = this.db.prepare("DELETE FROM lock_events WHERE ts < ?").run(cutoff);
      return presence.changes + locks.changes;
    });
    return run();
  }

  /** Most recent presence event per device, by device name. */
  latestPresence(): PresenceEventRow[] {
    return this.db
      .prepare(
        `SELECT pe.device, pe.state, pe.rssi, pe.ts
         FROM presence_events pe
         WHERE pe.id = (
           SELECT id FROM presence_events
           WHERE device = pe.device
           ORDER BY ts DESC, id DESC LIMIT 1
         )
         ORDER BY pe.device`
      )
      .all() as PresenceEventRow[];
  }
}
