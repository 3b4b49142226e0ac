import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import { reading, unavailable, type RssiSample, type RssiSource } from "./rssi.source.js";

/**
 * Starts a scan feed that calls `onData` with raw output and `onExit` once
 * the scanner has gone away; returns a stop function.
 */
export type ScanFeedFn = (
  onData: (chunk: string) => void,
  onExit: (reason: string) => void
) => () => void;

// Older BlueZ prints "RSSI: -60", newer prints "RSSI: 0xffffffc4 (-60)".
const RSSI_LINE_RE =
  /Device\s+((?:[0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2})\s+RSSI:\s*(?:0x[0-9A-Fa-f]+\s*\()?(-?\d+)(?![\dxX])/g;

/**
 * Runs `bluetoothctl scan on` and forwards its output line by line (Linux / BlueZ only).
 * bluetoothctl writes to stderr as well as stdout in some versions.
 */
export const bluetoothctlFeed: ScanFeedFn = (onData, onExit) => {
  const proc = spawn("bluetoothctl", ["scan", "on"]);
  for (const stream of [proc.stdout, proc.stderr]) {
    createInterface({ input: stream }).on("line", (line) => onData(`${line}\n`));
  }
  proc.on("error", (err) => onExit(err.message));
  proc.on("close", (code) => onExit(`exited with code ${code}`));
  return () => {
    proc.kill();
  };
};

export type RssiLine = { address: string; dbm: number };

export function parseRssiLines(text: string): RssiLine[] {
  return Array.from(text.matchAll(RSSI_LINE_RE), (m) => ({
    address: m[1].toUpperCase(),
    dbm: Number(m[2]),
  }));
}

type CachedReading = { dbm: number; at: number };

/**
 * Push-style source: advertisements arrive whenever the adapter hears them,
 * and `sample` answers with the latest cached reading for the address.
 * Only the tracked addresses are cached. Readings older than `maxAgeMs`
 * count as unavailable.
 */
export class BluetoothctlRssiSource implements RssiSource {
  readonly name = "bluetoothctl";
  private readonly tracked: Set<string>;
  private readonly latest = new Map<string, CachedReading>();
  private stopFeed: (() => void) | null = null;
  private feedGeneration = 0;
  private partial = "";

  constructor(
    addresses: string[],
    private readonly maxAgeMs: number = 15_000,
    private readonly feedFn: ScanFeedFn = bluetoothctlFeed,
    private readonly now: () => number = Date.now
  ) {
    this.tracked = new Set(addresses.map((a) => a.toUpperCase()));
  }

  get running(): boolean {
    return this.stopFeed !== null;
  }

  /** Starts the scanner unless it is already running. A scanner that died is started again. */
  start(): void {
    if (this.stopFeed !== null) return;
    const gen = ++this.feedGeneration;
    this.partial = "";
    const stop = this.feedFn(
      (chunk) => {
        if (gen === this.feedGeneration) this.ingest(chunk);
      },
      (reason) => this.feedExited(gen, reason)
    );
    // the feed may already have exited while starting
    if (gen === this.feedGeneration) this.stopFeed = stop;
  }

  close(): void {
    this.feedGeneration++;
    if (this.stopFeed !== null) {
      this.stopFeed();
      this.stopFeed = null;
    }
  }

  /**
   * Feeds raw scanner output. Only complete lines are parsed; a trailing
   * partial line waits for the rest of it.
   */
  ingest(chunk: string): void {
    const lines = (this.partial + chunk).split("\n");
    this.partial = lines.pop() ?? "";

    const at = this.now();
    for (const line of parseRssiLines(lines.join("\n"))) {
      if (this.tracked.has(line.address)) {
        this.latest.set(line.address, { dbm: line.dbm, at });
      }
    }
  }

  async sample(address: string): Promise<RssiSample> {
    this.start();
    const cached = this.latest.get(address.toUpperCase());
    if (!cached) return unavailable("not seen yet");

    const age = this.now() - cached.at;
    if (age > this.maxAgeMs) return unavailable(`last seen ${age}ms ago`);
    return reading(cached.dbm);
  }

  private feedExited(gen: number, reason: string): void {
    if (gen !== this.feedGeneration) return;
    this.feedGeneration++;
    this.stopFeed = null;
    console.error(`bluetoothctl scan stopped (${reason}); restarting on next sample`);
  }
}
