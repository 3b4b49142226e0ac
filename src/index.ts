import { loadConfig } from "./config.js";
import { createHealthServer } from "./health.js";
import { openDb } from "./storage/db.js";
import { EventLog } from "./storage/event.log.js";
import { HcitoolRssiSource } from "./presence/hcitool.source.js";
import { BluetoothctlRssiSource } from "./presence/bluetoothctl.source.js";
import { PresenceTracker } from "./presence/presence.tracker.js";
import type { RssiSource } from "./presence/rssi.source.js";
import { ScreensaverController } from "./lock/screensaver.controller.js";
import { AggregationPolicy } from "./lock/aggregation.policy.js";
import { ScanLoop } from "./scan/scan.loop.js";

const loaded = loadConfig();
if (!loaded.ok) {
  console.error("Configuration error:");
  for (const error of loaded.errors) console.error(`  ${error}`);
  process.exit(1);
}
const config = loaded.config;

const controller = new ScreensaverController(config.screensaver, config.dbusTimeoutMs);
const probe = await controller.isLocked();
if (!probe.ok) {
  console.error(`Cannot reach the ${config.screensaver} screensaver over D-Bus: ${probe.error}`);
  process.exit(2);
}
console.log("D-Bus session initialized successfully");

const db = openDb(config.sqlitePath);
const events = new EventLog(db);

const DAY_SEC = 24 * 60 * 60;
const retentionSec = config.eventRetentionDays * DAY_SEC;
function pruneEvents(): void {
  const removed = events.prune(retentionSec);
  if (removed > 0) {
    console.log(`Pruned ${removed} events older than ${config.eventRetentionDays} days`);
  }
}
pruneEvents();
const pruneTimer = setInterval(pruneEvents, DAY_SEC * 1000);

const source: RssiSource =
  config.rssiSource === "bluetoothctl"
    ? new BluetoothctlRssiSource(
        config.devices.map((d) => d.address),
        config.rssiMaxAgeMs
      )
    : new HcitoolRssiSource(config.rssiTimeoutMs);

const tracker = new PresenceTracker(config.devices, {
  lockThresholdDbm: config.lockThresholdDbm,
  lockTimeoutSec: config.lockTimeoutSec,
  unlockTimeoutSec: config.unlockTimeoutSec,
  initialPresence: config.initialPresence,
  missingSample: config.missingSample,
  debug: config.debug,
});

const policy = new AggregationPolicy(tracker, controller, (event, decision) =>
  events.recordDecision(event, decision)
);
tracker.onTransition(async (event) => {
  await policy.handle(event);
});

const loop = new ScanLoop(
  tracker,
  source,
  { scanIntervalSec: config.scanIntervalSec, sampleTimeoutMs: config.rssiTimeoutMs },
  (change) => events.recordPresence(change)
);

const server = createHealthServer(config.port, () => ({
  scan: loop.state,
  lockedByUs: policy.lockEngagedByUs,
  devices: tracker.getStatus(),
}));
console.log(`Health server listening on port ${config.port}`);

const shutdown = new AbortController();
for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.once(sig, () => {
    console.log(`Received ${sig}, shutting down...`);
    shutdown.abort();
  });
}

console.log("Starting Bluetooth proximity monitoring...");
console.log(`Monitoring devices: ${config.devices.map((d) => d.name).join(", ")}`);
console.log(
  `Unlock if RSSI > ${config.unlockThresholdDbm} dBm | Lock if RSSI < ${config.lockThresholdDbm} dBm`
);

await loop.run(shutdown.signal);
await policy.idle();

clearInterval(pruneTimer);
source.close?.();
server.close();
db.close();
process.exit(0);
