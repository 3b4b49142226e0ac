import { describe, it, expect } from "vitest";
import { loadConfig, parseDeviceList } from "./config.js";

const DEVICES = "Phone=aa:bb:cc:dd:ee:ff,Watch=11:22:33:44:55:66";

describe("parseDeviceList", () => {
  it("splits name=address pairs and trims them", () => {
    expect(parseDeviceList(" Phone = AA:BB:CC:DD:EE:FF , Watch=11:22:33:44:55:66,")).toEqual([
      { name: "Phone", address: "AA:BB:CC:DD:EE:FF" },
      { name: "Watch", address: "11:22:33:44:55:66" },
    ]);
  });

  it("keeps an entry without '=' with an empty address", () => {
    expect(parseDeviceList("Phone")).toEqual([{ name: "Phone", address: "" }]);
  });
});

describe("loadConfig", () => {
  it("applies defaults", () => {
    const result = loadConfig({ PROXIMITY_DEVICES: DEVICES });
    expect(result).toEqual({
      ok: true,
      config: {
        devices: [
          { name: "Phone", address: "AA:BB:CC:DD:EE:FF" },
          { name: "Watch", address: "11:22:33:44:55:66" },
        ],
        lockThresholdDbm: -15,
        unlockThresholdDbm: -10,
        scanIntervalSec: 5,
        lockTimeoutSec: 15,
        unlockTimeoutSec: 5,
        rssiSource: "hcitool",
        rssiTimeoutMs: 4000,
        rssiMaxAgeMs: 15_000,
        initialPresence: "present",
        missingSample: "ignore",
        screensaver: "gnome",
        dbusTimeoutMs: 3000,
        port: 3000,
        sqlitePath: "./proximity.db",
        eventRetentionDays: 7,
        debug: false,
      },
    });
  });

  it("reads overrides from the environment", () => {
    const result = loadConfig({
      PROXIMITY_DEVICES: DEVICES,
      LOCK_THRESHOLD_DBM: "-20",
      UNLOCK_THRESHOLD_DBM: "-8",
      SCAN_INTERVAL_SEC: "2.5",
      RSSI_SOURCE: "bluetoothctl",
      MISSING_SAMPLE_POLICY: "away",
      SCREENSAVER: "cinnamon",
      DEBUG: "true",
    });
    if (!result.ok) throw new Error(result.errors.join("; "));

    expect(result.config).toMatchObject({
      lockThresholdDbm: -20,
      unlockThresholdDbm: -8,
      scanIntervalSec: 2.5,
      rssiSource: "bluetoothctl",
      missingSample: "away",
      screensaver: "cinnamon",
      debug: true,
    });
  });

  it("requires at least one device", () => {
    expect(loadConfig({})).toEqual({
      ok: false,
      errors: ["PROXIMITY_DEVICES: no devices configured"],
    });
  });

  it("rejects a list of placeholder addresses only", () => {
    expect(loadConfig({ PROXIMITY_DEVICES: "Phone=XX:XX:XX:XX:XX:XX" })).toEqual({
      ok: false,
      errors: ["PROXIMITY_DEVICES: only placeholder addresses configured"],
    });
  });

  it("drops placeholder entries next to real ones", () => {
    const result = loadConfig({
      PROXIMITY_DEVICES: "Phone=XX:XX:XX:XX:XX:XX,Watch=11:22:33:44:55:66",
    });
    if (!result.ok) throw new Error(result.errors.join("; "));
    expect(result.config.devices).toEqual([{ name: "Watch", address: "11:22:33:44:55:66" }]);
  });

  it("rejects a malformed address", () => {
    expect(loadConfig({ PROXIMITY_DEVICES: "Phone=aa:bb:cc" })).toEqual({
      ok: false,
      errors: ["PROXIMITY_DEVICES.0.address: expected a Bluetooth MAC like AA:BB:CC:DD:EE:FF"],
    });
  });

  it("rejects duplicate device names", () => {
    expect(
      loadConfig({ PROXIMITY_DEVICES: "Phone=AA:BB:CC:DD:EE:FF,Phone=11:22:33:44:55:66" })
    ).toEqual({
      ok: false,
      errors: ["PROXIMITY_DEVICES: device names must be unique"],
    });
  });

  it("requires the unlock threshold above the lock threshold", () => {
    expect(
      loadConfig({
        PROXIMITY_DEVICES: DEVICES,
        LOCK_THRESHOLD_DBM: "-10",
        UNLOCK_THRESHOLD_DBM: "-10",
      })
    ).toEqual({
      ok: false,
      errors: ["UNLOCK_THRESHOLD_DBM: must be greater than LOCK_THRESHOLD_DBM"],
    });
  });

  it("rejects a non-positive scan interval", () => {
    expect(loadConfig({ PROXIMITY_DEVICES: DEVICES, SCAN_INTERVAL_SEC: "0" })).toEqual({
      ok: false,
      errors: ["SCAN_INTERVAL_SEC: Number must be greater than 0"],
    });
  });

  it("rejects timeouts beyond what a timer can wait", () => {
    expect(
      loadConfig({
        PROXIMITY_DEVICES: DEVICES,
        LOCK_TIMEOUT_SEC: "3000000",
        DBUS_TIMEOUT_MS: "2147483648",
      })
    ).toEqual({
      ok: false,
      errors: [
        "LOCK_TIMEOUT_SEC: must be at most 2147483 seconds",
        "DBUS_TIMEOUT_MS: must be at most 2147483647 ms",
      ],
    });
  });

  it("accepts the longest timeout a timer can wait", () => {
    const result = loadConfig({ PROXIMITY_DEVICES: DEVICES, UNLOCK_TIMEOUT_SEC: "2147483" });
    if (!result.ok) throw new Error(result.errors.join("; "));
    expect(result.config.unlockTimeoutSec).toBe(2_147_483);
  });

  it("treats empty variables as unset", () => {
    const result = loadConfig({
      PROXIMITY_DEVICES: DEVICES,
      PORT: "",
      SCAN_INTERVAL_SEC: " ",
      RSSI_SOURCE: "",
      SQLITE_PATH: "",
      DEBUG: "",
    });
    if (!result.ok) throw new Error(result.errors.join("; "));

    expect(result.config).toMatchObject({
      port: 3000,
      scanIntervalSec: 5,
      rssiSource: "hcitool",
      sqlitePath: "./proximity.db",
      debug: false,
    });
  });

  it("rejects an unknown RSSI source", () => {
    const result = loadConfig({ PROXIMITY_DEVICES: DEVICES, RSSI_SOURCE: "sonar" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^RSSI_SOURCE: /);
  });
});
