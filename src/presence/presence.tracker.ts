import { DebounceTimer } from "../scheduler/debounce.timer.js";
import type { RssiSample } from "./rssi.source.js";

export type TrackedDevice = {
  name: string;
  address: string;
};

/** What to assume before a device's first reading. */
export type InitialPresence = "present" | "first-sample";

/** How to treat a poll that produced no reading. */
export type MissingSamplePolicy = "ignore" | "away";

export type TrackerConfig = {
  lockThresholdDbm: number;
  lockTimeoutSec: number;
  unlockTimeoutSec: number;
  initialPresence: InitialPresence;
  missingSample: MissingSamplePolicy;
  debug?: boolean;
};

/** Raw flip of a device's instantaneous flag, before any debounce. */
export type PresenceChange = {
  deviceId: string;
  present: boolean;
  rssi: number | null;
  at: number;
};

export type ConfirmedTransition = {
  kind: "became-present" | "became-away";
  deviceId: string;
  at: number;
};

export type TransitionListener = (event: ConfirmedTransition) => void | Promise<void>;

export type DeviceStatus = {
  name: string;
  address: string;
  present: boolean;
  lastRssi: number | null;
  lastSeenAt: number | null;
  pending: "lock" | "unlock" | null;
};

type TimerKind = "lock" | "unlock";

const TIMER_LABEL: Record<TimerKind, string> = { lock: "Lock", unlock: "Unlock" };

type DeviceEntry = {
  device: TrackedDevice;
  isPresent: boolean;
  observed: boolean;
  lastRssi: number | null;
  lastSeenAt: number | null;
  lockTimer: DebounceTimer;
  unlockTimer: DebounceTimer;
};

/**
 * Per-device presence with hysteresis in time: a flip of the instantaneous
 * flag arms a confirm timer, and only the timer firing reaches the listener.
 * All mutation happens synchronously on the event loop, so a device's flag,
 * its timers and the firing callbacks never interleave.
 */
export class PresenceTracker {
  private readonly entries = new Map<string, DeviceEntry>();
  private listener: TransitionListener = () => {};

  constructor(
    devices: TrackedDevice[],
    private readonly config: TrackerConfig,
    private readonly now: () => number = Date.now
  ) {
    for (const device of devices) {
      this.entries.set(device.name, {
        device,
        isPresent: config.initialPresence === "present",
        observed: false,
        lastRssi: null,
        lastSeenAt: null,
        lockTimer: new DebounceTimer(),
        unlockTimer: new DebounceTimer(),
      });
    }
  }

  onTransition(listener: TransitionListener): void {
    this.listener = listener;
  }

  devices(): TrackedDevice[] {
    return Array.from(this.entries.values(), (e) => e.device);
  }

  observe(
    deviceId: string,
    sample: RssiSample,
    at: number = this.now()
  ): PresenceChange | null {
    const entry = this.entries.get(deviceId);
    if (!entry) {
      this.debug(`Ignoring sample for unknown device ${deviceId}`);
      return null;
    }

    let currentlyPresent: boolean;
    let rssi: number | null;
    if (sample.kind === "unavailable") {
      if (this.config.missingSample === "ignore") {
        this.debug(`${deviceId}: no reading (${sample.reason}); keeping last state`);
        return null;
      }
      currentlyPresent = false;
      rssi = null;
    } else {
      currentlyPresent = sample.dbm >= this.config.lockThresholdDbm;
      rssi = sample.dbm;
      entry.lastSeenAt = at;
    }
    entry.lastRssi = rssi;

    const firstObservation = !entry.observed;
    entry.observed = true;
    if (firstObservation && this.config.initialPresence === "first-sample") {
      entry.isPresent = currentlyPresent;
      this.debug(`${deviceId}: initial state ${label(currentlyPresent)} (RSSI: ${rssi})`);
      return null;
    }

    if (currentlyPresent === entry.isPresent) {
      this.debug(`${deviceId} is ${label(currentlyPresent)} with RSSI: ${rssi}`);
      return null;
    }

    entry.isPresent = currentlyPresent;
    console.log(`State change for ${deviceId}: ${label(currentlyPresent)} (RSSI: ${rssi})`);

    if (currentlyPresent) {
      this.cancelTimer(entry, "lock");
      this.armTimer(entry, "unlock", this.config.unlockTimeoutSec, () => {
        if (!entry.isPresent) {
          this.debug(`${deviceId}: unlock timer fired but device is away; ignoring`);
          return;
        }
        this.emit({ kind: "became-present", deviceId, at: this.now() });
      });
    } else {
      this.cancelTimer(entry, "unlock");
      this.armTimer(entry, "lock", this.config.lockTimeoutSec, () => {
        this.emit({ kind: "became-away", deviceId, at: this.now() });
      });
    }

    return { deviceId, present: currentlyPresent, rssi, at };
  }

  /** Consistent copy of device → present, taken synchronously. */
  snapshot(): Map<string, boolean> {
    const states = new Map<string, boolean>();
    for (const [id, entry] of this.entries) states.set(id, entry.isPresent);
    return states;
  }

  getStatus(): DeviceStatus[] {
    return Array.from(this.entries.values(), (e): DeviceStatus => ({
      name: e.device.name,
      address: e.device.address,
      present: e.isPresent,
      lastRssi: e.lastRssi,
      lastSeenAt: e.lastSeenAt,
      pending: e.lockTimer.armed ? "lock" : e.unlockTimer.armed ? "unlock" : null,
    }));
  }

  /** Cancels every pending timer. Nothing fires once this returns. */
  shutdown(): void {
    for (const entry of this.entries.values()) {
      entry.lockTimer.cancel();
      entry.unlockTimer.cancel();
    }
  }

  private armTimer(entry: DeviceEntry, kind: TimerKind, seconds: number, action: () => void): void {
    timerFor(entry, kind).schedule(seconds * 1000, action);
    console.log(`${TIMER_LABEL[kind]} timer started for ${entry.device.name} (${seconds}s)`);
  }

  private cancelTimer(entry: DeviceEntry, kind: TimerKind): void {
    if (timerFor(entry, kind).cancel()) {
      console.log(`${TIMER_LABEL[kind]} timer cancelled for ${entry.device.name}`);
    }
  }

  private emit(event: ConfirmedTransition): void {
    const onError = (err: unknown) =>
      console.error(`Transition handler failed (${event.kind}):`, err);
    try {
      const result = this.listener(event);
      if (result instanceof Promise) result.catch(onError);
    } catch (err) {
      onError(err);
    }
  }

  private debug(message: string): void {
    if (this.config.debug) console.debug(message);
  }
}

function label(present: boolean): string {
  return present ? "Present" : "Away";
}

function timerFor(entry: DeviceEntry, kind: TimerKind): DebounceTimer {
  return kind === "lock" ? entry.lockTimer : entry.unlockTimer;
}
