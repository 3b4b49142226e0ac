import { errorMessage } from "../process/command.js";
import type { PresenceChange, PresenceTracker } from "../presence/presence.tracker.js";
import { unavailable, type RssiSample, type RssiSource } from "../presence/rssi.source.js";

export type ScanLoopConfig = {
  scanIntervalSec: number;
  sampleTimeoutMs: number;
};

export type ScanState = "running" | "stopped";

export type ChangeListener = (change: PresenceChange) => void;

/**
 * Polls every tracked device once per interval and feeds the tracker.
 * Stopping is driven by the AbortSignal handed to `run`: the device being
 * sampled finishes, the rest of the tick is skipped, every debounce timer is
 * cancelled and the loop settles in `stopped` for good.
 */
export class ScanLoop {
  private current: ScanState = "running";
  private started = false;

  constructor(
    private readonly tracker: PresenceTracker,
    private readonly source: RssiSource,
    private readonly config: ScanLoopConfig,
    private readonly onChange: ChangeListener = () => {}
  ) {}

  get state(): ScanState {
    return this.current;
  }

  async run(signal: AbortSignal): Promise<void> {
    if (this.started) throw new Error("ScanLoop.run() can only be called once");
    this.started = true;

    try {
      while (!signal.aborted) {
        await this.tick(signal);
        if (signal.aborted) break;
        await sleep(this.config.scanIntervalSec * 1000, signal);
      }
    } finally {
      this.tracker.shutdown();
      this.current = "stopped";
      console.log("Scan loop stopped; pending timers cancelled.");
    }
  }

  async tick(signal?: AbortSignal): Promise<void> {
    for (const device of this.tracker.devices()) {
      if (signal?.aborted) break;
      const sample = await this.sample(device.address);
      const change = this.tracker.observe(device.name, sample);
      if (change) {
        try {
          this.onChange(change);
        } catch (err) {
          console.error("Change listener failed:", err);
        }
      }
    }
  }

  private async sample(address: string): Promise<RssiSample> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<RssiSample>((resolve) => {
      timer = setTimeout(
        () => resolve(unavailable(`no answer within ${this.config.sampleTimeoutMs}ms`)),
        this.config.sampleTimeoutMs
      );
    });

    try {
      return await Promise.race([this.source.sample(address), timeout]);
    } catch (err) {
      return unavailable(`${this.source.name} failed: ${errorMessage(err)}`);
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Resolves after `ms`, or as soon as the signal aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
