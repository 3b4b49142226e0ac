import type { ConfirmedTransition } from "../presence/presence.tracker.js";
import type { ScreenLockController } from "./screen.lock.js";

export type PolicyDecision =
  | { action: "locked" }
  | { action: "unlocked" }
  | { action: "skipped"; reason: string }
  | { action: "failed"; error: string };

export interface PresenceSnapshot {
  snapshot(): ReadonlyMap<string, boolean>;
}

export type DecisionListener = (
  event: ConfirmedTransition,
  decision: PolicyDecision
) => void;

/**
 * Turns confirmed per-device transitions into lock/unlock calls.
 *
 * Locking needs every tracked device away; unlocking needs just one device
 * present, and only undoes a lock this process engaged itself, so a lock the
 * user started keeps asking for the password.
 *
 * Decisions run one at a time, in arrival order, each against a fresh
 * snapshot of the tracker.
 */
export class AggregationPolicy {
  private lockedByUs = false;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly presence: PresenceSnapshot,
    private readonly controller: ScreenLockController,
    private readonly onDecision: DecisionListener = () => {}
  ) {}

  get lockEngagedByUs(): boolean {
    return this.lockedByUs;
  }

  /** Resolves once every decision queued so far has finished. */
  async idle(): Promise<void> {
    await this.queue;
  }

  handle(event: ConfirmedTransition): Promise<PolicyDecision> {
    const run = this.queue.then(async () => {
      const decision =
        event.kind === "became-away"
          ? await this.onAway()
          : await this.onPresent(event.deviceId);
      this.report(event, decision);
      return decision;
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async onAway(): Promise<PolicyDecision> {
    if (anyPresent(this.presence.snapshot())) {
      return { action: "skipped", reason: "a device is still present" };
    }

    const state = await this.controller.isLocked();
    if (!state.ok) return { action: "failed", error: state.error };
    if (state.value) return { action: "skipped", reason: "screen already locked" };

    // A device may have come back while the query was in flight.
    if (anyPresent(this.presence.snapshot())) {
      return { action: "skipped", reason: "a device is still present" };
    }

    console.log("All devices are away, locking screen.");
    const result = await this.controller.lock();
    if (!result.ok) return { action: "failed", error: result.error };
    this.lockedByUs = true;
    return { action: "locked" };
  }

  private async onPresent(deviceId: string): Promise<PolicyDecision> {
    if (!anyPresent(this.presence.snapshot())) {
      return { action: "skipped", reason: "no device present" };
    }
    if (!this.lockedByUs) {
      return { action: "skipped", reason: "screen was not locked by this process" };
    }

    const state = await this.controller.isLocked();
    if (!state.ok) return { action: "failed", error: state.error };
    if (!state.value) {
      this.lockedByUs = false;
      return { action: "skipped", reason: "screen is not locked" };
    }

    // Every device may have left while the query was in flight.
    if (!anyPresent(this.presence.snapshot())) {
      return { action: "skipped", reason: "no device present" };
    }

    console.log(`${deviceId} is present, attempting to unlock.`);
    const result = await this.controller.unlock();
    if (!result.ok) return { action: "failed", error: result.error };
    this.lockedByUs = false;
    return { action: "unlocked" };
  }

  private report(event: ConfirmedTransition, decision: PolicyDecision): void {
    switch (decision.action) {
      case "locked":
        console.log("Screen locked successfully.");
        break;
      case "unlocked":
        console.log("Screen unlock attempted (woke screen).");
        break;
      case "failed":
        console.error(`Failed to handle ${event.kind} for ${event.deviceId}: ${decision.error}`);
        break;
      case "skipped":
        break;
    }

    try {
      this.onDecision(event, decision);
    } catch (err) {
      console.error("Decision listener failed:", err);
    }
  }
}

function anyPresent(states: ReadonlyMap<string, boolean>): boolean {
  for (const present of states.values()) {
    if (present) return true;
  }
  return false;
}
