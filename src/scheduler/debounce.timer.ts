/**
 * One-shot, restartable delay. At most one action is armed at a time:
 * `schedule` replaces whatever was pending, `cancel` is always safe.
 *
 * The action runs from the event loop, never inside `schedule`, and never
 * after `cancel()` has returned. The generation check covers the case where
 * a timeout callback was already queued when it got replaced.
 */
export class DebounceTimer {
  private handle: ReturnType<typeof setTimeout> | null = null;
  private generation = 0;

  get armed(): boolean {
    return this.handle !== null;
  }

  schedule(durationMs: number, action: () => void): void {
    this.cancel();
    const gen = this.generation;
    this.handle = setTimeout(() => {
      if (gen !== this.generation) return;
      this.handle = null;
      this.generation++;
      action();
    }, durationMs);
  }

  /** Returns true if a pending action was cancelled. */
  cancel(): boolean {
    this.generation++;
    if (this.handle === null) return false;
    clearTimeout(this.handle);
    this.handle = null;
    return true;
  }
}
