import { errorMessage, runCommand, type CommandResult, type RunCommandFn } from "../process/command.js";
import { fail, ok, type ControllerResult, type ScreenLockController } from "./screen.lock.js";

export const SCREENSAVERS = {
  gnome: { dest: "org.gnome.ScreenSaver", path: "/org/gnome/ScreenSaver" },
  cinnamon: { dest: "org.cinnamon.ScreenSaver", path: "/org/cinnamon/ScreenSaver" },
  mate: { dest: "org.mate.ScreenSaver", path: "/org/mate/ScreenSaver" },
} as const;

export type ScreensaverKind = keyof typeof SCREENSAVERS;

const ACTIVE_RE = /\((true|false),?\)/;

/** Parses the GVariant tuple printed by `gdbus call`, e.g. "(true,)". */
export function parseGetActive(stdout: string): boolean | null {
  const match = ACTIVE_RE.exec(stdout);
  if (!match) return null;
  return match[1] === "true";
}

/**
 * Talks to the session screensaver over D-Bus through `gdbus call`.
 * "Unlock" only deactivates the screensaver; the desktop still shows its
 * password prompt when the session itself is locked.
 */
export class ScreensaverController implements ScreenLockController {
  private readonly dest: string;
  private readonly path: string;

  constructor(
    kind: ScreensaverKind = "gnome",
    private readonly timeoutMs: number = 3000,
    private readonly runFn: RunCommandFn = runCommand
  ) {
    this.dest = SCREENSAVERS[kind].dest;
    this.path = SCREENSAVERS[kind].path;
  }

  async isLocked(): Promise<ControllerResult<boolean>> {
    const result = await this.call("GetActive");
    if (!result.ok) return result;
    const active = parseGetActive(result.value);
    if (active === null) return fail(`unexpected GetActive reply: ${result.value.trim()}`);
    return ok(active);
  }

  async lock(): Promise<ControllerResult<void>> {
    const result = await this.call("Lock");
    return result.ok ? ok(undefined) : result;
  }

  async unlock(): Promise<ControllerResult<void>> {
    const result = await this.call("SetActive", "false");
    return result.ok ? ok(undefined) : result;
  }

  private async call(method: string, ...args: string[]): Promise<ControllerResult<string>> {
    const argv = [
      "call",
      "--session",
      "--dest",
      this.dest,
      "--object-path",
      this.path,
      "--method",
      `${this.dest}.${method}`,
      ...args,
    ];

    let result: CommandResult;
    try {
      result = await this.runFn("gdbus", argv, this.timeoutMs);
    } catch (err) {
      return fail(`gdbus unavailable: ${errorMessage(err)}`);
    }

    if (result.timedOut) return fail(`${method} timed out after ${this.timeoutMs}ms`);
    if (result.code !== 0) {
      return fail(`${method} failed: ${result.stderr.trim() || `exit code ${result.code}`}`);
    }
    return ok(result.stdout);
  }
}
