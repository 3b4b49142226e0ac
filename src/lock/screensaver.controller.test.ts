import { describe, it, expect, vi } from "vitest";
import type { CommandResult } from "../process/command.js";
import { ScreensaverController, parseGetActive } from "./screensaver.controller.js";

function result(partial: Partial<CommandResult>): CommandResult {
  return { code: 0, stdout: "", stderr: "", timedOut: false, ...partial };
}

describe("parseGetActive", () => {
  it("reads the gdbus tuple", () => {
    expect(parseGetActive("(true,)\n")).toBe(true);
    expect(parseGetActive("(false,)\n")).toBe(false);
  });

  it("returns null for anything else", () => {
    expect(parseGetActive("()\n")).toBeNull();
  });
});

describe("ScreensaverController", () => {
  it("queries GetActive on the GNOME screensaver by default", async () => {
    const runFn = vi.fn().mockResolvedValue(result({ stdout: "(true,)\n" }));
    const controller = new ScreensaverController(undefined, 3000, runFn);

    expect(await controller.isLocked()).toEqual({ ok: true, value: true });
    expect(runFn).toHaveBeenCalledWith(
      "gdbus",
      [
        "call",
        "--session",
        "--dest",
        "org.gnome.ScreenSaver",
        "--object-path",
        "/org/gnome/ScreenSaver",
        "--method",
        "org.gnome.ScreenSaver.GetActive",
      ],
      3000
    );
  });

  it("locks through the Lock method", async () => {
    const runFn = vi.fn().mockResolvedValue(result({ stdout: "()\n" }));
    const controller = new ScreensaverController("cinnamon", 3000, runFn);

    expect(await controller.lock()).toEqual({ ok: true, value: undefined });
    expect(runFn.mock.calls[0][1]).toContain("org.cinnamon.ScreenSaver.Lock");
  });

  it("unlocks by deactivating the screensaver", async () => {
    const runFn = vi.fn().mockResolvedValue(result({ stdout: "()\n" }));
    const controller = new ScreensaverController("mate", 3000, runFn);

    expect(await controller.unlock()).toEqual({ ok: true, value: undefined });
    const argv: string[] = runFn.mock.calls[0][1];
    expect(argv.slice(-2)).toEqual(["org.mate.ScreenSaver.SetActive", "false"]);
  });

  it("reports a failed call with its stderr", async () => {
    const runFn = vi.fn().mockResolvedValue(
      result({
        code: 1,
        stderr: "Error: GDBus.Error:org.freedesktop.DBus.Error.ServiceUnknown\n",
      })
    );
    const controller = new ScreensaverController("gnome", 3000, runFn);

    expect(await controller.lock()).toEqual({
      ok: false,
      error: "Lock failed: Error: GDBus.Error:org.freedesktop.DBus.Error.ServiceUnknown",
    });
  });

  it("falls back to the exit code when stderr is empty", async () => {
    const runFn = vi.fn().mockResolvedValue(result({ code: 4 }));
    const controller = new ScreensaverController("gnome", 3000, runFn);

    expect(await controller.unlock()).toEqual({
      ok: false,
      error: "SetActive failed: exit code 4",
    });
  });

  it("reports a timeout", async () => {
    const runFn = vi.fn().mockResolvedValue(result({ code: null, timedOut: true }));
    const controller = new ScreensaverController("gnome", 1500, runFn);

    expect(await controller.isLocked()).toEqual({
      ok: false,
      error: "GetActive timed out after 1500ms",
    });
  });

  it("reports a missing gdbus binary", async () => {
    const runFn = vi.fn().mockRejectedValue(new Error("spawn gdbus ENOENT"));
    const controller = new ScreensaverController("gnome", 3000, runFn);

    expect(await controller.isLocked()).toEqual({
      ok: false,
      error: "gdbus unavailable: spawn gdbus ENOENT",
    });
  });

  it("rejects an unexpected GetActive reply", async () => {
    const runFn = vi.fn().mockResolvedValue(result({ stdout: "(uint32 1,)\n" }));
    const controller = new ScreensaverController("gnome", 3000, runFn);

    expect(await controller.isLocked()).toEqual({
      ok: false,
      error: "unexpected GetActive reply: (uint32 1,)",
    });
  });
});
