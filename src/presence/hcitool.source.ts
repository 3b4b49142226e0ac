import { errorMessage, runCommand, type CommandResult, type RunCommandFn } from "../process/command.js";
import { reading, unavailable, type RssiSample, type RssiSource } from "./rssi.source.js";

const RSSI_RE = /RSSI return value:\s*(-?\d+)/;

export function parseHcitoolRssi(stdout: string): number | null {
  const match = RSSI_RE.exec(stdout);
  return match ? Number(match[1]) : null;
}

/**
 * Queries the RSSI of an existing Bluetooth Classic connection with
 * `hcitool rssi <MAC>` (BlueZ). A device that is not connected yields no reading.
 */
export class HcitoolRssiSource implements RssiSource {
  readonly name = "hcitool";

  constructor(
    private readonly timeoutMs: number = 4000,
    private readonly runFn: RunCommandFn = runCommand
  ) {}

  async sample(address: string): Promise<RssiSample> {
    let result: CommandResult;
    try {
      result = await this.runFn("hcitool", ["rssi", address], this.timeoutMs);
    } catch (err) {
      return unavailable(`hcitool failed: ${errorMessage(err)}`);
    }

    if (result.timedOut) return unavailable(`hcitool timed out after ${this.timeoutMs}ms`);
    if (result.code !== 0) return unavailable(`hcitool exited with code ${result.code}`);

    const dbm = parseHcitoolRssi(result.stdout);
    return dbm === null ? unavailable("no RSSI in hcitool output") : reading(dbm);
  }
}
