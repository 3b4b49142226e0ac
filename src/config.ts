import { z } from "zod";

export const PLACEHOLDER_ADDRESSES = ["XX:XX:XX:XX:XX:XX", "YY:YY:YY:YY:YY:YY"];

const MAC_RE = /^([0-9A-F]{2}:){5}[0-9A-F]{2}$/;

function isPlaceholder(address: string): boolean {
  return PLACEHOLDER_ADDRESSES.includes(address.trim().toUpperCase());
}

/** Parses `Name=MAC,Name=MAC`. An entry without "=" keeps an empty address. */
export function parseDeviceList(raw: string): { name: string; address: string }[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const eq = entry.indexOf("=");
      if (eq === -1) return { name: entry, address: "" };
      return { name: entry.slice(0, eq).trim(), address: entry.slice(eq + 1).trim() };
    });
}

const DeviceSchema = z.object({
  name: z.string().min(1, "device name is empty"),
  address: z
    .string()
    .transform((a) => a.toUpperCase())
    .pipe(z.string().regex(MAC_RE, "expected a Bluetooth MAC like AA:BB:CC:DD:EE:FF")),
});

const DevicesSchema = z
  .preprocess(
    (value) => parseDeviceList(typeof value === "string" ? value : ""),
    z.array(z.object({ name: z.string(), address: z.string() }))
  )
  .superRefine((devices, ctx) => {
    if (devices.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "no devices configured" });
    } else if (devices.every((d) => isPlaceholder(d.address))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "only placeholder addresses configured",
      });
    }
  })
  .transform((devices) => devices.filter((d) => !isPlaceholder(d.address)))
  .pipe(
    z
      .array(DeviceSchema)
      .refine(
        (devices) => new Set(devices.map((d) => d.name)).size === devices.length,
        "device names must be unique"
      )
  );

/** An empty variable counts as unset. */
const unsetIfBlank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === "string" && v.trim() === "" ? undefined : v), schema);

// setTimeout fires at once for delays above 2^31 - 1 ms
const MAX_TIMER_MS = 2_147_483_647;
const MAX_TIMER_SEC = Math.floor(MAX_TIMER_MS / 1000);

const int = (fallback: number) => unsetIfBlank(z.coerce.number().int().default(fallback));
const seconds = (fallback: number) =>
  unsetIfBlank(
    z.coerce
      .number()
      .positive()
      .max(MAX_TIMER_SEC, `must be at most ${MAX_TIMER_SEC} seconds`)
      .default(fallback)
  );
const millis = (fallback: number) =>
  unsetIfBlank(
    z.coerce
      .number()
      .int()
      .positive()
      .max(MAX_TIMER_MS, `must be at most ${MAX_TIMER_MS} ms`)
      .default(fallback)
  );
const flag = (fallback: "true" | "false") =>
  unsetIfBlank(z.enum(["true", "false"]).default(fallback)).transform((v) => v === "true");

export const EnvSchema = z
  .object({
    PROXIMITY_DEVICES: DevicesSchema,
    LOCK_THRESHOLD_DBM: int(-15),
    UNLOCK_THRESHOLD_DBM: int(-10),
    SCAN_INTERVAL_SEC: seconds(5),
    LOCK_TIMEOUT_SEC: seconds(15),
    UNLOCK_TIMEOUT_SEC: seconds(5),
    RSSI_SOURCE: unsetIfBlank(z.enum(["hcitool", "bluetoothctl"]).default("hcitool")),
    RSSI_TIMEOUT_MS: millis(4000),
    RSSI_MAX_AGE_MS: int(15_000).pipe(z.number().positive()),
    INITIAL_PRESENCE: unsetIfBlank(z.enum(["present", "first-sample"]).default("present")),
    MISSING_SAMPLE_POLICY: unsetIfBlank(z.enum(["ignore", "away"]).default("ignore")),
    SCREENSAVER: unsetIfBlank(z.enum(["gnome", "cinnamon", "mate"]).default("gnome")),
    DBUS_TIMEOUT_MS: millis(3000),
    PORT: int(3000).pipe(z.number().min(0).max(65535)),
    SQLITE_PATH: unsetIfBlank(z.string().default("./proximity.db")),
    EVENT_RETENTION_DAYS: int(7).pipe(z.number().positive()),
    DEBUG: flag("false"),
  })
  .refine((env) => env.UNLOCK_THRESHOLD_DBM > env.LOCK_THRESHOLD_DBM, {
    message: "must be greater than LOCK_THRESHOLD_DBM",
    path: ["UNLOCK_THRESHOLD_DBM"],
  })
  .transform((env) => ({
    devices: env.PROXIMITY_DEVICES,
    lockThresholdDbm: env.LOCK_THRESHOLD_DBM,
    unlockThresholdDbm: env.UNLOCK_THRESHOLD_DBM,
    scanIntervalSec: env.SCAN_INTERVAL_SEC,
    lockTimeoutSec: env.LOCK_TIMEOUT_SEC,
    unlockTimeoutSec: env.UNLOCK_TIMEOUT_SEC,
    rssiSource: env.RSSI_SOURCE,
    rssiTimeoutMs: env.RSSI_TIMEOUT_MS,
    rssiMaxAgeMs: env.RSSI_MAX_AGE_MS,
    initialPresence: env.INITIAL_PRESENCE,
    missingSample: env.MISSING_SAMPLE_POLICY,
    screensaver: env.SCREENSAVER,
    dbusTimeoutMs: env.DBUS_TIMEOUT_MS,
    port: env.PORT,
    sqlitePath: env.SQLITE_PATH,
    eventRetentionDays: env.EVENT_RETENTION_DAYS,
    debug: env.DEBUG,
  }));

export type AppConfig = z.output<typeof EnvSchema>;

export type ConfigResult =
  | { ok: true; config: AppConfig }
  | { ok: false; errors: string[] };

/** Reads the environment once. Invalid configuration is reported, never thrown. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const parsed = EnvSchema.safeParse(env);
  if (parsed.success) return { ok: true, config: parsed.data };
  return {
    ok: false,
    errors: parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    ),
  };
}
