import { z } from "zod";
import { BackoffPolicy, DEFAULT_BACKOFF } from "./backoff.js";
import { DEFAULT_TOLERANCES, Tolerances } from "./change-filter.js";
import { ConfigError } from "./errors.js";
import { LogLevel } from "./logger.js";
import { DEFAULT_IMAGE_CONTENT_TYPES, DEFAULT_MAX_IMAGE_BYTES, DEFAULT_SNAPSHOT_TIMEOUT_MS } from "./snapshot.js";

export type SnapshotConfig = {
  url: string;
  localPath: string;
  intervalMs: number;
  maxBytes: number;
  allowedContentTypes: string[];
  timeoutMs: number;
};

export type MqttConfig = {
  url: string;
  topic: string;
  username?: string;
  password?: string;
  retain: boolean;
  rejectUnauthorized: boolean;
};

export type BridgeConfig = {
  wsUrl: string;
  imageUrl: string;
  publishIntervalMs: number;
  snapshot: SnapshotConfig | null;
  tolerances: Tolerances;
  backoff: BackoffPolicy;
  mqtt: MqttConfig | null;
  log: { level: LogLevel; file?: string };
  stdout: boolean;
};

export type Env = Record<string, string | undefined>;
export type Flags = Record<string, string | boolean | undefined>;

export const DEFAULT_MQTT_TOPIC = "printbridge/status";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

const urlWithScheme = (schemes: string[]) =>
  z
    .string()
    .url()
    .refine((value) => URL.canParse(value) && schemes.includes(new URL(value).protocol), {
      message: `must use one of ${schemes.map((s) => s.replace(":", "://")).join(", ")}`,
    });

// Largest delay setTimeout honours; longer ones fire after 1 ms.
export const MAX_TIMER_MS = 2 ** 31 - 1;

const timerMs = z
  .number()
  .int()
  .min(1, "must be at least 1 ms")
  .max(MAX_TIMER_MS, `must not exceed ${MAX_TIMER_MS} ms`);

const seconds = (fallback: number) =>
  z.coerce
    .number()
    .positive()
    .default(fallback)
    .transform((s) => Math.round(s * 1000))
    .pipe(timerMs);

const tolerance = (fallback: number) => z.coerce.number().nonnegative().default(fallback);

const flag = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((v) => (typeof v === "boolean" ? v : v !== undefined && TRUE_VALUES.has(v.toLowerCase())));

const RawConfigSchema = z
  .object({
    wsUrl: urlWithScheme(["ws:", "wss:"]),
    snapshotUrl: urlWithScheme(["http:", "https:"]).optional(),
    localImagePath: z.string().min(1).optional(),
    imageUrl: z.string().default(""),
    publishInterval: seconds(2),
    snapshotInterval: seconds(60),
    snapshotTimeout: z.coerce.number().default(DEFAULT_SNAPSHOT_TIMEOUT_MS).pipe(timerMs),
    maxImageBytes: z.coerce.number().int().positive().default(DEFAULT_MAX_IMAGE_BYTES),
    imageContentTypes: z.string().optional(),
    toleranceProgress: tolerance(DEFAULT_TOLERANCES.progress),
    toleranceLayers: tolerance(DEFAULT_TOLERANCES.layers),
    toleranceTime: tolerance(DEFAULT_TOLERANCES.time),
    toleranceTemperature: tolerance(DEFAULT_TOLERANCES.temperature),
    toleranceFilament: tolerance(DEFAULT_TOLERANCES.filament),
    backoffFloor: seconds(DEFAULT_BACKOFF.floorMs / 1000),
    backoffCeiling: seconds(DEFAULT_BACKOFF.ceilingMs / 1000),
    mqttUrl: urlWithScheme(["mqtt:", "mqtts:", "ws:", "wss:"]).optional(),
    mqttTopic: z.string().min(1).default(DEFAULT_MQTT_TOPIC),
    mqttUser: z.string().optional(),
    mqttPass: z.string().optional(),
    mqttRetain: flag,
    mqttTlsInsecure: flag,
    logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    logFile: z.string().optional(),
    stdout: flag,
  })
  .superRefine((raw, ctx) => {
    if (raw.snapshotUrl && !raw.localImagePath) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["localImagePath"], message: "required when a snapshot URL is set" });
    }
    if (Boolean(raw.mqttUser) !== Boolean(raw.mqttPass)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["mqttUser"], message: "MQTT username and password must be set together" });
    }
    if (raw.backoffFloor > raw.backoffCeiling) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["backoffFloor"], message: "must not exceed the backoff ceiling" });
    }
  });

type RawInput = Record<string, string | boolean | undefined>;

function pick(value: string | boolean | undefined): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function gather(env: Env, flags: Flags): RawInput {
  const str = (flagName: string | null, envName: string | null) =>
    (flagName ? pick(flags[flagName]) : undefined) ?? (envName ? pick(env[envName]) : undefined);
  const bool = (flagName: string | null, envName: string) => {
    const f = flagName ? flags[flagName] : undefined;
    if (typeof f === "boolean") return f;
    return str(flagName, envName);
  };
  return {
    wsUrl: str("ws-url", "PRINTER_WS_URL"),
    snapshotUrl: str("snapshot-url", "PRINTER_SNAPSHOT_URL"),
    localImagePath: str("image-path", "LOCAL_IMAGE_PATH"),
    imageUrl: str("image-url", "EXPOSED_IMAGE_PATH"),
    publishInterval: str("publish-interval", "PUBLISH_INTERVAL"),
    snapshotInterval: str("snapshot-interval", "SNAPSHOT_INTERVAL"),
    snapshotTimeout: str(null, "SNAPSHOT_TIMEOUT_MS"),
    maxImageBytes: str("max-image-bytes", "MAX_IMAGE_BYTES"),
    imageContentTypes: str(null, "IMAGE_CONTENT_TYPES"),
    toleranceProgress: str(null, "TOLERANCE_PROGRESS"),
    toleranceLayers: str(null, "TOLERANCE_LAYERS"),
    toleranceTime: str(null, "TOLERANCE_TIME"),
    toleranceTemperature: str(null, "TOLERANCE_TEMPERATURE"),
    toleranceFilament: str(null, "TOLERANCE_FILAMENT"),
    backoffFloor: str(null, "BACKOFF_FLOOR"),
    backoffCeiling: str(null, "BACKOFF_CEILING"),
    mqttUrl: str("mqtt-url", "MQTT_URL"),
    mqttTopic: str("topic", "MQTT_TOPIC"),
    mqttUser: str(null, "MQTT_USER"),
    mqttPass: str(null, "MQTT_PASS"),
    mqttRetain: bool(null, "MQTT_RETAIN"),
    mqttTlsInsecure: bool(null, "MQTT_TLS_INSECURE"),
    logLevel: str("log-level", "LOG_LEVEL")?.toLowerCase(),
    logFile: str("log-file", "LOG_FILE"),
    stdout: bool("stdout", "PRINTBRIDGE_STDOUT"),
  };
}

/** Reads the bridge configuration once; flags win over the environment. */
export function loadConfig(env: Env = process.env, flags: Flags = {}): BridgeConfig {
  const parsed = RawConfigSchema.safeParse(gather(env, flags));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`));
  }
  const raw = parsed.data;
  const contentTypes = raw.imageContentTypes
    ? raw.imageContentTypes.split(",").map((t) => t.trim().toLowerCase()).filter(Boolean)
    : [...DEFAULT_IMAGE_CONTENT_TYPES];

  return {
    wsUrl: raw.wsUrl,
    imageUrl: raw.imageUrl,
    publishIntervalMs: raw.publishInterval,
    snapshot:
      raw.snapshotUrl && raw.localImagePath
        ? {
            url: raw.snapshotUrl,
            localPath: raw.localImagePath,
            intervalMs: raw.snapshotInterval,
            maxBytes: raw.maxImageBytes,
            allowedContentTypes: contentTypes,
            timeoutMs: raw.snapshotTimeout,
          }
        : null,
    tolerances: {
      progress: raw.toleranceProgress,
      layers: raw.toleranceLayers,
      time: raw.toleranceTime,
      temperature: raw.toleranceTemperature,
      filament: raw.toleranceFilament,
    },
    backoff: { floorMs: raw.backoffFloor, ceilingMs: raw.backoffCeiling, jitterRatio: DEFAULT_BACKOFF.jitterRatio },
    mqtt: raw.mqttUrl
      ? {
          url: raw.mqttUrl,
          topic: raw.mqttTopic,
          username: raw.mqttUser,
          password: raw.mqttPass,
          retain: raw.mqttRetain,
          rejectUnauthorized: !raw.mqttTlsInsecure,
        }
      : null,
    log: { level: raw.logLevel, file: raw.logFile },
    stdout: raw.stdout,
  };
}

export function redactConfig(config: BridgeConfig): BridgeConfig {
  if (!config.mqtt?.password) return config;
  return { ...config, mqtt: { ...config.mqtt, password: "***" } };
}

const BOOLEAN_FLAGS = new Set(["stdout"]);

/** Collects `--name value` pairs and bare boolean flags from argv. */
export function flagsFromArgs(args: string[]): Flags {
  const flags: Flags = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg?.startsWith("--")) continue;
    const name = arg.slice(2);
    if (BOOLEAN_FLAGS.has(name)) {
      flags[name] = true;
      continue;
    }
    const val = args[i + 1];
    if (val === undefined || val.startsWith("--")) continue;
    flags[name] = val;
    i += 1;
  }
  return flags;
}
