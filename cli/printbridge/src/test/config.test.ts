import { describe, expect, it } from "vitest";
import { DEFAULT_TOLERANCES } from "../change-filter.js";
import { flagsFromArgs, loadConfig, MAX_TIMER_MS, redactConfig } from "../config.js";
import { ConfigError } from "../errors.js";

const WS = "ws://printer.local:9999";

function configIssues(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("loadConfig", () => {
  it("fills defaults around the stream URL", () => {
    const config = loadConfig({ PRINTER_WS_URL: WS });
    expect(config).toEqual({
      wsUrl: WS,
      imageUrl: "",
      publishIntervalMs: 2000,
      snapshot: null,
      tolerances: DEFAULT_TOLERANCES,
      backoff: { floorMs: 1000, ceilingMs: 60_000, jitterRatio: 0.2 },
      mqtt: null,
      log: { level: "info", file: undefined },
      stdout: false,
    });
  });

  it("fails fast without a stream URL", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    const issues = configIssues(() => loadConfig({}));
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^wsUrl: /);
  });

  it("rejects a stream URL with the wrong scheme", () => {
    const issues = configIssues(() => loadConfig({ PRINTER_WS_URL: "http://printer.local/" }));
    expect(issues).toEqual(["wsUrl: must use one of ws://, wss://"]);
  });

  it("needs a local path when snapshots are enabled", () => {
    const issues = configIssues(() =>
      loadConfig({ PRINTER_WS_URL: WS, PRINTER_SNAPSHOT_URL: "http://printer.local/img.png" })
    );
    expect(issues).toEqual(["localImagePath: required when a snapshot URL is set"]);
  });

  it("builds the snapshot settings", () => {
    const config = loadConfig({
      PRINTER_WS_URL: WS,
      PRINTER_SNAPSHOT_URL: "http://printer.local/img.png",
      LOCAL_IMAGE_PATH: "www/printer/print.png",
      EXPOSED_IMAGE_PATH: "/local/printer/print.png",
      SNAPSHOT_INTERVAL: "30",
      MAX_IMAGE_BYTES: "1048576",
      IMAGE_CONTENT_TYPES: "image/PNG, image/gif,",
    });
    expect(config.imageUrl).toBe("/local/printer/print.png");
    expect(config.snapshot).toEqual({
      url: "http://printer.local/img.png",
      localPath: "www/printer/print.png",
      intervalMs: 30_000,
      maxBytes: 1_048_576,
      allowedContentTypes: ["image/png", "image/gif"],
      timeoutMs: 5000,
    });
  });

  it("rejects non-positive intervals and sizes", () => {
    const issues = configIssues(() =>
      loadConfig({ PRINTER_WS_URL: WS, PUBLISH_INTERVAL: "0", MAX_IMAGE_BYTES: "-1" })
    );
    expect(issues.map((issue) => issue.split(":")[0])).toEqual(["publishInterval", "maxImageBytes"]);
  });

  it("rejects intervals that round to zero milliseconds", () => {
    const issues = configIssues(() =>
      loadConfig({ PRINTER_WS_URL: WS, BACKOFF_FLOOR: "0.0001", PUBLISH_INTERVAL: "0.0004" })
    );
    expect(issues).toEqual(["publishInterval: must be at least 1 ms", "backoffFloor: must be at least 1 ms"]);
    expect(loadConfig({ PRINTER_WS_URL: WS, BACKOFF_FLOOR: "0.001" }).backoff.floorMs).toBe(1);
  });

  it("rejects delays longer than a timer can wait", () => {
    const issues = configIssues(() =>
      loadConfig({ PRINTER_WS_URL: WS, SNAPSHOT_TIMEOUT_MS: "3000000000", BACKOFF_CEILING: "3000000" })
    );
    expect(issues).toEqual([
      `snapshotTimeout: must not exceed ${MAX_TIMER_MS} ms`,
      `backoffCeiling: must not exceed ${MAX_TIMER_MS} ms`,
    ]);
    expect(loadConfig({ PRINTER_WS_URL: WS, BACKOFF_CEILING: "2147483" }).backoff.ceilingMs).toBe(2_147_483_000);
  });

  it("requires MQTT credentials in pairs", () => {
    const issues = configIssues(() =>
      loadConfig({ PRINTER_WS_URL: WS, MQTT_URL: "mqtt://broker.local:1883", MQTT_USER: "bridge" })
    );
    expect(issues).toEqual(["mqttUser: MQTT username and password must be set together"]);
  });

  it("rejects a backoff floor above the ceiling", () => {
    const issues = configIssues(() => loadConfig({ PRINTER_WS_URL: WS, BACKOFF_FLOOR: "120", BACKOFF_CEILING: "60" }));
    expect(issues).toEqual(["backoffFloor: must not exceed the backoff ceiling"]);
  });

  it("reads MQTT settings", () => {
    const config = loadConfig({
      PRINTER_WS_URL: WS,
      MQTT_URL: "mqtts://broker.local:8883",
      MQTT_TOPIC: "printers/office",
      MQTT_USER: "bridge",
      MQTT_PASS: "test-secret",
      MQTT_RETAIN: "yes",
      MQTT_TLS_INSECURE: "true",
    });
    expect(config.mqtt).toEqual({
      url: "mqtts://broker.local:8883",
      topic: "printers/office",
      username: "bridge",
      password: "test-secret",
      retain: true,
      rejectUnauthorized: false,
    });
    expect(redactConfig(config).mqtt?.password).toBe("***");
    expect(config.mqtt?.password).toBe("test-secret");
  });

  it("reads tolerances and log settings", () => {
    const config = loadConfig({
      PRINTER_WS_URL: WS,
      TOLERANCE_TEMPERATURE: "1.5",
      TOLERANCE_LAYERS: "0",
      LOG_LEVEL: "DEBUG",
      LOG_FILE: "bridge.log",
    });
    expect(config.tolerances).toEqual({ ...DEFAULT_TOLERANCES, temperature: 1.5, layers: 0 });
    expect(config.log).toEqual({ level: "debug", file: "bridge.log" });
  });

  it("lets flags win over the environment", () => {
    const flags = flagsFromArgs(["--ws-url", "wss://other.local/ws", "--stdout", "--publish-interval", "0.5"]);
    const config = loadConfig({ PRINTER_WS_URL: WS, PUBLISH_INTERVAL: "10" }, flags);
    expect(config.wsUrl).toBe("wss://other.local/ws");
    expect(config.publishIntervalMs).toBe(500);
    expect(config.stdout).toBe(true);
  });
});

describe("flagsFromArgs", () => {
  it("pairs names with values and keeps bare boolean flags", () => {
    expect(flagsFromArgs(["--ws-url", "ws://a:1/", "--stdout", "--topic", "--log-level", "warn", "stray"])).toEqual({
      "ws-url": "ws://a:1/",
      stdout: true,
      "log-level": "warn",
    });
  });
});
