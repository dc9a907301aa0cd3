#!/usr/bin/env node
import type { Logger } from "pino";
import { BridgeConfig, flagsFromArgs, loadConfig, redactConfig } from "./config.js";
import { WsConnector } from "./connection.js";
import { ConfigError } from "./errors.js";
import { createLogger } from "./logger.js";
import { createMqttClient, FanoutPublisher, MqttPublisher, NdjsonPublisher, Publisher } from "./publisher.js";
import { StreamSession } from "./session.js";
import { fetchSnapshot } from "./snapshot.js";

const args = process.argv.slice(2);
const cmd = args[0] ?? "help";

function hasFlag(flag: string) {
  return args.includes(flag);
}

function usage(exitCode = 0): never {
  console.log(`printbridge <command> [options]

Commands:
  run [--ws-url <url>] [--snapshot-url <url> --image-path <path>] [--mqtt-url <url>] [--stdout]
  snapshot [--snapshot-url <url>] [--image-path <path>]
  check-config
  help

Options (each also readable from the environment):
  --ws-url <url>              PRINTER_WS_URL        printer telemetry stream (ws:// or wss://)
  --snapshot-url <url>        PRINTER_SNAPSHOT_URL  job thumbnail (http:// or https://)
  --image-path <path>         LOCAL_IMAGE_PATH      where the thumbnail is stored
  --image-url <path>          EXPOSED_IMAGE_PATH    image reference put in published records
  --publish-interval <s>      PUBLISH_INTERVAL      default 2
  --snapshot-interval <s>     SNAPSHOT_INTERVAL     default 60
  --max-image-bytes <n>       MAX_IMAGE_BYTES       default 5242880
  --mqtt-url <url>            MQTT_URL              publish to an MQTT broker
  --topic <topic>             MQTT_TOPIC            default printbridge/status
  --log-level <level>         LOG_LEVEL             default info
  --log-file <path>           LOG_FILE
  --stdout                                          write records to stdout as NDJSON
`);
  process.exit(exitCode);
}

if (hasFlag("--help") || cmd === "--help") {
  usage(0);
}

function readConfig(): BridgeConfig {
  try {
    return loadConfig(process.env, flagsFromArgs(args.slice(1)));
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error("Invalid configuration:");
      for (const issue of err.issues) console.error(`  ${issue}`);
      process.exit(1);
    }
    throw err;
  }
}

function buildPublisher(config: BridgeConfig, logger: Logger): Publisher {
  const publishers: Publisher[] = [];
  if (config.mqtt) {
    const client = createMqttClient(
      {
        url: config.mqtt.url,
        username: config.mqtt.username,
        password: config.mqtt.password,
        rejectUnauthorized: config.mqtt.rejectUnauthorized,
      },
      logger
    );
    publishers.push(new MqttPublisher(client, { topic: config.mqtt.topic, retain: config.mqtt.retain }));
  }
  if (config.stdout) publishers.push(new NdjsonPublisher(process.stdout));
  if (publishers.length === 0) {
    logger.warn("no MQTT broker or --stdout configured; records are only logged");
  }
  return new FanoutPublisher(publishers);
}

async function cmdRun() {
  const config = readConfig();
  const logger = createLogger({ level: config.log.level, file: config.log.file, useStderr: config.stdout });
  const publisher = buildPublisher(config, logger);
  const session = new StreamSession({
    config,
    connector: new WsConnector(),
    publisher,
    logger,
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "stopping");
    void session.stop();
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  logger.info({ ws_url: config.wsUrl, snapshots: Boolean(config.snapshot), mqtt: Boolean(config.mqtt) }, "printbridge starting");
  await session.start();
  try {
    await publisher.close();
  } catch (err: unknown) {
    logger.warn({ err }, "publisher did not close cleanly");
  }
  logger.info({ counters: session.getState().counters }, "printbridge stopped");
  logger.flush();
}

async function cmdSnapshot() {
  const config = readConfig();
  if (!config.snapshot) {
    console.error("--snapshot-url and --image-path are required");
    process.exit(1);
  }
  const result = await fetchSnapshot({
    url: config.snapshot.url,
    destinationPath: config.snapshot.localPath,
    maxBytes: config.snapshot.maxBytes,
    allowedContentTypes: config.snapshot.allowedContentTypes,
    timeoutMs: config.snapshot.timeoutMs,
  });
  if (!result.ok) {
    console.error(`${result.error.kind}: ${result.error.message}`);
    process.exit(2);
  }
  console.log(`saved ${result.bytes} bytes (${result.contentType ?? "no content type"}) to ${result.path}`);
}

async function cmdCheckConfig() {
  console.log(JSON.stringify(redactConfig(readConfig()), null, 2));
}

if (cmd === "run") {
  await cmdRun();
} else if (cmd === "snapshot") {
  await cmdSnapshot();
} else if (cmd === "check-config") {
  await cmdCheckConfig();
} else {
  usage(cmd === "help" ? 0 : 1);
}
