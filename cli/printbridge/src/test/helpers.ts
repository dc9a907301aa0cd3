import { Writable } from "node:stream";
import { pino, type Logger } from "pino";
import { BridgeConfig } from "../config.js";
import { DEFAULT_TOLERANCES } from "../change-filter.js";
import { StreamConnection, StreamConnector, StreamHandlers } from "../connection.js";
import { TransportError } from "../errors.js";
import { Delivery, Publisher } from "../publisher.js";

export function testConfig(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
  return {
    wsUrl: "ws://printer.test:9999/",
    imageUrl: "/local/print.png",
    publishIntervalMs: 1000,
    snapshot: null,
    tolerances: { ...DEFAULT_TOLERANCES },
    backoff: { floorMs: 5, ceilingMs: 40, jitterRatio: 0.2 },
    mqtt: null,
    log: { level: "silent" },
    stdout: false,
    ...overrides,
  };
}

export class FakeConnection implements StreamConnection {
  closed = false;

  constructor(private handlers: StreamHandlers) {}

  send(frame: string | Record<string, unknown>) {
    this.handlers.onMessage(typeof frame === "string" ? frame : JSON.stringify(frame));
  }

  drop(message = "connection reset") {
    this.handlers.onClose(new TransportError(message));
  }

  close() {
    this.closed = true;
  }
}

/** Each connect() consumes one entry of plan; an empty plan means success. */
export class FakeConnector implements StreamConnector {
  attempts = 0;
  connections: FakeConnection[] = [];

  constructor(private plan: Array<"fail" | "ok"> = [], private alwaysFail = false) {}

  connect(_url: string, handlers: StreamHandlers, signal: AbortSignal): Promise<StreamConnection> {
    this.attempts += 1;
    if (signal.aborted) return Promise.reject(new TransportError("aborted"));
    const step = this.plan.shift() ?? (this.alwaysFail ? "fail" : "ok");
    if (step === "fail") return Promise.reject(new TransportError("connection refused"));
    const connection = new FakeConnection(handlers);
    this.connections.push(connection);
    return Promise.resolve(connection);
  }

  latest(): FakeConnection {
    const connection = this.connections[this.connections.length - 1];
    if (!connection) throw new Error("no connection yet");
    return connection;
  }
}

export class RecordingPublisher implements Publisher {
  deliveries: Delivery[] = [];
  failWith: Error | null = null;
  closed = false;

  async publish(delivery: Delivery) {
    this.deliveries.push(delivery);
    if (this.failWith) throw this.failWith;
  }

  async close() {
    this.closed = true;
  }
}

export function captureLogger(level: "debug" | "info" = "debug"): { logger: Logger; lines: () => Array<Record<string, unknown>> } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _enc, cb) {
      chunks.push(String(chunk));
      cb();
    },
  });
  const logger = pino({ level }, stream);
  const lines = () =>
    chunks
      .join("")
      .split("\n")
      .filter(Boolean)
      .map((line): Record<string, unknown> => JSON.parse(line));
  return { logger, lines };
}

export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) throw new Error("timed out waiting for condition");
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
