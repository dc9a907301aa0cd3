import { connect, type IClientOptions, type IClientPublishOptions, type MqttClient } from "mqtt";
import type { Logger } from "pino";
import type { Writable } from "node:stream";
import { TransportError } from "./errors.js";
import { CanonicalRecord, PublishPayload } from "./schema.js";
import { isoFromMs } from "./util.js";

export type PublishReason = "changed" | "refresh";

export type Delivery = {
  reason: PublishReason;
  ts: number;
  record: CanonicalRecord;
  payload: PublishPayload;
};

/**
 * Boundary to the host. "changed" deliveries passed the change filter;
 * "refresh" deliveries only keep host-side state fresh.
 */
export interface Publisher {
  publish(delivery: Delivery): Promise<void>;
  close(): Promise<void>;
}

export type MqttLike = {
  readonly connected: boolean;
  publishAsync(topic: string, message: string, opts?: IClientPublishOptions): Promise<unknown>;
  endAsync(force?: boolean): Promise<void>;
};

export type MqttPublisherOptions = {
  topic: string;
  retain?: boolean;
  qos?: 0 | 1;
};

export class MqttPublisher implements Publisher {
  constructor(private client: MqttLike, private options: MqttPublisherOptions) {}

  async publish(delivery: Delivery) {
    if (delivery.reason !== "changed") return;
    if (!this.client.connected) throw new TransportError("mqtt broker not connected");
    await this.client.publishAsync(this.options.topic, JSON.stringify(delivery.payload), {
      qos: this.options.qos ?? 0,
      retain: this.options.retain ?? false,
    });
  }

  async close() {
    await this.client.endAsync();
  }
}

export type MqttConnectOptions = {
  url: string;
  username?: string;
  password?: string;
  rejectUnauthorized: boolean;
  clientId?: string;
};

export function createMqttClient(options: MqttConnectOptions, logger: Logger): MqttClient {
  const log = logger.child({ component: "mqtt" });
  const clientOptions: IClientOptions = {
    clientId: options.clientId ?? `printbridge-${process.pid}`,
    reconnectPeriod: 5000,
    connectTimeout: 10_000,
    rejectUnauthorized: options.rejectUnauthorized,
  };
  if (options.username && options.password) {
    clientOptions.username = options.username;
    clientOptions.password = options.password;
  }
  const client = connect(options.url, clientOptions);
  let offline = false;
  client.on("connect", () => {
    offline = false;
    log.info({ url: options.url }, "connected to mqtt broker");
  });
  client.on("offline", () => {
    if (offline) return;
    offline = true;
    log.warn("mqtt broker offline, client will reconnect");
  });
  client.on("error", (err) => {
    log.error({ err }, "mqtt client error");
  });
  return client;
}

/** Writes one JSON line per delivery, for hosts that read the bridge's stdout. */
export class NdjsonPublisher implements Publisher {
  constructor(private out: Writable = process.stdout) {}

  async publish(delivery: Delivery) {
    const line = JSON.stringify({ ts: isoFromMs(delivery.ts), reason: delivery.reason, payload: delivery.payload });
    await new Promise<void>((resolve, reject) => {
      this.out.write(`${line}\n`, (err) => (err ? reject(err) : resolve()));
    });
  }

  async close() {
    // stdout stays open for the process lifetime
  }
}

export class FanoutPublisher implements Publisher {
  constructor(private publishers: Publisher[]) {}

  async publish(delivery: Delivery) {
    await settleAll(this.publishers.map((p) => p.publish(delivery)), "publish failed");
  }

  async close() {
    await settleAll(this.publishers.map((p) => p.close()), "close failed");
  }
}

async function settleAll(tasks: Promise<void>[], message: string) {
  const results = await Promise.allSettled(tasks);
  const errors = results.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
  if (errors.length === 1) throw errors[0];
  if (errors.length > 1) throw new AggregateError(errors, message);
}
