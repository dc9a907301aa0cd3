import type { Logger } from "pino";
import { backoffBase, backoffDelay, sleep } from "./backoff.js";
import { ChangeFilter } from "./change-filter.js";
import { BridgeConfig } from "./config.js";
import { StreamConnection, StreamConnector } from "./connection.js";
import { BridgeError, ParseError, ShutdownRequested, TransportError } from "./errors.js";
import { Delivery, Publisher, PublishReason } from "./publisher.js";
import { sanitize } from "./sanitize.js";
import { CanonicalRecord, SessionCounters, SessionPhase, SessionState, toPayload } from "./schema.js";
import { fetchSnapshot, SnapshotFetcher, SnapshotResult } from "./snapshot.js";
import { errorMessage, isPlainObject, nowMs, safeJsonParse } from "./util.js";

export type SessionHooks = {
  onPhase?: (phase: SessionPhase) => void;
  onRecord?: (record: CanonicalRecord) => void;
  onDelivery?: (delivery: Delivery) => void;
  onFault?: (err: BridgeError) => void;
  onSnapshot?: (result: SnapshotResult) => void;
  onBackoff?: (info: { failures: number; baseMs: number; delayMs: number }) => void;
};

export type SessionOptions = {
  config: BridgeConfig;
  connector: StreamConnector;
  publisher: Publisher;
  logger: Logger;
  hooks?: SessionHooks;
  fetchSnapshot?: SnapshotFetcher;
  random?: () => number;
  now?: () => number;
};

const FRAME_PREVIEW_CHARS = 200;

/**
 * Owns one printer stream: connects, reads frames through the sanitizer and
 * change filter into the publisher, refreshes the job snapshot on its own
 * cadence, and reconnects with jittered backoff until stop() is called.
 */
export class StreamSession {
  private config: BridgeConfig;
  private connector: StreamConnector;
  private publisher: Publisher;
  private log: Logger;
  private hooks: SessionHooks;
  private fetcher: SnapshotFetcher;
  private random: () => number;
  private now: () => number;

  private filter: ChangeFilter;
  private abort = new AbortController();
  private running?: Promise<void>;
  private connection: StreamConnection | null = null;
  private cadenceTimer?: NodeJS.Timeout;
  private snapshotTask?: Promise<void>;
  private snapshotAbort?: AbortController;
  private snapshotPending = false;
  private forceNextPublish = false;
  private failureReported = false;
  private snapshotFailing = false;
  private publishFailing = false;

  private phase: SessionPhase = "disconnected";
  private lastRecord: CanonicalRecord | null = null;
  private lastDeliveryAt = 0;
  private lastSnapshotAt = 0;
  private currentJob: string | null = null;
  private consecutiveFailures = 0;
  private backoffMs: number;
  private counters: SessionCounters = {
    frames_in: 0,
    frames_bad: 0,
    published: 0,
    refreshes: 0,
    publish_failed: 0,
    snapshots_ok: 0,
    snapshots_failed: 0,
  };

  constructor(options: SessionOptions) {
    this.config = options.config;
    this.connector = options.connector;
    this.publisher = options.publisher;
    this.log = options.logger.child({ component: "session" });
    this.hooks = options.hooks ?? {};
    this.fetcher = options.fetchSnapshot ?? fetchSnapshot;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? nowMs;
    this.filter = new ChangeFilter(options.config.tolerances);
    this.backoffMs = options.config.backoff.floorMs;
  }

  /** Runs until stop(); the returned promise never rejects. */
  start(): Promise<void> {
    if (!this.running) this.running = this.run();
    return this.running;
  }

  async stop() {
    if (!this.abort.signal.aborted) {
      this.log.info("shutdown requested");
      this.abort.abort(new ShutdownRequested());
    }
    this.snapshotAbort?.abort(new ShutdownRequested());
    await this.running;
    await this.snapshotTask;
  }

  getState(): SessionState {
    return {
      phase: this.phase,
      lastRecord: this.lastRecord ? { ...this.lastRecord } : null,
      lastPublished: this.filter.getLastPublished(),
      lastDeliveryAt: this.lastDeliveryAt,
      lastSnapshotAt: this.lastSnapshotAt,
      snapshotInFlight: this.snapshotTask !== undefined,
      currentJob: this.currentJob,
      consecutiveFailures: this.consecutiveFailures,
      backoffMs: this.backoffMs,
      counters: { ...this.counters },
    };
  }

  private async run() {
    const signal = this.abort.signal;
    this.cadenceTimer = setInterval(() => {
      if (this.phase === "connected") this.maybeFetchSnapshot(false);
    }, this.config.publishIntervalMs);
    try {
      while (!signal.aborted) {
        this.setPhase("connecting");
        const failure = await this.connectAndReceive(signal);
        if (signal.aborted) break;
        this.setPhase("disconnected");
        const completed = await this.backoff(failure ?? new TransportError("stream ended"), signal);
        if (!completed) break;
      }
    } catch (err: unknown) {
      this.log.error({ err }, "session loop failed");
    } finally {
      clearInterval(this.cadenceTimer);
      this.snapshotAbort?.abort(new ShutdownRequested());
      this.connection?.close();
      this.connection = null;
      this.setPhase("stopped");
    }
  }

  private async connectAndReceive(signal: AbortSignal): Promise<TransportError | null> {
    let settle: (err: TransportError | null) => void = () => undefined;
    const closed = new Promise<TransportError | null>((resolve) => {
      settle = resolve;
    });

    let connection: StreamConnection;
    try {
      connection = await this.connector.connect(
        this.config.wsUrl,
        {
          onMessage: (text) => this.onMessage(text),
          onClose: (err) => settle(err),
        },
        signal
      );
    } catch (err: unknown) {
      if (signal.aborted) return null;
      return err instanceof TransportError ? err : new TransportError(`connect failed: ${errorMessage(err)}`, { cause: err });
    }

    this.connection = connection;
    this.consecutiveFailures = 0;
    this.backoffMs = this.config.backoff.floorMs;
    this.failureReported = false;
    this.setPhase("connected");
    this.log.info({ url: this.config.wsUrl }, "stream connected");

    const onAbort = () => settle(null);
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });

    const result = await closed;
    signal.removeEventListener("abort", onAbort);
    connection.close();
    this.connection = null;
    return result;
  }

  private async backoff(err: TransportError, signal: AbortSignal): Promise<boolean> {
    this.consecutiveFailures += 1;
    const baseMs = backoffBase(this.consecutiveFailures, this.config.backoff);
    const delayMs = backoffDelay(this.consecutiveFailures, this.config.backoff, this.random);
    this.backoffMs = delayMs;
    this.setPhase("backoff");
    this.callHook("onFault", (h) => h.onFault?.(err));
    this.callHook("onBackoff", (h) => h.onBackoff?.({ failures: this.consecutiveFailures, baseMs, delayMs }));

    if (!this.failureReported) {
      this.failureReported = true;
      this.log.error({ err: err.message, retry_ms: delayMs }, "stream unavailable, reconnecting with backoff");
    } else {
      this.log.debug({ failures: this.consecutiveFailures, retry_ms: delayMs }, "reconnect attempt failed");
    }
    return sleep(delayMs, signal);
  }

  private onMessage(text: string) {
    try {
      this.handleFrame(text);
    } catch (err: unknown) {
      this.log.error({ err }, "frame handling failed");
    }
  }

  private handleFrame(text: string) {
    this.counters.frames_in++;
    const parsed = safeJsonParse(text);
    if (!parsed.ok || !isPlainObject(parsed.value)) {
      this.counters.frames_bad++;
      const reason = parsed.ok ? "frame is not a JSON object" : parsed.error;
      const err = new ParseError(reason, text.slice(0, FRAME_PREVIEW_CHARS));
      this.log.warn({ err: reason, frame: err.frame }, "skipping malformed frame");
      this.callHook("onFault", (h) => h.onFault?.(err));
      return;
    }

    const frame = parsed.value;
    const record = sanitize(frame, this.lastRecord, {
      imageUrl: this.config.imageUrl,
      onInvalidField: (err) => this.log.debug({ field: err.field, value: err.value }, "field rejected, keeping last value"),
    });
    this.lastRecord = record;
    this.callHook("onRecord", (h) => h.onRecord?.(record));

    if (!this.trackJob(frame, record)) this.maybeFetchSnapshot(false);
    this.deliver(record);
  }

  // A frame reporting progress 0 ends the current job; a filename seen with progress starts one.
  private trackJob(frame: Record<string, unknown>, record: CanonicalRecord): boolean {
    const reportsProgress = "progress" in frame || "printProgress" in frame;
    if (reportsProgress && record.progress === 0) this.currentJob = null;
    if (!record.filename || record.progress === 0 || record.filename === this.currentJob) return false;
    this.currentJob = record.filename;
    this.log.info({ filename: record.filename }, "new print job");
    this.maybeFetchSnapshot(true);
    return true;
  }

  private deliver(record: CanonicalRecord) {
    const changed = this.filter.offer(record);
    if (changed || this.forceNextPublish) {
      if (!changed) this.filter.force(record);
      this.forceNextPublish = false;
      this.send("changed", record);
      return;
    }
    if (this.now() - this.lastDeliveryAt >= this.config.publishIntervalMs) {
      this.send("refresh", record);
    }
  }

  private send(reason: PublishReason, record: CanonicalRecord) {
    const ts = this.now();
    const delivery: Delivery = { reason, ts, record, payload: toPayload(record) };
    this.lastDeliveryAt = ts;
    if (reason === "changed") this.counters.published++;
    else this.counters.refreshes++;
    this.callHook("onDelivery", (h) => h.onDelivery?.(delivery));
    if (reason === "changed") this.log.info({ payload: delivery.payload }, "published");

    void this.publisher.publish(delivery).then(
      () => {
        this.publishFailing = false;
      },
      (err: unknown) => {
        this.counters.publish_failed++;
        const fault = err instanceof BridgeError ? err : new TransportError(`publish failed: ${errorMessage(err)}`, { cause: err });
        this.callHook("onFault", (h) => h.onFault?.(fault));
        if (!this.publishFailing) this.log.warn({ err: errorMessage(err) }, "publish failed, waiting for next record");
        this.publishFailing = true;
      }
    );
  }

  private maybeFetchSnapshot(force: boolean) {
    const snapshot = this.config.snapshot;
    if (!snapshot || this.abort.signal.aborted) return;
    const now = this.now();
    if (!force && now - this.lastSnapshotAt < snapshot.intervalMs) return;
    if (this.snapshotTask) {
      if (force) this.snapshotPending = true;
      this.log.debug("snapshot fetch already in flight, skipping trigger");
      return;
    }

    this.lastSnapshotAt = now;
    this.snapshotPending = false;
    const controller = new AbortController();
    this.snapshotAbort = controller;
    this.snapshotTask = this.fetcher({
      url: snapshot.url,
      destinationPath: snapshot.localPath,
      maxBytes: snapshot.maxBytes,
      allowedContentTypes: snapshot.allowedContentTypes,
      timeoutMs: snapshot.timeoutMs,
      signal: controller.signal,
    })
      .then((result) => this.onSnapshot(result))
      .catch((err: unknown) => {
        this.log.error({ err }, "snapshot task failed");
      })
      .finally(() => {
        this.snapshotTask = undefined;
        this.snapshotAbort = undefined;
        if (this.snapshotPending) this.maybeFetchSnapshot(true);
      });
  }

  private onSnapshot(result: SnapshotResult) {
    if (this.abort.signal.aborted) return;
    this.callHook("onSnapshot", (h) => h.onSnapshot?.(result));
    if (result.ok) {
      this.counters.snapshots_ok++;
      this.snapshotFailing = false;
      this.forceNextPublish = true;
      this.log.info({ bytes: result.bytes, path: result.path }, "snapshot saved");
      return;
    }
    this.counters.snapshots_failed++;
    this.callHook("onFault", (h) => h.onFault?.(result.error));
    if (!this.snapshotFailing) {
      this.log.warn({ kind: result.error.kind, err: result.error.message }, "snapshot fetch failed, keeping previous image");
    } else {
      this.log.debug({ kind: result.error.kind }, "snapshot fetch failed again");
    }
    this.snapshotFailing = true;
  }

  private setPhase(phase: SessionPhase) {
    if (this.phase === phase) return;
    this.phase = phase;
    this.callHook("onPhase", (h) => h.onPhase?.(phase));
  }

  // Hooks belong to the caller; a throwing hook must not end the session.
  private callHook(name: keyof SessionHooks, call: (hooks: SessionHooks) => void) {
    try {
      call(this.hooks);
    } catch (err: unknown) {
      this.log.warn({ hook: name, err }, "session hook threw");
    }
  }
}
