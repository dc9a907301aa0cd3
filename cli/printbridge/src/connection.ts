import { WebSocket, type RawData } from "ws";
import { ShutdownRequested, TransportError } from "./errors.js";
import { errorMessage } from "./util.js";

export type StreamHandlers = {
  onMessage: (text: string) => void;
  /** Called once when the connection ends for any reason other than close(). */
  onClose: (err: TransportError) => void;
};

export interface StreamConnection {
  close(): void;
}

export interface StreamConnector {
  connect(url: string, handlers: StreamHandlers, signal: AbortSignal): Promise<StreamConnection>;
}

export type WsConnectorOptions = {
  maxPayloadBytes?: number;
  handshakeTimeoutMs?: number;
  pingIntervalMs?: number;
};

export class WsConnector implements StreamConnector {
  private maxPayloadBytes: number;
  private handshakeTimeoutMs: number;
  private pingIntervalMs: number;

  constructor(options: WsConnectorOptions = {}) {
    this.maxPayloadBytes = options.maxPayloadBytes ?? 2 ** 20;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? 10_000;
    this.pingIntervalMs = options.pingIntervalMs ?? 20_000;
  }

  connect(url: string, handlers: StreamHandlers, signal: AbortSignal): Promise<StreamConnection> {
    return new Promise((resolve, reject) => {
      if (signal.aborted) {
        reject(new ShutdownRequested());
        return;
      }
      const ws = new WebSocket(url, {
        maxPayload: this.maxPayloadBytes,
        handshakeTimeout: this.handshakeTimeoutMs,
      });
      let opened = false;
      let closedByUs = false;
      let lastError: Error | undefined;
      let heartbeat: NodeJS.Timeout | undefined;
      let awaitingPong = false;

      const onAbort = () => {
        closedByUs = true;
        ws.terminate();
        if (!opened) reject(new ShutdownRequested());
      };
      signal.addEventListener("abort", onAbort, { once: true });

      const connection: StreamConnection = {
        close: () => {
          closedByUs = true;
          signal.removeEventListener("abort", onAbort);
          if (heartbeat) clearInterval(heartbeat);
          ws.terminate();
        },
      };

      ws.on("open", () => {
        opened = true;
        heartbeat = setInterval(() => {
          if (awaitingPong) {
            lastError = new Error("heartbeat timeout");
            ws.terminate();
            return;
          }
          awaitingPong = true;
          ws.ping();
        }, this.pingIntervalMs);
        resolve(connection);
      });

      ws.on("pong", () => {
        awaitingPong = false;
      });

      ws.on("message", (data: RawData, isBinary: boolean) => {
        if (isBinary) return;
        handlers.onMessage(rawToString(data));
      });

      ws.on("error", (err: Error) => {
        lastError = err;
      });

      ws.on("close", (code: number, reason: Buffer) => {
        if (heartbeat) clearInterval(heartbeat);
        signal.removeEventListener("abort", onAbort);
        if (!opened) {
          if (!closedByUs) reject(new TransportError(`connect failed: ${errorMessage(lastError, `closed (${code})`)}`, { cause: lastError }));
          return;
        }
        if (closedByUs) return;
        const detail = lastError ? errorMessage(lastError) : `closed (${code}${reason.length ? ` ${reason.toString()}` : ""})`;
        handlers.onClose(new TransportError(`stream ${detail}`, { cause: lastError }));
      });
    });
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}
