/**
 * WsConnection - WebSocket connection wrapper with AsyncIterable support
 *
 * Yields inbound text frames in arrival order. Decoding is left to the feed so
 * malformed frames can be counted where they are handled.
 *
 * - AsyncIterable interface for `for await` consumption
 * - Reconnection-friendly: connect()/close()/isClosed(), one socket per connect
 */

import WebSocket from "ws";
import { logger } from "@crypto-monitor/utils";

const log = logger;

function rawDataToText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * Options for creating a WebSocket connection
 */
export interface WsConnectionOptions {
  url: string;

  /**
   * Optional headers to send during handshake (e.g. User-Agent)
   */
  headers?: Record<string, string>;

  /**
   * Label for logging (e.g. "binance:stream")
   */
  label?: string;

  /**
   * Abort the opening handshake after this many ms
   */
  handshakeTimeoutMs?: number;
}

/**
 * Interface for WebSocket connections used by the ingestor.
 * Both WsConnection and test fakes implement it.
 */
export interface IWsConnection extends AsyncIterable<string> {
  connect: () => Promise<void>;
  send: (data: string) => Promise<void>;
  close: () => Promise<void>;
  isClosed: () => boolean;
}

/**
 * Connection factory type for dependency injection in tests
 */
export type WsConnectionFactory = (url: string, label?: string) => IWsConnection;

/**
 * A WebSocket connection that implements AsyncIterable for message consumption.
 *
 * Usage:
 * ```ts
 * const conn = new WsConnection({ url: "wss://..." });
 * await conn.connect();
 * for await (const frame of conn) {
 *   // frame is the raw text payload
 * }
 * ```
 */
export class WsConnection implements IWsConnection {
  private ws: WebSocket | null = null;
  private closed = true;
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly label: string;
  private readonly handshakeTimeoutMs: number | undefined;

  // Queue for buffering incoming messages
  private queue: string[] = [];
  private pendingResolve: ((result: IteratorResult<string>) => void) | null = null;
  private pendingReject: ((error: unknown) => void) | null = null;
  private lastError: Error | null = null;

  constructor(options: WsConnectionOptions) {
    this.url = options.url;
    this.headers = options.headers ?? {};
    this.label = options.label ?? options.url;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs;
  }

  /**
   * Connect to the WebSocket server. Rejects if the handshake fails.
   */
  async connect(): Promise<void> {
    if (this.ws && !this.closed) {
      return;
    }

    return new Promise((resolve, reject) => {
      let opened = false;
      this.closed = false;
      this.lastError = null;
      this.queue = [];

      const ws = new WebSocket(this.url, {
        headers: this.headers,
        handshakeTimeout: this.handshakeTimeoutMs,
      });
      this.ws = ws;

      ws.on("open", () => {
        opened = true;
        log.debug(`WsConnection opened: ${this.label}`);
        resolve();
      });

      ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
        if (isBinary) {
          log.warn(`WsConnection ignored binary frame: ${this.label}`);
          return;
        }
        this.enqueue(rawDataToText(data));
      });

      ws.on("close", (code, reason) => {
        log.debug(`WsConnection closed: ${this.label}`, {
          code,
          reason: reason.toString("utf8"),
        });
        if (this.ws === ws) this.ws = null;
        this.handleClose();
      });

      ws.on("error", err => {
        log.warn(`WsConnection error: ${this.label}`, { error: err });
        this.lastError = err;

        if (!opened) {
          this.closed = true;
          if (this.ws === ws) this.ws = null;
          reject(err);
        } else {
          // Notify waiting iterator
          this.handleClose();
        }
      });
    });
  }

  /**
   * Send a text frame. Rejects when the socket is not open.
   */
  async send(data: string): Promise<void> {
    const ws = this.ws;
    if (!ws || this.closed || ws.readyState !== WebSocket.OPEN) {
      throw new Error(`WsConnection not open: ${this.label}`);
    }

    return new Promise((resolve, reject) => {
      ws.send(data, err => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Close the WebSocket connection
   */
  async close(): Promise<void> {
    if (this.closed) return;

    this.closed = true;

    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }

    // Wake up any pending iterator
    if (this.pendingResolve) {
      this.pendingResolve({ value: undefined, done: true });
      this.pendingResolve = null;
      this.pendingReject = null;
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  // =========================================================================
  // AsyncIterable Implementation
  // =========================================================================

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return {
      next: async (): Promise<IteratorResult<string>> => {
        // Return queued messages first
        const queued = this.queue.shift();
        if (queued !== undefined) {
          return { value: queued, done: false };
        }

        // If closed, end iteration
        if (this.closed) {
          if (this.lastError) {
            throw this.lastError;
          }
          return { value: undefined, done: true };
        }

        // Wait for next message
        return new Promise<IteratorResult<string>>((resolve, reject) => {
          this.pendingResolve = resolve;
          this.pendingReject = reject;
        });
      },

      return: async (): Promise<IteratorResult<string>> => {
        await this.close();
        return { value: undefined, done: true };
      },
    };
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private enqueue(message: string): void {
    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      this.pendingResolve = null;
      this.pendingReject = null;
      resolve({ value: message, done: false });
    } else {
      this.queue.push(message);
    }
  }

  private handleClose(): void {
    this.closed = true;

    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      const reject = this.pendingReject;
      this.pendingResolve = null;
      this.pendingReject = null;

      if (this.lastError && reject) {
        reject(this.lastError);
      } else {
        resolve({ value: undefined, done: true });
      }
    }
  }
}

/**
 * Default connection factory using WsConnection
 */
export const defaultConnectionFactory: WsConnectionFactory = (url: string, label?: string): IWsConnection => {
  return new WsConnection({
    url,
    headers: { "User-Agent": "crypto-monitor/0.1" },
    label,
    handshakeTimeoutMs: 10_000,
  });
};
