/**
 * Stream Ingestor
 *
 * Owns the market data connection:
 * - Opens the feed's WebSocket and subscribes every tracked symbol
 * - Decodes frames, applies them to MarketState, hands accepted records to the sink
 * - Reconnects with exponential backoff; a stale-stream watchdog forces a reconnect
 * - Resynchronizes a symbol's book from a REST snapshot when the stream sequence breaks
 *
 * State machine:
 *   disconnected -> connecting -> connected -> disconnected (drop) -> connecting (backoff) ...
 *   any -> closing -> disconnected (terminal, after close())
 */

import {
  defaultConnectionFactory,
  type IWsConnection,
  type MarketFeedPort,
  type WsConnectionFactory,
} from "@crypto-monitor/adapters";
import { computeBackoffDelayMs, DEFAULT_RECONNECT_BACKOFF, logger, type BackoffConfig } from "@crypto-monitor/utils";

import { toBookUpdate, toTradeRecord } from "../records";
import type { ConnectionState, OrderBookUpdate, RecordSink, TradeRecord } from "../types";
import type { MarketState, MarketStateError } from "./market-state";

export type ResyncOutcome = "applied" | "discarded" | "unavailable" | "failed";

export type IngestorEvent =
  | { type: "state"; state: ConnectionState; ts: Date; reason?: string }
  | { type: "trade"; trade: TradeRecord }
  | { type: "book"; book: OrderBookUpdate }
  | { type: "decode_error"; message: string }
  | { type: "resync"; symbol: string; outcome: ResyncOutcome }
  | { type: "reconnect_scheduled"; delayMs: number; attempt: number; reason: string };

export interface IngestorStats {
  messages: number;
  trades: number;
  books: number;
  decodeErrors: number;
  duplicateTrades: number;
  unknownSymbols: number;
  sequenceRejections: number;
  resyncs: number;
  reconnects: number;
  staleReconnects: number;
  lastMessageAt: Date | null;
}

export interface StreamIngestorDeps {
  feed: MarketFeedPort;
  symbols: readonly string[];
  market: MarketState;
  sink: RecordSink;
  connectionFactory?: WsConnectionFactory;
  reconnectBackoff?: BackoffConfig;
  /**
   * Force a reconnect after this long without any inbound frame (0 disables)
   */
  staleTimeoutMs?: number;
}

export class StreamIngestor {
  private readonly feed: MarketFeedPort;
  private readonly symbols: readonly string[];
  private readonly market: MarketState;
  private readonly sink: RecordSink;
  private readonly connectionFactory: WsConnectionFactory;
  private readonly reconnectBackoff: BackoffConfig;
  private readonly staleTimeoutMs: number;

  private state: ConnectionState = "disconnected";
  private connection: IWsConnection | null = null;
  // Bumped whenever the current socket is abandoned; loops of older sessions stop quietly.
  private session = 0;
  private closedForGood = false;
  private closePromise: Promise<void> | null = null;

  private reconnectAttempt = 0;
  private reconnectTimeoutId: ReturnType<typeof setTimeout> | null = null;
  private watchdogId: ReturnType<typeof setInterval> | null = null;
  private lastMessageAtMs = 0;

  private readonly lastTradeIds = new Map<string, number>();
  private readonly resyncing = new Set<string>();
  private eventHandlers: ((event: IngestorEvent) => void)[] = [];

  private readonly stats: IngestorStats = {
    messages: 0,
    trades: 0,
    books: 0,
    decodeErrors: 0,
    duplicateTrades: 0,
    unknownSymbols: 0,
    sequenceRejections: 0,
    resyncs: 0,
    reconnects: 0,
    staleReconnects: 0,
    lastMessageAt: null,
  };

  constructor(deps: StreamIngestorDeps) {
    this.feed = deps.feed;
    this.symbols = [...deps.symbols];
    this.market = deps.market;
    this.sink = deps.sink;
    this.connectionFactory = deps.connectionFactory ?? defaultConnectionFactory;
    this.reconnectBackoff = deps.reconnectBackoff ?? DEFAULT_RECONNECT_BACKOFF;
    this.staleTimeoutMs = deps.staleTimeoutMs ?? 0;
  }

  getState(): ConnectionState {
    return this.state;
  }

  getStats(): IngestorStats {
    return { ...this.stats };
  }

  /**
   * Register an event handler. Returns a function that removes it.
   */
  onEvent(handler: (event: IngestorEvent) => void): () => void {
    this.eventHandlers.push(handler);
    return () => {
      this.eventHandlers = this.eventHandlers.filter(h => h !== handler);
    };
  }

  /**
   * Open the stream. Failures schedule a reconnect; this never rejects.
   * Only acts from "disconnected".
   */
  async connect(): Promise<void> {
    if (this.closedForGood || this.state !== "disconnected") return;

    const session = ++this.session;
    this.setState("connecting");

    const conn = this.connectionFactory(this.feed.streamUrl(), `${this.feed.exchange}:stream`);
    this.connection = conn;

    try {
      await conn.connect();
      for (const message of this.feed.subscribeMessages(this.symbols)) {
        await conn.send(message);
      }
    } catch (error: unknown) {
      if (session !== this.session) return;

      logger.warn("Market data connection failed", { exchange: this.feed.exchange, error });
      this.connection = null;
      await this.closeConnection(conn);
      if (session !== this.session) return;
      this.setState("disconnected", "connect_failed");
      this.scheduleReconnect("connect_failed");
      return;
    }

    if (session !== this.session) {
      await this.closeConnection(conn);
      return;
    }

    this.reconnectAttempt = 0;
    this.lastMessageAtMs = Date.now();
    this.setState("connected");
    logger.info("Market data connected", { exchange: this.feed.exchange, symbols: this.symbols.join(",") });
    this.startWatchdog();
    void this.readLoop(conn, session);
  }

  /**
   * Drop the current session (whatever its state) and connect again with a fresh backoff.
   * No-op after close().
   */
  async reconnect(): Promise<void> {
    if (this.closedForGood) return;

    const session = ++this.session;
    this.clearReconnectTimer();
    this.stopWatchdog();
    this.reconnectAttempt = 0;

    const conn = this.connection;
    this.connection = null;
    if (conn) await this.closeConnection(conn);

    if (session !== this.session) return;
    this.setState("disconnected", "reconnect_requested");
    await this.connect();
  }

  /**
   * Stop for good: cancel any pending reconnect and close the socket. Idempotent.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.closeOnce();
    }
    return this.closePromise;
  }

  // ===========================================================================
  // Session
  // ===========================================================================

  private async closeOnce(): Promise<void> {
    this.closedForGood = true;
    this.setState("closing");
    this.clearReconnectTimer();
    this.stopWatchdog();
    this.session++;

    const conn = this.connection;
    this.connection = null;
    if (conn) await this.closeConnection(conn);

    this.setState("disconnected", "closed");
    logger.info("Market data ingestor closed", { messages: this.stats.messages });
  }

  private async readLoop(conn: IWsConnection, session: number): Promise<void> {
    let reason = "stream_ended";

    try {
      for await (const raw of conn) {
        if (session !== this.session) return;
        this.handleMessage(raw);
      }
    } catch (error: unknown) {
      reason = "stream_error";
      if (session === this.session) {
        logger.warn("Market data stream failed", { exchange: this.feed.exchange, error });
      }
    }

    if (session !== this.session) return;

    logger.warn("Market data stream ended; scheduling reconnect", { reason });
    this.connection = null;
    this.stopWatchdog();
    this.setState("disconnected", reason);
    this.scheduleReconnect(reason);
  }

  private scheduleReconnect(reason: string): void {
    if (this.closedForGood || this.reconnectTimeoutId) return;

    const delayMs = computeBackoffDelayMs(this.reconnectBackoff, this.reconnectAttempt);
    this.reconnectAttempt++;
    this.stats.reconnects++;

    this.emit({ type: "reconnect_scheduled", delayMs, attempt: this.reconnectAttempt, reason });
    logger.info(`Scheduling reconnect in ${delayMs}ms (attempt ${this.reconnectAttempt})`, { reason });

    this.reconnectTimeoutId = setTimeout(() => {
      this.reconnectTimeoutId = null;
      void this.connect();
    }, delayMs);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimeoutId) {
      clearTimeout(this.reconnectTimeoutId);
      this.reconnectTimeoutId = null;
    }
  }

  private startWatchdog(): void {
    this.stopWatchdog();
    if (this.staleTimeoutMs <= 0) return;

    const periodMs = Math.max(250, Math.floor(this.staleTimeoutMs / 4));
    this.watchdogId = setInterval(() => {
      if (this.state !== "connected") return;

      const quietMs = Date.now() - this.lastMessageAtMs;
      if (quietMs < this.staleTimeoutMs) return;

      logger.warn("Stale watchdog: forcing market-data reconnect", {
        quietMs,
        staleTimeoutMs: this.staleTimeoutMs,
      });
      this.stats.staleReconnects++;
      void this.reconnect();
    }, periodMs);
  }

  private stopWatchdog(): void {
    if (this.watchdogId) {
      clearInterval(this.watchdogId);
      this.watchdogId = null;
    }
  }

  private async closeConnection(conn: IWsConnection): Promise<void> {
    try {
      await conn.close();
    } catch (error: unknown) {
      logger.warn("Closing market data connection failed", { error });
    }
  }

  private setState(next: ConnectionState, reason?: string): void {
    if (this.state === next) return;
    this.state = next;
    this.emit({ type: "state", state: next, ts: new Date(), ...(reason !== undefined ? { reason } : {}) });
  }

  // ===========================================================================
  // Inbound
  // ===========================================================================

  private handleMessage(raw: string): void {
    this.lastMessageAtMs = Date.now();
    this.stats.messages++;
    this.stats.lastMessageAt = new Date(this.lastMessageAtMs);

    const decoded = this.feed.decode(raw);
    if (decoded.isErr()) {
      const error = decoded.error;
      this.stats.decodeErrors++;
      if (error.type === "subscription_failed") {
        logger.error("Subscription rejected by venue", { message: error.message });
      } else {
        logger.warn("Skipping undecodable message", { type: error.type, message: error.message });
      }
      this.emit({ type: "decode_error", message: error.message });
      return;
    }

    const receivedAt = new Date(this.lastMessageAtMs);
    for (const event of decoded.value) {
      if (event.type === "trade") {
        this.handleTrade(toTradeRecord(event, receivedAt));
      } else {
        this.handleBook(toBookUpdate(event, receivedAt));
      }
    }
  }

  private handleTrade(trade: TradeRecord): void {
    const { tradeId } = trade;
    if (tradeId !== undefined) {
      const last = this.lastTradeIds.get(trade.symbol);
      if (last !== undefined && tradeId <= last) {
        this.stats.duplicateTrades++;
        return;
      }
    }

    const result = this.market.recordTrade(trade);
    if (result.isErr()) {
      this.handleRejected(result.error);
      return;
    }

    if (tradeId !== undefined) this.lastTradeIds.set(trade.symbol, tradeId);
    this.stats.trades++;
    this.sink.enqueue({ kind: "trade", trade });
    this.emit({ type: "trade", trade });
  }

  private handleBook(book: OrderBookUpdate): void {
    const result = this.market.replaceBook(book);
    if (result.isOk()) {
      this.stats.books++;
      this.sink.enqueue({ kind: "book", book });
      this.emit({ type: "book", book });
      return;
    }

    this.handleRejected(result.error);
  }

  private handleRejected(error: MarketStateError): void {
    if (error.type === "UNKNOWN_SYMBOL") {
      this.stats.unknownSymbols++;
      logger.warn("Dropping event for untracked symbol", { symbol: error.symbol });
      return;
    }

    this.stats.sequenceRejections++;
    logger.warn("Order book update rejected; resynchronizing", { ...error });
    void this.resync(error.symbol);
  }

  /**
   * Reset the symbol's book and reload it from a REST snapshot when the feed has one.
   * Streamed updates keep flowing meanwhile; a snapshot older than them is discarded.
   */
  private async resync(symbol: string): Promise<void> {
    if (this.resyncing.has(symbol)) return;
    this.resyncing.add(symbol);
    this.stats.resyncs++;

    try {
      const reset = this.market.resetBook(symbol);
      if (reset.isErr()) {
        logger.warn("Cannot resynchronize untracked symbol", { symbol });
        return;
      }

      if (!this.feed.requestBookSnapshot) {
        logger.warn("Feed offers no book snapshot; continuing from the stream", { symbol });
        this.emit({ type: "resync", symbol, outcome: "unavailable" });
        return;
      }

      const snapshot = await this.feed.requestBookSnapshot(symbol);
      if (this.closedForGood) return;

      if (snapshot.isErr()) {
        logger.warn("Book snapshot request failed; continuing from the stream", {
          symbol,
          type: snapshot.error.type,
          message: snapshot.error.message,
        });
        this.emit({ type: "resync", symbol, outcome: "failed" });
        return;
      }

      const update = toBookUpdate(snapshot.value, new Date());
      const applied = this.market.replaceBook(update);
      if (applied.isErr()) {
        logger.info("Discarding book snapshot older than the streamed book", { symbol, sequence: update.sequence });
        this.emit({ type: "resync", symbol, outcome: "discarded" });
        return;
      }

      this.stats.books++;
      this.sink.enqueue({ kind: "book", book: update });
      this.emit({ type: "book", book: update });
      this.emit({ type: "resync", symbol, outcome: "applied" });
      logger.info("Order book resynchronized from snapshot", { symbol, sequence: update.sequence });
    } catch (error: unknown) {
      logger.error("Order book resynchronization failed", { symbol, error });
      this.emit({ type: "resync", symbol, outcome: "failed" });
    } finally {
      this.resyncing.delete(symbol);
    }
  }

  private emit(event: IngestorEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        logger.error("Event handler threw an error", { error });
      }
    }
  }
}
