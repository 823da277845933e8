/**
 * Monitor Types
 *
 * Shared type definitions for the monitor application
 */

export type TradeSide = "buy" | "sell";

/**
 * Decimal strings, as received from the venue (normalized).
 */
export interface PriceLevel {
  readonly price: string;
  readonly quantity: string;
}

/**
 * One executed trade. Frozen once constructed.
 */
export interface TradeRecord {
  readonly symbol: string;
  readonly price: string;
  readonly quantity: string;
  /**
   * Aggressor side
   */
  readonly side: TradeSide;
  readonly exchangeTs: Date;
  readonly receivedAt: Date;
  readonly tradeId?: number;
}

/**
 * Full top-N book state for one symbol, best level first on each side.
 * Sequence numbers are non-decreasing per symbol.
 */
export interface OrderBookUpdate {
  readonly symbol: string;
  readonly sequence: number;
  readonly firstSequence?: number;
  readonly bids: readonly PriceLevel[];
  readonly asks: readonly PriceLevel[];
  readonly ts: Date;
  readonly receivedAt: Date;
  readonly source: "stream" | "snapshot";
}

/**
 * Unit stored by the BatchWriter
 */
export type MarketRecord = { kind: "trade"; trade: TradeRecord } | { kind: "book"; book: OrderBookUpdate };

export type ConnectionState = "disconnected" | "connecting" | "connected" | "closing";

export type Severity = "info" | "warn" | "error";

export interface ReportOptions {
  /**
   * Keep the message visible (dashboard NOTICES panel) instead of scrolling away
   */
  persistent?: boolean;
}

/**
 * Line-oriented user interaction
 */
export interface CommandIO {
  /**
   * Next input line, or null once input has ended or the IO was closed.
   */
  readCommand(): Promise<string | null>;
  report(message: string, severity: Severity, options?: ReportOptions): void;
  close(): void;
}

/**
 * Optional live visualization of the market state
 */
export interface MarketView {
  /**
   * Returns false when the view cannot run (e.g. no TTY).
   */
  start(): boolean;
  stop(): void;
  readonly running: boolean;
}

/**
 * Anything records can be handed to for persistence
 */
export interface RecordSink {
  enqueue(record: MarketRecord): void;
}
