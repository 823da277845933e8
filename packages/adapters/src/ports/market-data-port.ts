/**
 * Market Feed Port - venue-agnostic contract for streaming market data
 *
 * A feed knows its venue's wire format: which URL to open, what to send to
 * subscribe, and how to turn one inbound frame into normalized events. The
 * transport (socket lifecycle, reconnects) lives with the caller.
 */

import type { Result, ResultAsync } from "neverthrow";

/**
 * One price level, decimal strings
 */
export interface BookLevel {
  px: string;
  sz: string;
}

/**
 * Trade event
 */
export interface TradeEvent {
  type: "trade";
  ts: Date;
  exchange: string;
  symbol: string;
  tradeId?: number;
  /**
   * Aggressor side
   */
  side: "buy" | "sell";
  px: string;
  sz: string;
}

/**
 * Order book event: the top levels of both sides, best first.
 *
 * `seq` is the venue's book version. `firstSeq` is set when the venue reports
 * the first version an incremental message covers, so gaps can be detected.
 */
export interface BookEvent {
  type: "book";
  ts: Date;
  exchange: string;
  symbol: string;
  seq: number;
  firstSeq?: number;
  bids: BookLevel[];
  asks: BookLevel[];
  source: "stream" | "snapshot";
}

export type FeedEvent = TradeEvent | BookEvent;

/**
 * Market data adapter errors
 */
export type MarketDataError =
  | { type: "connection_failed"; message: string }
  | { type: "subscription_failed"; message: string }
  | { type: "invalid_message"; message: string };

/**
 * Market Feed Port interface
 */
export interface MarketFeedPort {
  readonly exchange: string;

  /**
   * WebSocket endpoint to open
   */
  streamUrl(): string;

  /**
   * Frames to send right after the socket opens
   */
  subscribeMessages(symbols: readonly string[]): string[];

  /**
   * Decode one inbound frame. Control frames (acks) decode to an empty list.
   */
  decode(raw: string): Result<FeedEvent[], MarketDataError>;

  /**
   * Fetch a full book snapshot out of band, for resynchronization.
   * Optional: feeds without a snapshot endpoint leave it undefined.
   */
  requestBookSnapshot?(symbol: string): ResultAsync<BookEvent, MarketDataError>;
}
