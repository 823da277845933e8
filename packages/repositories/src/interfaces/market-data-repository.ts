/**
 * Market Data Repository Interface
 *
 * Batch inserts for trades and order-book states. `insertMarketBatch` writes
 * both kinds in one transaction.
 */

import type { ResultAsync } from "neverthrow";
import type { BookLevelRow } from "@crypto-monitor/db";

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type MarketDataRepositoryError = { type: "DB_ERROR"; message: string };

/**
 * Trade insert record
 */
export interface TradeInsert {
  ts: Date;
  exchange: string;
  symbol: string;
  tradeId: number | null;
  side: "buy" | "sell";
  px: string;
  sz: string;
  ingestTs: Date;
}

/**
 * Order book insert record
 */
export interface BookInsert {
  ts: Date;
  exchange: string;
  symbol: string;
  seq: number;
  source: "stream" | "snapshot";
  bestBidPx: string | null;
  bestAskPx: string | null;
  bids: BookLevelRow[];
  asks: BookLevelRow[];
  ingestTs: Date;
}

export interface MarketBatch {
  trades: TradeInsert[];
  books: BookInsert[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface MarketDataRepository {
  /**
   * Insert trades and books in a single transaction.
   */
  insertMarketBatch(batch: MarketBatch): ResultAsync<void, MarketDataRepositoryError>;
}
