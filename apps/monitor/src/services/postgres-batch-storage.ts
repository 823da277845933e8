/**
 * BatchStorage backed by the market data repository (PostgreSQL).
 * One batch = one transaction.
 */

import type { ResultAsync } from "neverthrow";
import type { BookLevelRow } from "@crypto-monitor/db";
import type { BookInsert, MarketBatch, MarketDataRepository, TradeInsert } from "@crypto-monitor/repositories";

import type { MarketRecord, OrderBookUpdate, PriceLevel, TradeRecord } from "../types";
import type { BatchStorage, StorageError } from "./batch-writer";

function toLevelRows(levels: readonly PriceLevel[]): BookLevelRow[] {
  return levels.map(l => [l.price, l.quantity]);
}

export function toTradeInsert(exchange: string, trade: TradeRecord): TradeInsert {
  return {
    ts: trade.exchangeTs,
    exchange,
    symbol: trade.symbol,
    tradeId: trade.tradeId ?? null,
    side: trade.side,
    px: trade.price,
    sz: trade.quantity,
    ingestTs: trade.receivedAt,
  };
}

export function toBookInsert(exchange: string, book: OrderBookUpdate): BookInsert {
  return {
    ts: book.ts,
    exchange,
    symbol: book.symbol,
    seq: book.sequence,
    source: book.source,
    bestBidPx: book.bids[0]?.price ?? null,
    bestAskPx: book.asks[0]?.price ?? null,
    bids: toLevelRows(book.bids),
    asks: toLevelRows(book.asks),
    ingestTs: book.receivedAt,
  };
}

export function toMarketBatch(exchange: string, records: readonly MarketRecord[]): MarketBatch {
  const batch: MarketBatch = { trades: [], books: [] };
  for (const record of records) {
    if (record.kind === "trade") batch.trades.push(toTradeInsert(exchange, record.trade));
    else batch.books.push(toBookInsert(exchange, record.book));
  }
  return batch;
}

export class PostgresBatchStorage implements BatchStorage {
  constructor(
    private readonly repo: MarketDataRepository,
    private readonly exchange: string,
    private readonly onClose: () => Promise<void>,
  ) {}

  writeBatch(records: readonly MarketRecord[]): ResultAsync<void, StorageError> {
    return this.repo
      .insertMarketBatch(toMarketBatch(this.exchange, records))
      .mapErr((e): StorageError => ({ type: "STORAGE_ERROR", message: e.message }));
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}
