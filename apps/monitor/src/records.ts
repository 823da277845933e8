/**
 * Feed event -> domain record mapping
 */

import type { BookEvent, BookLevel, TradeEvent } from "@crypto-monitor/adapters";

import type { OrderBookUpdate, PriceLevel, TradeRecord } from "./types";

export function toTradeRecord(event: TradeEvent, receivedAt: Date): TradeRecord {
  const record: TradeRecord = {
    symbol: event.symbol,
    price: event.px,
    quantity: event.sz,
    side: event.side,
    exchangeTs: event.ts,
    receivedAt,
    ...(event.tradeId !== undefined ? { tradeId: event.tradeId } : {}),
  };
  return Object.freeze(record);
}

function toLevels(levels: readonly BookLevel[]): readonly PriceLevel[] {
  return Object.freeze(levels.map(l => Object.freeze({ price: l.px, quantity: l.sz })));
}

export function toBookUpdate(event: BookEvent, receivedAt: Date): OrderBookUpdate {
  const update: OrderBookUpdate = {
    symbol: event.symbol,
    sequence: event.seq,
    ...(event.firstSeq !== undefined ? { firstSequence: event.firstSeq } : {}),
    bids: toLevels(event.bids),
    asks: toLevels(event.asks),
    ts: event.ts,
    receivedAt,
    source: event.source,
  };
  return Object.freeze(update);
}
