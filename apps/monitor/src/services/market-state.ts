/**
 * Market State
 *
 * In-memory view of the tracked symbols: the latest order book and a bounded
 * trade history per symbol.
 *
 * Every method runs to completion without awaiting, so each call is atomic
 * with respect to the other async loops (ingestion, commands, dashboard).
 * Readers get frozen copies and never observe a half-applied update.
 */

import { err, ok, type Result } from "neverthrow";
import { RingBuffer } from "@crypto-monitor/utils";

import type { OrderBookUpdate, TradeRecord } from "../types";

export type MarketStateError =
  | { type: "UNKNOWN_SYMBOL"; symbol: string }
  | { type: "SEQUENCE_REGRESSION"; symbol: string; current: number; received: number }
  | { type: "SEQUENCE_GAP"; symbol: string; current: number; firstSequence: number };

export interface SymbolSnapshot {
  readonly symbol: string;
  readonly book: OrderBookUpdate | null;
  readonly trades: readonly TradeRecord[];
}

export interface SymbolSummary {
  readonly symbol: string;
  readonly tradeCount: number;
  readonly bookSequence: number | null;
  readonly bookUpdatedAt: Date | null;
  readonly lastTrade: TradeRecord | null;
}

function frozen<T extends object>(value: T): Readonly<T> {
  return Object.isFrozen(value) ? value : Object.freeze({ ...value });
}

interface SymbolEntry {
  book: OrderBookUpdate | null;
  readonly trades: RingBuffer<TradeRecord>;
}

export class MarketState {
  private readonly entries = new Map<string, SymbolEntry>();
  readonly tradeHistoryCapacity: number;

  constructor(args: { symbols: readonly string[]; tradeHistoryCapacity: number }) {
    this.tradeHistoryCapacity = args.tradeHistoryCapacity;
    for (const symbol of args.symbols) {
      if (this.entries.has(symbol)) continue;
      this.entries.set(symbol, { book: null, trades: new RingBuffer<TradeRecord>(args.tradeHistoryCapacity) });
    }
  }

  symbols(): string[] {
    return [...this.entries.keys()];
  }

  recordTrade(trade: TradeRecord): Result<void, MarketStateError> {
    const entry = this.entries.get(trade.symbol);
    if (!entry) return err({ type: "UNKNOWN_SYMBOL", symbol: trade.symbol });

    entry.trades.push(frozen(trade));
    return ok(undefined);
  }

  /**
   * Replace the symbol's book. Older sequences are rejected; an equal sequence
   * is accepted (re-delivery of the same state).
   */
  replaceBook(update: OrderBookUpdate): Result<void, MarketStateError> {
    const entry = this.entries.get(update.symbol);
    if (!entry) return err({ type: "UNKNOWN_SYMBOL", symbol: update.symbol });

    const current = entry.book;
    if (current) {
      if (update.sequence < current.sequence) {
        return err({
          type: "SEQUENCE_REGRESSION",
          symbol: update.symbol,
          current: current.sequence,
          received: update.sequence,
        });
      }
      if (update.firstSequence !== undefined && update.firstSequence > current.sequence + 1) {
        return err({
          type: "SEQUENCE_GAP",
          symbol: update.symbol,
          current: current.sequence,
          firstSequence: update.firstSequence,
        });
      }
    }

    entry.book = frozen(update);
    return ok(undefined);
  }

  /**
   * Drop the symbol's book; the next update is accepted whatever its sequence.
   */
  resetBook(symbol: string): Result<void, MarketStateError> {
    const entry = this.entries.get(symbol);
    if (!entry) return err({ type: "UNKNOWN_SYMBOL", symbol });

    entry.book = null;
    return ok(undefined);
  }

  snapshot(symbol: string): SymbolSnapshot | null {
    const entry = this.entries.get(symbol);
    if (!entry) return null;

    return Object.freeze({
      symbol,
      book: entry.book,
      trades: Object.freeze(entry.trades.toArray()),
    });
  }

  summary(): SymbolSummary[] {
    return [...this.entries].map(([symbol, entry]) =>
      Object.freeze({
        symbol,
        tradeCount: entry.trades.size,
        bookSequence: entry.book?.sequence ?? null,
        bookUpdatedAt: entry.book?.receivedAt ?? null,
        lastTrade: entry.trades.last() ?? null,
      }),
    );
  }
}
