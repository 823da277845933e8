import { errAsync, okAsync } from "neverthrow";
import { describe, expect, test, vi } from "vitest";
import type {
  MarketBatch,
  MarketDataRepository,
  MarketDataRepositoryError,
} from "@crypto-monitor/repositories";

import {
  PostgresBatchStorage,
  toBookInsert,
  toMarketBatch,
  toTradeInsert,
} from "../../src/services/postgres-batch-storage";
import type { MarketRecord } from "../../src/types";
import { book, levels, T0, trade } from "../helpers";

const LATER = new Date(T0.getTime() + 250);

function fakeRepo(fail?: string) {
  const batches: MarketBatch[] = [];
  const repo: MarketDataRepository = {
    insertMarketBatch: batch => {
      batches.push(batch);
      return fail === undefined
        ? okAsync<void, MarketDataRepositoryError>(undefined)
        : errAsync<void, MarketDataRepositoryError>({ type: "DB_ERROR", message: fail });
    },
  };
  return { repo, batches };
}

describe("record mapping", () => {
  test("trade maps to a trade row", () => {
    expect(toTradeInsert("binance", trade({ tradeId: 42, side: "sell", receivedAt: LATER }))).toEqual({
      ts: T0,
      exchange: "binance",
      symbol: "BTCUSDT",
      tradeId: 42,
      side: "sell",
      px: "50000.1",
      sz: "0.5",
      ingestTs: LATER,
    });
  });

  test("trade without an id stores null", () => {
    expect(toTradeInsert("binance", trade()).tradeId).toBeNull();
  });

  test("book maps levels to tuples and derives best prices", () => {
    const update = book(7, {
      bids: levels(["100", "1"], ["99.5", "3"]),
      asks: levels(["101", "2"]),
      source: "snapshot",
    });

    expect(toBookInsert("binance", update)).toEqual({
      ts: T0,
      exchange: "binance",
      symbol: "BTCUSDT",
      seq: 7,
      source: "snapshot",
      bestBidPx: "100",
      bestAskPx: "101",
      bids: [
        ["100", "1"],
        ["99.5", "3"],
      ],
      asks: [["101", "2"]],
      ingestTs: T0,
    });
  });

  test("an empty side has no best price", () => {
    const row = toBookInsert("binance", book(1, { bids: [] }));

    expect(row.bestBidPx).toBeNull();
    expect(row.bestAskPx).toBe("101");
  });

  test("a mixed batch is split by kind in arrival order", () => {
    const records: MarketRecord[] = [
      { kind: "trade", trade: trade({ tradeId: 1 }) },
      { kind: "book", book: book(10) },
      { kind: "trade", trade: trade({ tradeId: 2 }) },
    ];

    const batch = toMarketBatch("binance", records);

    expect(batch.trades.map(t => t.tradeId)).toEqual([1, 2]);
    expect(batch.books.map(b => b.seq)).toEqual([10]);
  });
});

describe("PostgresBatchStorage", () => {
  test("writes the whole batch through one repository call", async () => {
    const { repo, batches } = fakeRepo();
    const storage = new PostgresBatchStorage(repo, "binance", () => Promise.resolve());

    const result = await storage.writeBatch([
      { kind: "trade", trade: trade({ tradeId: 1 }) },
      { kind: "book", book: book(3) },
    ]);

    expect(result.isOk()).toBe(true);
    expect(batches).toHaveLength(1);
    expect(batches[0]?.trades).toHaveLength(1);
    expect(batches[0]?.books).toHaveLength(1);
  });

  test("repository errors become storage errors", async () => {
    const { repo } = fakeRepo("connection refused");
    const storage = new PostgresBatchStorage(repo, "binance", () => Promise.resolve());

    const result = await storage.writeBatch([{ kind: "trade", trade: trade() }]);

    expect(result._unsafeUnwrapErr()).toEqual({ type: "STORAGE_ERROR", message: "connection refused" });
  });

  test("close releases the database", async () => {
    const { repo } = fakeRepo();
    const onClose = vi.fn(() => Promise.resolve());
    const storage = new PostgresBatchStorage(repo, "binance", onClose);

    await storage.close();

    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
