/**
 * Postgres Market Data Repository
 */

import { ResultAsync } from "neverthrow";
import { mdBook, mdTrade } from "@crypto-monitor/db";
import type { Db } from "@crypto-monitor/db";

import type { MarketBatch, MarketDataRepository, MarketDataRepositoryError } from "../interfaces/market-data-repository";

const toDbError = (e: unknown): MarketDataRepositoryError => ({
  type: "DB_ERROR",
  message: e instanceof Error ? e.message : "Unknown error",
});

/**
 * Create a Postgres market data repository
 */
export function createPostgresMarketDataRepository(db: Db): MarketDataRepository {
  return {
    insertMarketBatch(batch: MarketBatch): ResultAsync<void, MarketDataRepositoryError> {
      if (batch.trades.length === 0 && batch.books.length === 0) {
        return ResultAsync.fromSafePromise(Promise.resolve(undefined));
      }

      return ResultAsync.fromPromise(
        db.transaction(async tx => {
          if (batch.trades.length > 0) {
            await tx.insert(mdTrade).values(batch.trades);
          }
          if (batch.books.length > 0) {
            await tx.insert(mdBook).values(batch.books);
          }
        }),
        toDbError,
      );
    },
  };
}
