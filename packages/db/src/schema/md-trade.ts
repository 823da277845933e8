/**
 * md_trade - executed trades, append-only time series
 */

import { bigint, index, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const mdTrade = pgTable(
  "md_trade",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    exchange: text("exchange").notNull(),
    symbol: text("symbol").notNull(),
    tradeId: bigint("trade_id", { mode: "number" }),
    side: text("side").notNull(), // buy/sell (aggressor)
    px: numeric("px").notNull(),
    sz: numeric("sz").notNull(),
    ingestTs: timestamp("ingest_ts", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [index("md_trade_exchange_symbol_ts_idx").on(table.exchange, table.symbol, table.ts.desc())],
);

export type MdTrade = typeof mdTrade.$inferSelect;
export type NewMdTrade = typeof mdTrade.$inferInsert;
