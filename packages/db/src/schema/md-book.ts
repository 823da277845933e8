/**
 * md_book - order book states (top N levels per side), append-only time series
 *
 * Levels are stored as jsonb arrays of [price, quantity] decimal strings,
 * best level first. best_bid_px / best_ask_px are denormalized for queries.
 */

import { bigint, index, jsonb, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export type BookLevelRow = [price: string, quantity: string];

export const mdBook = pgTable(
  "md_book",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    exchange: text("exchange").notNull(),
    symbol: text("symbol").notNull(),
    seq: bigint("seq", { mode: "number" }).notNull(),
    source: text("source").notNull(), // stream/snapshot
    bestBidPx: numeric("best_bid_px"),
    bestAskPx: numeric("best_ask_px"),
    bids: jsonb("bids").$type<BookLevelRow[]>().notNull(),
    asks: jsonb("asks").$type<BookLevelRow[]>().notNull(),
    ingestTs: timestamp("ingest_ts", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [
    index("md_book_exchange_symbol_ts_idx").on(table.exchange, table.symbol, table.ts.desc()),
    index("md_book_exchange_symbol_seq_idx").on(table.exchange, table.symbol, table.seq),
  ],
);

export type MdBook = typeof mdBook.$inferSelect;
export type NewMdBook = typeof mdBook.$inferInsert;
