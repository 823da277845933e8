/**
 * packages/db - Database Schema (Drizzle SoT)
 *
 * All market-data tables carry (exchange, symbol) and a timestamptz `ts`
 * holding the exchange event time.
 */

export * from "./md-trade";
export * from "./md-book";
