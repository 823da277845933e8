/**
 * Port interfaces for adapters
 */

export type {
  BookEvent,
  BookLevel,
  FeedEvent,
  MarketDataError,
  MarketFeedPort,
  TradeEvent,
} from "./market-data-port";
