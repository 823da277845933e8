/**
 * Binance Spot Adapter
 */

export { BinanceMarketFeed, type BinanceMarketFeedDeps } from "./market-feed";
export {
  BinanceFeedConfigSchema,
  type BinanceFeedConfig,
  type BinanceFeedConfigInput,
  type BinancePartialDepth,
  type BinanceTrade,
} from "./types";
