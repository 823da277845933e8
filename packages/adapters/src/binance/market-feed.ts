/**
 * Binance Market Feed
 *
 * Implements MarketFeedPort for the Binance spot combined stream:
 * - `<symbol>@trade` for executed trades
 * - `<symbol>@depth<N>@100ms` for top-N book states (full replacement, versioned by lastUpdateId)
 * - REST `/api/v3/depth` for resynchronization snapshots
 */

import { err, errAsync, ok, ResultAsync } from "neverthrow";
import type { Result } from "neverthrow";
import { z } from "zod";

import type { BookEvent, BookLevel, FeedEvent, MarketDataError, MarketFeedPort, TradeEvent } from "../ports";
import {
  BinanceCombinedFrameSchema,
  BinanceFeedConfigSchema,
  BinancePartialDepthSchema,
  BinanceResponseSchema,
  BinanceTradeSchema,
  type BinanceFeedConfig,
  type BinanceFeedConfigInput,
  type BinancePartialDepth,
} from "./types";

const EXCHANGE_NAME = "binance";

export interface BinanceMarketFeedDeps {
  fetchFn?: typeof fetch;
  now?: () => Date;
}

const invalid = (message: string): MarketDataError => ({ type: "invalid_message", message });

function toLevels(levels: BinancePartialDepth["bids"]): BookLevel[] {
  return levels.map(([px, sz]) => ({ px, sz }));
}

export class BinanceMarketFeed implements MarketFeedPort {
  readonly exchange = EXCHANGE_NAME;

  private readonly config: BinanceFeedConfig;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => Date;
  private nextRequestId = 1;

  constructor(config: BinanceFeedConfigInput, deps: BinanceMarketFeedDeps = {}) {
    this.config = BinanceFeedConfigSchema.parse(config);
    this.fetchFn = deps.fetchFn ?? fetch;
    this.now = deps.now ?? (() => new Date());
  }

  streamUrl(): string {
    return this.config.streamUrl;
  }

  /**
   * Stream names for a symbol, e.g. ["btcusdt@trade", "btcusdt@depth20@100ms"]
   */
  streamNames(symbol: string): string[] {
    const s = symbol.toLowerCase();
    return [`${s}@trade`, `${s}@depth${this.config.depthLevels}@100ms`];
  }

  subscribeMessages(symbols: readonly string[]): string[] {
    if (symbols.length === 0) return [];
    const params = symbols.flatMap(s => this.streamNames(s));
    return [JSON.stringify({ method: "SUBSCRIBE", params, id: this.nextRequestId++ })];
  }

  decode(raw: string): Result<FeedEvent[], MarketDataError> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      return err(invalid(`Malformed JSON: ${e instanceof Error ? e.message : String(e)}`));
    }

    const frame = BinanceCombinedFrameSchema.safeParse(json);
    if (!frame.success) {
      return this.decodeResponse(json);
    }

    const [streamSymbol, channel] = frame.data.stream.split("@");
    if (streamSymbol === undefined || streamSymbol === "" || channel === undefined) {
      return err(invalid(`Unrecognized stream name: ${frame.data.stream}`));
    }

    if (channel === "trade") {
      return this.decodeTrade(frame.data.data).map(event => [event]);
    }
    if (channel.startsWith("depth")) {
      return this.decodeDepth(streamSymbol.toUpperCase(), frame.data.data, "stream").map(event => [event]);
    }

    return err(invalid(`Unsupported stream: ${frame.data.stream}`));
  }

  requestBookSnapshot(symbol: string): ResultAsync<BookEvent, MarketDataError> {
    const url = new URL("/api/v3/depth", this.config.restUrl);
    url.searchParams.set("symbol", symbol.toUpperCase());
    url.searchParams.set("limit", String(this.config.depthLevels));

    return ResultAsync.fromPromise(
      this.fetchFn(url.toString()),
      (e): MarketDataError => ({
        type: "connection_failed",
        message: e instanceof Error ? e.message : "Unknown error",
      }),
    )
      .andThen(res => {
        if (!res.ok) {
          return errAsync<unknown, MarketDataError>({
            type: "connection_failed",
            message: `Depth snapshot request failed: HTTP ${res.status}`,
          });
        }
        return ResultAsync.fromPromise<unknown, MarketDataError>(res.json(), e =>
          invalid(`Depth snapshot body is not JSON: ${e instanceof Error ? e.message : String(e)}`),
        );
      })
      .andThen(body => this.decodeDepth(symbol.toUpperCase(), body, "snapshot"));
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private decodeResponse(json: unknown): Result<FeedEvent[], MarketDataError> {
    const response = BinanceResponseSchema.safeParse(json);
    if (!response.success) {
      return err(invalid("Unrecognized frame"));
    }
    if ("error" in response.data) {
      const { code, msg } = response.data.error;
      return err({ type: "subscription_failed", message: `${code}: ${msg}` });
    }
    // Subscription ack
    return ok([]);
  }

  private decodeTrade(data: unknown): Result<TradeEvent, MarketDataError> {
    const parsed = BinanceTradeSchema.safeParse(data);
    if (!parsed.success) {
      return err(invalid(`Invalid trade payload: ${z.prettifyError(parsed.error)}`));
    }

    const t = parsed.data;
    return ok({
      type: "trade",
      ts: new Date(t.T),
      exchange: EXCHANGE_NAME,
      symbol: t.s.toUpperCase(),
      tradeId: t.t,
      // Buyer is maker => the seller crossed the spread.
      side: t.m ? "sell" : "buy",
      px: t.p,
      sz: t.q,
    });
  }

  private decodeDepth(symbol: string, data: unknown, source: BookEvent["source"]): Result<BookEvent, MarketDataError> {
    const parsed = BinancePartialDepthSchema.safeParse(data);
    if (!parsed.success) {
      return err(invalid(`Invalid depth payload: ${z.prettifyError(parsed.error)}`));
    }

    // Partial depth frames carry no event time.
    return ok({
      type: "book",
      ts: this.now(),
      exchange: EXCHANGE_NAME,
      symbol,
      seq: parsed.data.lastUpdateId,
      bids: toLevels(parsed.data.bids),
      asks: toLevels(parsed.data.asks),
      source,
    });
  }
}
