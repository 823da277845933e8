/**
 * Binance Spot Types
 *
 * Combined stream frames: { stream: "<symbol>@<channel>", data: {...} }
 * Documentation: https://developers.binance.com/docs/binance-spot-api-docs/web-socket-streams
 */

import Decimal from "decimal.js";
import { z } from "zod";

/**
 * Non-negative decimal string, normalized without exponent or trailing zeros
 * ("50000.10" -> "50000.1").
 */
export const DecimalStringSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "Must be a non-negative decimal string")
  .transform(s => new Decimal(s).toFixed());

const LevelSchema = z.tuple([DecimalStringSchema, DecimalStringSchema]);

/**
 * <symbol>@trade payload
 */
export const BinanceTradeSchema = z.object({
  e: z.literal("trade"),
  E: z.number(), // event time
  s: z.string().min(1),
  t: z.number().int(),
  p: DecimalStringSchema,
  q: DecimalStringSchema,
  T: z.number(), // trade time
  m: z.boolean(), // buyer is the maker
});

/**
 * <symbol>@depth<levels>@100ms payload, also the REST /api/v3/depth body
 */
export const BinancePartialDepthSchema = z.object({
  lastUpdateId: z.number().int().nonnegative(),
  bids: z.array(LevelSchema),
  asks: z.array(LevelSchema),
});

export const BinanceCombinedFrameSchema = z.object({
  stream: z.string().min(1),
  data: z.unknown(),
});

/**
 * Reply to a SUBSCRIBE request
 */
export const BinanceResponseSchema = z.union([
  z.object({ result: z.null(), id: z.number() }),
  z.object({ error: z.object({ code: z.number(), msg: z.string() }), id: z.number().nullable().optional() }),
]);

export type BinanceTrade = z.infer<typeof BinanceTradeSchema>;
export type BinancePartialDepth = z.infer<typeof BinancePartialDepthSchema>;

/**
 * Binance feed configuration schema
 */
export const BinanceFeedConfigSchema = z.object({
  streamUrl: z.url().default("wss://stream.binance.com:9443/stream"),
  restUrl: z.url().default("https://api.binance.com"),
  depthLevels: z.union([z.literal(5), z.literal(10), z.literal(20)]).default(20),
});

export type BinanceFeedConfig = z.infer<typeof BinanceFeedConfigSchema>;
export type BinanceFeedConfigInput = z.input<typeof BinanceFeedConfigSchema>;
