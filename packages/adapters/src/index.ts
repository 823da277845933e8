/**
 * packages/adapters - Exchange Adapters
 *
 * Port interfaces for venue-agnostic market data, the WebSocket transport and
 * venue-specific feed implementations.
 */

// Port interfaces
export * from "./ports";

// Transport
export * from "./transport";

// Binance adapter
export * from "./binance";
