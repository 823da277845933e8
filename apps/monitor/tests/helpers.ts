/**
 * Fixtures and in-process fakes for monitor tests.
 */

import type { IWsConnection } from "@crypto-monitor/adapters";

import type {
  CommandIO,
  MarketRecord,
  OrderBookUpdate,
  PriceLevel,
  RecordSink,
  ReportOptions,
  Severity,
  TradeRecord,
} from "../src/types";

export const T0 = new Date("2026-01-01T00:00:00.000Z");

export function trade(overrides: Partial<TradeRecord> = {}): TradeRecord {
  return {
    symbol: "BTCUSDT",
    price: "50000.1",
    quantity: "0.5",
    side: "buy",
    exchangeTs: T0,
    receivedAt: T0,
    ...overrides,
  };
}

export function levels(...pairs: [string, string][]): PriceLevel[] {
  return pairs.map(([price, quantity]) => ({ price, quantity }));
}

export function book(sequence: number, overrides: Partial<OrderBookUpdate> = {}): OrderBookUpdate {
  return {
    symbol: "BTCUSDT",
    sequence,
    bids: levels(["100", "1"]),
    asks: levels(["101", "2"]),
    ts: T0,
    receivedAt: T0,
    source: "stream",
    ...overrides,
  };
}

export function tradeRecords(count: number): MarketRecord[] {
  return Array.from({ length: count }, (_, i) => ({ kind: "trade" as const, trade: trade({ tradeId: i + 1 }) }));
}

export class MemorySink implements RecordSink {
  readonly records: MarketRecord[] = [];

  enqueue(record: MarketRecord): void {
    this.records.push(record);
  }
}

/**
 * Drain pending promise callbacks (works under fake timers).
 */
export async function settle(rounds = 100): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}

/**
 * Scriptable stand-in for a WebSocket connection.
 */
export class FakeWsConnection implements IWsConnection {
  readonly sent: string[] = [];
  closeCalls = 0;
  /**
   * When set, close() waits for it
   */
  closeGate: Promise<void> | null = null;

  private readonly queue: string[] = [];
  private waiter: { resolve: (r: IteratorResult<string>) => void; reject: (e: unknown) => void } | null = null;
  private open = false;
  private ended = false;
  private failure: Error | null = null;

  constructor(private readonly connectError: Error | null = null) {}

  async connect(): Promise<void> {
    if (this.connectError) throw this.connectError;
    this.open = true;
  }

  async send(data: string): Promise<void> {
    if (!this.open) throw new Error("FakeWsConnection not open");
    this.sent.push(data);
  }

  async close(): Promise<void> {
    this.closeCalls++;
    if (this.closeGate) await this.closeGate;
    this.open = false;
    this.end();
  }

  isClosed(): boolean {
    return !this.open;
  }

  /**
   * Deliver an inbound frame
   */
  push(raw: string): void {
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ value: raw, done: false });
      return;
    }
    this.queue.push(raw);
  }

  /**
   * Remote side closed the stream
   */
  end(): void {
    this.ended = true;
    this.open = false;
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  /**
   * Stream broke with an error
   */
  fail(error: Error): void {
    this.failure = error;
    this.open = false;
    if (this.waiter) {
      const { reject } = this.waiter;
      this.waiter = null;
      reject(error);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return {
      next: () => {
        const queued = this.queue.shift();
        if (queued !== undefined) return Promise.resolve<IteratorResult<string>>({ value: queued, done: false });
        if (this.failure) return Promise.reject(this.failure);
        if (this.ended) return Promise.resolve<IteratorResult<string>>({ value: undefined, done: true });
        return new Promise<IteratorResult<string>>((resolve, reject) => {
          this.waiter = { resolve, reject };
        });
      },
    };
  }
}

export type Report = { message: string; severity: Severity; options?: ReportOptions };

/**
 * CommandIO fed from a script. Once the script runs out, reads wait until close().
 */
export class ScriptedIO implements CommandIO {
  readonly reports: Report[] = [];
  closeCalls = 0;
  private closed = false;
  private pending: ((line: string | null) => void) | null = null;

  constructor(private readonly script: (string | null | Error)[] = []) {}

  readCommand(): Promise<string | null> {
    if (this.closed) return Promise.resolve(null);
    if (this.script.length > 0) {
      const next = this.script.shift();
      if (next instanceof Error) return Promise.reject(next);
      return Promise.resolve(next ?? null);
    }
    return new Promise(resolve => {
      this.pending = resolve;
    });
  }

  report(message: string, severity: Severity, options?: ReportOptions): void {
    this.reports.push(options ? { message, severity, options } : { message, severity });
  }

  close(): void {
    this.closeCalls++;
    this.closed = true;
    this.pending?.(null);
    this.pending = null;
  }

  messages(): string[] {
    return this.reports.map(r => r.message);
  }
}
