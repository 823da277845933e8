/**
 * Batch Writer Service
 *
 * - Buffers market records for batch insert, in arrival order
 * - Records leave the buffer only after a successful write
 * - Retries each chunk with capped exponential backoff
 * - Concurrent flushes share one in-flight write, so nothing is written twice
 */

import { err, ok, type Result, type ResultAsync } from "neverthrow";
import { computeBackoffDelayMs, logger, sleep } from "@crypto-monitor/utils";

import type { MarketRecord, RecordSink } from "../types";

export type StorageError = { type: "STORAGE_ERROR"; message: string };

/**
 * Durable destination for batches
 */
export interface BatchStorage {
  writeBatch(records: readonly MarketRecord[]): ResultAsync<void, StorageError>;
  close(): Promise<void>;
}

export type BatchWriterError = {
  type: "STORAGE_WRITE_FAILED";
  attempts: number;
  pending: number;
  message: string;
};

export interface BatchWriterOptions {
  batchSize: number;
  maxAttempts: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  /**
   * Pause automatic (size-triggered) flushes this long after a failed flush
   */
  failureCooldownMs?: number;
  random?: () => number;
}

export interface BatchWriterStats {
  pending: number;
  written: number;
  flushes: number;
  failedFlushes: number;
  lastError: string | null;
  lastFlushAt: Date | null;
}

type FlushMode = "full-batches" | "all";

interface Flight {
  mode: FlushMode;
  promise: Promise<Result<void, BatchWriterError>>;
}

export class BatchWriter implements RecordSink {
  private readonly storage: BatchStorage;
  private readonly batchSize: number;
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly failureCooldownMs: number;
  private readonly random: () => number;

  private readonly pending: MarketRecord[] = [];
  private inFlight: Flight | null = null;
  private flushIntervalId: ReturnType<typeof setInterval> | null = null;
  private closed = false;
  private closePromise: Promise<Result<void, BatchWriterError>> | null = null;
  private lastFailureAtMs: number | null = null;

  private written = 0;
  private flushes = 0;
  private failedFlushes = 0;
  private lastError: string | null = null;
  private lastFlushAt: Date | null = null;

  constructor(storage: BatchStorage, opts: BatchWriterOptions) {
    if (!Number.isInteger(opts.batchSize) || opts.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${String(opts.batchSize)}`);
    }
    this.storage = storage;
    this.batchSize = opts.batchSize;
    this.maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 100;
    this.retryMaxDelayMs = opts.retryMaxDelayMs ?? 5_000;
    this.failureCooldownMs = opts.failureCooldownMs ?? 5_000;
    this.random = opts.random ?? Math.random;
  }

  /**
   * Append a record. A full batch starts a background flush; the caller never waits on storage.
   */
  enqueue(record: MarketRecord): void {
    this.pending.push(record);

    if (this.closed) {
      logger.warn("Record enqueued after close; it will not be written", { kind: record.kind });
      return;
    }

    if (this.pending.length >= this.batchSize && this.autoFlushAllowed()) {
      void this.startFlush("full-batches");
    }
  }

  /**
   * Write every pending record, in chunks of at most batchSize.
   */
  async flush(): Promise<Result<void, BatchWriterError>> {
    while (this.inFlight) {
      const { mode, promise } = this.inFlight;
      const result = await promise;
      if (mode === "all") return result;
    }

    if (this.pending.length === 0) return ok(undefined);
    return this.startFlush("all");
  }

  /**
   * Start periodic flush interval
   */
  startFlushInterval(intervalMs: number): void {
    if (this.closed) return;
    this.stopFlushInterval();
    this.flushIntervalId = setInterval(() => {
      if (this.inFlight || this.pending.length === 0 || !this.autoFlushAllowed()) return;
      void this.flush();
    }, intervalMs);
  }

  /**
   * Stop the periodic flush, write what is pending, then close the storage.
   * Later calls return the first call's result.
   */
  async close(): Promise<Result<void, BatchWriterError>> {
    if (!this.closePromise) {
      this.closePromise = this.closeOnce();
    }
    return this.closePromise;
  }

  getStats(): BatchWriterStats {
    return {
      pending: this.pending.length,
      written: this.written,
      flushes: this.flushes,
      failedFlushes: this.failedFlushes,
      lastError: this.lastError,
      lastFlushAt: this.lastFlushAt,
    };
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private async closeOnce(): Promise<Result<void, BatchWriterError>> {
    this.stopFlushInterval();
    this.closed = true;

    const result = await this.flush();
    await this.storage.close();

    logger.info("Batch writer closed", { written: this.written, pending: this.pending.length });
    return result;
  }

  private stopFlushInterval(): void {
    if (this.flushIntervalId) {
      clearInterval(this.flushIntervalId);
      this.flushIntervalId = null;
    }
  }

  private autoFlushAllowed(): boolean {
    return this.lastFailureAtMs === null || Date.now() - this.lastFailureAtMs >= this.failureCooldownMs;
  }

  private startFlush(mode: FlushMode): Promise<Result<void, BatchWriterError>> {
    if (this.inFlight) return this.inFlight.promise;

    const promise = this.runFlush(mode).finally(() => {
      if (this.inFlight?.promise === promise) this.inFlight = null;
    });
    this.inFlight = { mode, promise };
    return promise;
  }

  private async runFlush(mode: FlushMode): Promise<Result<void, BatchWriterError>> {
    this.flushes++;

    while (mode === "all" ? this.pending.length > 0 : this.pending.length >= this.batchSize) {
      const chunk = this.pending.slice(0, this.batchSize);
      const result = await this.writeWithRetry(chunk);

      if (result.isErr()) {
        this.failedFlushes++;
        this.lastError = result.error;
        this.lastFailureAtMs = Date.now();
        logger.error("Batch write failed; records kept for the next flush", {
          attempts: this.maxAttempts,
          pending: this.pending.length,
          error: result.error,
        });
        return err({
          type: "STORAGE_WRITE_FAILED",
          attempts: this.maxAttempts,
          pending: this.pending.length,
          message: result.error,
        });
      }

      // Only this flight removes from the front; enqueue appends at the back.
      this.pending.splice(0, chunk.length);
      this.written += chunk.length;
      this.lastFlushAt = new Date();
      this.lastFailureAtMs = null;
      logger.debug("Flushed batch", { count: chunk.length, pending: this.pending.length });
    }

    return ok(undefined);
  }

  private async writeWithRetry(chunk: readonly MarketRecord[]): Promise<Result<void, string>> {
    let lastMessage = "unknown error";

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const result = await this.storage.writeBatch(chunk);
        if (result.isOk()) return ok(undefined);
        lastMessage = result.error.message;
      } catch (error: unknown) {
        lastMessage = error instanceof Error ? error.message : String(error);
      }

      if (attempt >= this.maxAttempts) break;

      const delayMs = computeBackoffDelayMs(
        {
          initialDelayMs: this.retryBaseDelayMs,
          maxDelayMs: this.retryMaxDelayMs,
          multiplier: 2,
          jitterRatio: 0.25,
        },
        attempt - 1,
        this.random,
      );
      logger.warn("Batch write failed; retrying", {
        attempt,
        maxAttempts: this.maxAttempts,
        count: chunk.length,
        delayMs,
        error: lastMessage,
      });

      await sleep(delayMs);
    }

    return err(lastMessage);
  }
}
