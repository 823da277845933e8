import type { LogRecord } from "../logger";
import { RingBuffer } from "../ring-buffer";

/**
 * Bounded store of recent log records for the dashboard LOGS panel.
 */
export class LogBuffer {
  private readonly buf: RingBuffer<LogRecord>;

  constructor(max: number) {
    this.buf = new RingBuffer<LogRecord>(Math.max(1, Math.floor(max)));
  }

  push(r: LogRecord): void {
    this.buf.push(r);
  }

  /**
   * Newest first.
   */
  latest(max: number): LogRecord[] {
    return this.buf.latest(max).reverse();
  }

  get size(): number {
    return this.buf.size;
  }
}
