/**
 * Console CommandIO: commands from a line stream (stdin), reports to an output
 * stream, or to the logger while the dashboard owns the screen.
 */

import { createInterface, type Interface } from "node:readline";
import { logger } from "@crypto-monitor/utils";

import type { CommandIO, ReportOptions, Severity } from "../types";

/**
 * A view that can keep messages visible (dashboard NOTICES panel)
 */
export interface NoticeBoard {
  readonly running: boolean;
  pin(message: string, severity: Severity): void;
}

export interface ConsoleCommandIOOptions {
  input: NodeJS.ReadableStream;
  output: { write(chunk: string): unknown };
  notices?: NoticeBoard | null;
}

const PREFIX: Record<Severity, string> = {
  info: "",
  warn: "warning: ",
  error: "error: ",
};

export class ConsoleCommandIO implements CommandIO {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private readonly output: { write(chunk: string): unknown };
  private readonly notices: NoticeBoard | null;
  private closed = false;
  private signalClosed: () => void = () => undefined;
  private readonly closedSignal: Promise<null>;

  constructor(opts: ConsoleCommandIOOptions) {
    this.output = opts.output;
    this.notices = opts.notices ?? null;
    this.rl = createInterface({ input: opts.input, terminal: false });
    // Created up front: lines emitted before the iterator exists would be lost.
    this.lines = this.rl[Symbol.asyncIterator]();
    this.closedSignal = new Promise(resolve => {
      this.signalClosed = () => {
        resolve(null);
      };
    });
  }

  /**
   * Next line, or null at end of input. A read pending at close() resolves null.
   */
  async readCommand(): Promise<string | null> {
    if (this.closed) return null;
    const next = await Promise.race([this.lines.next(), this.closedSignal]);
    if (next === null || next.done === true) return null;
    return next.value;
  }

  report(message: string, severity: Severity, options?: ReportOptions): void {
    if (options?.persistent === true && this.notices) {
      this.notices.pin(message, severity);
    }

    if (this.notices?.running === true) {
      if (severity === "error") logger.error(message);
      else if (severity === "warn") logger.warn(message);
      else logger.info(message);
      return;
    }

    this.output.write(`${PREFIX[severity]}${message}\n`);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.signalClosed();
    this.rl.close();
  }
}
