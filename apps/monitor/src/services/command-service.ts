/**
 * Command Service
 *
 * Reads command lines from a CommandIO and dispatches them to a fixed
 * vocabulary. Runs alongside ingestion; nothing a command does can end the
 * loop except stop() or the end of input.
 */

import Decimal from "decimal.js";
import { logger } from "@crypto-monitor/utils";

import type { CommandIO } from "../types";
import type { BatchWriter } from "./batch-writer";
import type { MarketState } from "./market-state";
import type { StreamIngestor } from "./stream-ingestor";

export interface CommandDefinition {
  name: string;
  aliases?: readonly string[];
  description: string;
  run(args: readonly string[], io: CommandIO): void | Promise<void>;
}

export class CommandService {
  private readonly io: CommandIO;
  private readonly commands = new Map<string, CommandDefinition>();
  private loop: Promise<void> | null = null;
  private stopped = false;

  constructor(io: CommandIO, commands: readonly CommandDefinition[]) {
    this.io = io;
    for (const command of commands) {
      for (const key of [command.name, ...(command.aliases ?? [])]) {
        this.commands.set(key.toLowerCase(), command);
      }
    }
  }

  /**
   * Start the read loop (once). Resolves when the loop ends.
   */
  start(): Promise<void> {
    if (!this.loop) {
      this.loop = this.readLoop();
    }
    return this.loop;
  }

  /**
   * End the loop and close the IO. Idempotent.
   */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.io.close();
  }

  get isRunning(): boolean {
    return this.loop !== null && !this.stopped;
  }

  /**
   * Run one command line. Exposed for the read loop and tests.
   */
  async dispatch(line: string): Promise<void> {
    const [head, ...args] = line.trim().split(/\s+/);
    if (head === undefined || head === "") return;

    const command = this.commands.get(head.toLowerCase());
    if (!command) {
      this.io.report(`Unknown command: ${head}. Type "help" for a list of commands.`, "error");
      return;
    }

    try {
      await command.run(args, this.io);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error("Command failed", { command: command.name, error });
      this.io.report(`Command "${command.name}" failed: ${message}`, "error");
    }
  }

  private async readLoop(): Promise<void> {
    while (!this.stopped) {
      let line: string | null;
      try {
        line = await this.io.readCommand();
      } catch (error: unknown) {
        logger.error("Reading command input failed; command loop stopped", { error });
        return;
      }

      if (line === null) {
        logger.info("Command input ended");
        return;
      }
      if (this.stopped) return;

      await this.dispatch(line);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Default vocabulary
// ─────────────────────────────────────────────────────────────────────────────

export interface DefaultCommandDeps {
  ingestor: Pick<StreamIngestor, "getState" | "getStats" | "reconnect">;
  market: Pick<MarketState, "summary" | "snapshot">;
  writer: Pick<BatchWriter, "getStats" | "flush">;
  requestShutdown: (reason: string) => void;
}

/**
 * Mid price and spread of the top of book, or null when a side is empty
 */
export function topOfBook(bid: string | undefined, ask: string | undefined): { mid: string; spread: string } | null {
  if (bid === undefined || ask === undefined) return null;
  const b = new Decimal(bid);
  const a = new Decimal(ask);
  return { mid: b.plus(a).div(2).toFixed(), spread: a.minus(b).toFixed() };
}

export function statusLines(deps: Pick<DefaultCommandDeps, "ingestor" | "market" | "writer">): string[] {
  const ingest = deps.ingestor.getStats();
  const writer = deps.writer.getStats();

  const lines = [
    `connection: ${deps.ingestor.getState()} (messages=${ingest.messages} decodeErrors=${ingest.decodeErrors} reconnects=${ingest.reconnects})`,
    `batch: pending=${writer.pending} written=${writer.written} failedFlushes=${writer.failedFlushes}`,
  ];

  for (const summary of deps.market.summary()) {
    const book = deps.market.snapshot(summary.symbol)?.book ?? null;
    const top = topOfBook(book?.bids[0]?.price, book?.asks[0]?.price);
    const bookPart = book ? `book seq=${book.sequence}` : "book none";
    const topPart = top ? ` mid=${top.mid} spread=${top.spread}` : "";
    lines.push(`${summary.symbol}: trades=${summary.tradeCount} ${bookPart}${topPart}`);
  }

  return lines;
}

export function createDefaultCommands(deps: DefaultCommandDeps): CommandDefinition[] {
  const commands: CommandDefinition[] = [
    {
      name: "status",
      description: "Connection state, per-symbol data and pending batch",
      run: (_args, io) => {
        for (const line of statusLines(deps)) io.report(line, "info");
      },
    },
    {
      name: "reconnect",
      description: "Drop and reopen the market data connection",
      run: async (_args, io) => {
        io.report("Reconnecting market data stream", "info");
        await deps.ingestor.reconnect();
      },
    },
    {
      name: "flush",
      description: "Write pending records to storage now",
      run: async (_args, io) => {
        const result = await deps.writer.flush();
        if (result.isOk()) {
          io.report(`Flushed; pending=${deps.writer.getStats().pending}`, "info");
        } else {
          io.report(
            `Flush failed after ${result.error.attempts} attempts (${result.error.pending} pending): ${result.error.message}`,
            "error",
          );
        }
      },
    },
    {
      name: "help",
      description: "List commands",
      run: (_args, io) => {
        for (const command of commands) {
          const aliases = command.aliases?.length ? ` (${command.aliases.join(", ")})` : "";
          io.report(`${command.name.padEnd(10)}${command.description}${aliases}`, "info");
        }
      },
    },
    {
      name: "quit",
      aliases: ["exit", "q"],
      description: "Shut down",
      run: () => {
        deps.requestShutdown("quit command");
      },
    },
  ];

  return commands;
}
