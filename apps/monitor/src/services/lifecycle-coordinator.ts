/**
 * Lifecycle Coordinator
 *
 * Starts the components and shuts them down exactly once, in a fixed order:
 * command service, stream ingestor, visualization, batch writer.
 * Each step is time-bounded; a failing step is reported and the next one still runs.
 */

import { err, ok, type Result } from "neverthrow";
import { logger } from "@crypto-monitor/utils";

import type { CommandIO, MarketView, Severity } from "../types";
import type { BatchWriter } from "./batch-writer";
import type { CommandService } from "./command-service";
import type { StreamIngestor } from "./stream-ingestor";

export interface ShutdownStepReport {
  name: string;
  ok: boolean;
  error?: string;
}

export interface ShutdownReport {
  reason: string;
  steps: ShutdownStepReport[];
  /**
   * Records still pending after the final flush
   */
  unflushed: number;
}

export interface LifecycleDeps {
  version: string;
  /**
   * Database location with credentials removed
   */
  databaseLabel: string;
  symbols: readonly string[];
  io: CommandIO;
  commands: Pick<CommandService, "start" | "stop">;
  ingestor: Pick<StreamIngestor, "connect" | "close">;
  writer: Pick<BatchWriter, "flush" | "close" | "startFlushInterval" | "getStats">;
  view: MarketView | null;
  flushIntervalMs: number;
  stepTimeoutMs: number;
}

/**
 * Minimal event emitter surface (process, or an EventEmitter in tests)
 */
export interface SignalTarget {
  on(event: string, listener: () => void): unknown;
  off(event: string, listener: () => void): unknown;
}

const SHUTDOWN_EVENTS = ["SIGINT", "SIGTERM", "beforeExit"] as const;

export class LifecycleCoordinator {
  private readonly deps: LifecycleDeps;
  private started = false;
  private commandLoop: Promise<void> | null = null;
  private shutdownPromise: Promise<ShutdownReport> | null = null;
  private resolveDone: (report: ShutdownReport) => void = () => undefined;
  private readonly done: Promise<ShutdownReport>;

  constructor(deps: LifecycleDeps) {
    this.deps = deps;
    this.done = new Promise(resolve => {
      this.resolveDone = resolve;
    });
  }

  start(): void {
    if (this.started || this.shutdownPromise) return;
    this.started = true;

    const { io, version, databaseLabel, symbols } = this.deps;
    io.report(`crypto-monitor v${version}`, "info", { persistent: true });
    io.report(`database: ${databaseLabel}`, "info", { persistent: true });
    io.report(`symbols: ${symbols.join(", ")}`, "info", { persistent: true });
    io.report('Type "help" for a list of commands.', "info", { persistent: true });

    this.commandLoop = this.deps.commands.start();
    void this.deps.ingestor.connect();
    this.deps.writer.startFlushInterval(this.deps.flushIntervalMs);

    const view = this.deps.view;
    if (view) {
      try {
        if (view.start()) {
          io.report("Dashboard started", "info", { persistent: true });
        } else {
          io.report("Dashboard could not start (no TTY); continuing without it", "error");
        }
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        io.report(`Dashboard failed to start: ${message}`, "error");
      }
    }

    logger.info("Monitor started", { symbols: symbols.join(",") });
  }

  /**
   * Shut down once. Every call returns the same report.
   */
  shutdown(reason: string): Promise<ShutdownReport> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown(reason);
    }
    return this.shutdownPromise;
  }

  /**
   * Resolves when a shutdown, triggered from anywhere, has finished.
   */
  waitForShutdown(): Promise<ShutdownReport> {
    return this.done;
  }

  /**
   * Route SIGINT, SIGTERM and beforeExit to shutdown(). Returns an uninstaller.
   */
  installSignalHandlers(target: SignalTarget): () => void {
    const installed = SHUTDOWN_EVENTS.map(event => {
      const listener = (): void => {
        void this.shutdown(event);
      };
      target.on(event, listener);
      return { event, listener };
    });

    return () => {
      for (const { event, listener } of installed) {
        target.off(event, listener);
      }
    };
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private async runShutdown(reason: string): Promise<ShutdownReport> {
    logger.info("Shutting down", { reason });
    const { commands, ingestor, view, writer } = this.deps;
    const steps: ShutdownStepReport[] = [];
    const progress: { message: string; severity: Severity }[] = [];
    const announce = (message: string, severity: Severity): void => {
      progress.push({ message, severity });
      this.deps.io.report(message, severity, { persistent: true });
    };
    const fail = (message: string): void => {
      announce(message, "error");
    };

    announce(`Shutting down (${reason})`, "info");

    steps.push(
      await this.runStep("command-service", async () => {
        commands.stop();
        if (this.commandLoop) await this.commandLoop;
        return ok(undefined);
      }, fail),
    );

    steps.push(
      await this.runStep("stream-ingestor", async () => {
        await ingestor.close();
        return ok(undefined);
      }, fail),
    );

    const viewWasRunning = view?.running === true;
    steps.push(
      await this.runStep("visualization", async () => {
        if (view?.running === true) view.stop();
        return ok(undefined);
      }, fail),
    );
    // Progress shown on the dashboard went away with its screen.
    if (viewWasRunning) {
      for (const p of progress) this.deps.io.report(p.message, p.severity);
    }

    const storageStep = await this.runStep("batch-writer", async () => {
      const flushed = await writer.flush();
      const closed = await writer.close();
      if (flushed.isErr()) return err(flushed.error.message);
      return closed.mapErr(e => e.message);
    }, fail);
    steps.push(storageStep);
    if (storageStep.ok) announce("Remaining records flushed; storage closed", "info");

    const unflushed = writer.getStats().pending;
    if (unflushed > 0) {
      logger.error("Shutdown finished with unflushed records (data loss risk)", { unflushed });
      announce(`${unflushed} records unflushed (data loss risk)`, "error");
    }
    announce("Shutdown complete", "info");

    const report: ShutdownReport = { reason, steps, unflushed };
    logger.info("Shutdown complete", {
      reason,
      failedSteps: steps.filter(s => !s.ok).map(s => s.name),
      unflushed,
    });
    this.resolveDone(report);
    return report;
  }

  private async runStep(
    name: string,
    fn: () => Promise<Result<void, string>>,
    onFailure: (message: string) => void,
  ): Promise<ShutdownStepReport> {
    const timeoutMs = this.deps.stepTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<Result<void, string>>(resolve => {
      timer = setTimeout(() => {
        resolve(err(`timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    let result: Result<void, string>;
    try {
      result = await Promise.race([fn(), timeout]);
    } catch (error: unknown) {
      result = err(error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timer);
    }

    if (result.isErr()) {
      logger.error(`Shutdown step failed: ${name}`, { error: result.error });
      onFailure(`Shutdown step ${name} failed: ${result.error}`);
      return { name, ok: false, error: result.error };
    }
    return { name, ok: true };
  }
}
