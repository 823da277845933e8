/**
 * Monitor Main Entry Point
 *
 * - Stream trades and order books for the configured symbols
 * - Keep the latest state in memory, persist records in batches
 * - Serve commands on stdin and an optional TTY dashboard
 * - Shut down once, in order, on quit or a signal
 */

import "dotenv/config";

import { BinanceMarketFeed } from "@crypto-monitor/adapters";
import { closeDb, getDb } from "@crypto-monitor/db";
import { createPostgresMarketDataRepository } from "@crypto-monitor/repositories";
import { logger } from "@crypto-monitor/utils";

import { redactDatabaseUrl, toMonitorConfig } from "./config";
import { loadEnv } from "./env";
import {
  BatchWriter,
  CommandService,
  ConsoleCommandIO,
  createDefaultCommands,
  LifecycleCoordinator,
  MarketState,
  MonitorCliDashboard,
  PostgresBatchStorage,
  StreamIngestor,
} from "./services";

const APP_VERSION = "0.1.0";

async function main(): Promise<void> {
  const config = toMonitorConfig(loadEnv());

  logger.info("Starting monitor", {
    symbols: config.symbols.join(","),
    batchSize: config.batch.size,
    flushIntervalMs: config.batch.flushIntervalMs,
  });

  // Persistence
  const db = getDb(config.databaseUrl);
  const feed = new BinanceMarketFeed(config.feed);
  const storage = new PostgresBatchStorage(createPostgresMarketDataRepository(db), feed.exchange, () => closeDb(db));
  const writer = new BatchWriter(storage, {
    batchSize: config.batch.size,
    maxAttempts: config.batch.maxAttempts,
    retryBaseDelayMs: config.batch.retryBaseDelayMs,
  });

  // Ingestion
  const market = new MarketState({
    symbols: config.symbols,
    tradeHistoryCapacity: config.ingest.tradeHistoryCapacity,
  });
  const ingestor = new StreamIngestor({
    feed,
    symbols: config.symbols,
    market,
    sink: writer,
    reconnectBackoff: {
      initialDelayMs: config.ingest.reconnectInitialMs,
      maxDelayMs: config.ingest.reconnectMaxMs,
      multiplier: 2,
    },
    staleTimeoutMs: config.ingest.staleTimeoutMs,
  });

  // Interaction
  const dashboard =
    config.dashboard.enabled ?
      new MonitorCliDashboard(
        { exchange: feed.exchange, market, ingestor, writer },
        {
          enabled: true,
          refreshMs: config.dashboard.refreshMs,
          noColor: config.dashboard.noColor,
          staleMs: config.dashboard.staleMs,
        },
      )
    : null;
  const io = new ConsoleCommandIO({ input: process.stdin, output: process.stdout, notices: dashboard });

  let coordinator: LifecycleCoordinator | null = null;
  const commands = new CommandService(
    io,
    createDefaultCommands({
      ingestor,
      market,
      writer,
      requestShutdown: reason => {
        if (coordinator) void coordinator.shutdown(reason);
      },
    }),
  );

  coordinator = new LifecycleCoordinator({
    version: APP_VERSION,
    databaseLabel: redactDatabaseUrl(config.databaseUrl),
    symbols: config.symbols,
    io,
    commands,
    ingestor,
    writer,
    view: dashboard,
    flushIntervalMs: config.batch.flushIntervalMs,
    stepTimeoutMs: config.shutdownStepTimeoutMs,
  });

  const uninstall = coordinator.installSignalHandlers(process);
  coordinator.start();

  const report = await coordinator.waitForShutdown();
  uninstall();

  const failed = report.steps.some(s => !s.ok) || report.unflushed > 0;
  process.exit(failed ? 1 : 0);
}

main().catch((error: unknown) => {
  logger.clearSink();
  logger.error("Fatal error", error);
  process.exit(1);
});
