/**
 * Monitor Services
 *
 * Export all service modules
 */

export { BatchWriter, type BatchStorage, type BatchWriterError, type StorageError } from "./batch-writer";
export { MonitorCliDashboard, type DashboardSource } from "./cli-dashboard";
export { CommandService, createDefaultCommands, type CommandDefinition } from "./command-service";
export { ConsoleCommandIO, type NoticeBoard } from "./console-command-io";
export { LifecycleCoordinator, type ShutdownReport } from "./lifecycle-coordinator";
export { MarketState, type MarketStateError } from "./market-state";
export { PostgresBatchStorage } from "./postgres-batch-storage";
export { StreamIngestor, type IngestorEvent } from "./stream-ingestor";
