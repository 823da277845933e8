/**
 * CLI Dashboard (TTY UI)
 *
 * Live view of what the monitor is doing:
 * - Connection state and pinned notices (startup banner, command reports)
 * - Top of book and last trade per tracked symbol
 * - Ingestion counters and the pending batch
 * - Recent log lines (the logger is routed here while the dashboard runs)
 */

import {
  LayoutPolicy,
  LogBuffer,
  LogLevel,
  logger,
  resolveDashboardConfig,
  Style,
  TTYRenderer,
  TTYScreen,
  type LogRecord,
  type StyleToken,
} from "@crypto-monitor/utils";

import type { ConnectionState, MarketView, Severity } from "../types";
import type { BatchWriter } from "./batch-writer";
import { topOfBook } from "./command-service";
import type { NoticeBoard } from "./console-command-io";
import type { MarketState } from "./market-state";
import type { IngestorEvent, StreamIngestor } from "./stream-ingestor";

export interface DashboardSource {
  exchange: string;
  market: Pick<MarketState, "summary" | "snapshot">;
  ingestor: Pick<StreamIngestor, "getState" | "getStats" | "onEvent">;
  writer: Pick<BatchWriter, "getStats">;
}

export interface MonitorCliDashboardOptions {
  enabled: boolean;
  refreshMs?: number;
  noColor?: boolean;
  staleMs?: number;
  maxLogs?: number;
  isTTY?: boolean;
  write?: (chunk: string) => void;
  columns?: () => number | undefined;
  env?: NodeJS.ProcessEnv;
}

interface Notice {
  message: string;
  severity: Severity;
}

const MAX_NOTICES = 6;
const MAX_WIDTH = 140;

export class MonitorCliDashboard implements MarketView, NoticeBoard {
  private readonly source: DashboardSource;
  private readonly enabled: boolean;
  private readonly refreshMs: number;
  private readonly staleMs: number;

  private readonly style: Style;
  private readonly layout: LayoutPolicy;
  private readonly screen: TTYScreen;
  private readonly renderer: TTYRenderer;
  private readonly logs: LogBuffer;
  private readonly notices: Notice[] = [];

  private interval: ReturnType<typeof setInterval> | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly startedAtMs = Date.now();

  private lastSampleAtMs = Date.now();
  private lastSampleMessages = 0;
  private messagesPerSec = 0;

  constructor(source: DashboardSource, opts: MonitorCliDashboardOptions) {
    const cfg = resolveDashboardConfig({
      enabled: opts.enabled,
      refreshMs: opts.refreshMs ?? 250,
      noColor: opts.noColor ?? false,
      isTTY: opts.isTTY ?? process.stdout.isTTY,
    });
    const write = opts.write ?? ((chunk: string) => process.stdout.write(chunk));

    this.source = source;
    this.enabled = cfg.enabled;
    this.refreshMs = cfg.refreshMs;
    this.staleMs = opts.staleMs ?? 3_000;

    this.style = new Style({ noColor: cfg.noColor, ...(opts.env ? { env: opts.env } : {}) });
    this.layout = new LayoutPolicy(opts.columns);
    this.renderer = new TTYRenderer(write, this.layout);
    this.screen = new TTYScreen({ enabled: this.enabled, write });
    this.logs = new LogBuffer(opts.maxLogs ?? 200);
  }

  get running(): boolean {
    return this.interval !== null;
  }

  start(): boolean {
    if (!this.enabled) return false;
    if (this.interval) return true;

    this.screen.start();
    this.renderer.reset();

    // Route logs into dashboard (avoid stdout/stderr collisions).
    logger.setSink({
      write: r => {
        this.logs.push(r);
      },
    });
    this.unsubscribe = this.source.ingestor.onEvent(event => {
      this.onIngestorEvent(event);
    });

    this.interval = setInterval(() => {
      this.renderer.render(this.buildFrame(Date.now()));
    }, this.refreshMs);
    return true;
  }

  stop(): void {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
    this.unsubscribe?.();
    this.unsubscribe = null;
    logger.clearSink();
    this.screen.stop();
  }

  pin(message: string, severity: Severity): void {
    this.notices.push({ message, severity });
    if (this.notices.length > MAX_NOTICES) this.notices.shift();
  }

  /**
   * Lines of one frame, top to bottom.
   */
  buildFrame(nowMs: number): string[] {
    const width = Math.min(this.layout.getTerminalWidth(), MAX_WIDTH);
    this.sampleRates(nowMs);

    return [
      ...this.renderHeader(nowMs, width),
      ...this.renderNotices(width),
      ...this.renderMarketData(nowMs, width),
      ...this.renderMetrics(width),
      ...this.renderBuffers(width),
      ...this.renderLogs(width),
    ];
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Sections
  // ─────────────────────────────────────────────────────────────────────────────

  private renderHeader(nowMs: number, width: number): string[] {
    const title = this.style.wrap("MONITOR DASHBOARD", "bold", "white");
    const exchange = this.style.wrap(this.source.exchange, "bold", "cyan");
    const uptime = this.layout.formatDurationMs(nowMs - this.startedAtMs).trim();

    return [
      this.layout.sectionHeader(title, width),
      this.layout.boxRow(
        `${exchange}  ${this.connectionBadge(this.source.ingestor.getState())}  ${this.style.label("uptime")} ${uptime}`,
        width,
      ),
      this.layout.boxLine(width, "middle"),
    ];
  }

  private connectionBadge(state: ConnectionState): string {
    switch (state) {
      case "connected":
        return this.style.badge("CONNECTED", "bgGreen", "white", "bold");
      case "connecting":
        return this.style.badge("CONNECTING", "bgCyan", "white");
      case "closing":
        return this.style.badge("CLOSING", "bgYellow", "white", "bold");
      case "disconnected":
        return this.style.badge("DISCONNECTED", "bgRed", "white", "bold");
    }
  }

  private renderNotices(width: number): string[] {
    const lines = [this.layout.sectionHeader(this.style.wrap("NOTICES", "bold", "magenta"), width)];
    if (this.notices.length === 0) {
      lines.push(this.layout.boxRow(this.style.label("No notices"), width));
    }
    for (const n of this.notices) {
      const color: StyleToken =
        n.severity === "error" ? "red"
        : n.severity === "warn" ? "yellow"
        : "white";
      lines.push(this.layout.boxRow(this.style.wrap(n.message, color), width));
    }
    lines.push(this.layout.boxLine(width, "middle"));
    return lines;
  }

  private renderMarketData(nowMs: number, width: number): string[] {
    const lines = [this.layout.sectionHeader(this.style.wrap("MARKET DATA", "bold", "blue"), width)];

    for (const summary of this.source.market.summary()) {
      const symbol = this.style.wrap(summary.symbol.padEnd(10), "bold");
      const book = this.source.market.snapshot(summary.symbol)?.book ?? null;
      const bid = book?.bids[0];
      const ask = book?.asks[0];

      if (!book) {
        lines.push(this.layout.boxRow(`${symbol} ${this.style.label("Book: No data")}`, width));
      } else {
        const bidPart = bid ? `${this.style.wrap(bid.price, "green")} x ${bid.quantity}` : "-";
        const askPart = ask ? `${this.style.wrap(ask.price, "red")} x ${ask.quantity}` : "-";
        const top = topOfBook(bid?.price, ask?.price);
        const spread =
          top ? `${this.style.label("mid")} ${top.mid} ${this.style.label("spread")} ${top.spread}` : "";
        const age = this.style.wrap(
          this.layout.formatAgeMs(nowMs, book.receivedAt.getTime()),
          nowMs - book.receivedAt.getTime() >= this.staleMs ? "yellow" : "green",
        );
        lines.push(
          this.layout.boxRow(
            `${symbol} ${this.style.label("bid")} ${bidPart}  ${this.style.label("ask")} ${askPart}  ${spread}  ${this.style.label("age")} ${age}`,
            width,
          ),
        );
      }

      const trade = summary.lastTrade;
      if (!trade) {
        lines.push(this.layout.boxRow(`${" ".repeat(10)} ${this.style.label("Trade: No data")}`, width));
      } else {
        const side = this.style.wrap(trade.side.toUpperCase(), "bold", trade.side === "buy" ? "green" : "red");
        lines.push(
          this.layout.boxRow(
            `${" ".repeat(10)} ${this.style.label("Trade:")} ${side} ${trade.price} x ${trade.quantity}  ${this.style.label("count")} ${summary.tradeCount}  ${this.style.label("age")} ${this.layout.formatAgeMs(nowMs, trade.receivedAt.getTime())}`,
            width,
          ),
        );
      }
    }

    lines.push(this.layout.boxLine(width, "middle"));
    return lines;
  }

  private renderMetrics(width: number): string[] {
    const s = this.source.ingestor.getStats();
    const warnIf = (n: number): string => this.style.wrap(String(n), n > 0 ? "yellow" : "dim");

    return [
      this.layout.sectionHeader(this.style.wrap("METRICS", "bold", "yellow"), width),
      this.layout.boxRow(
        `${this.style.label("msgs")} ${s.messages} (${this.messagesPerSec.toFixed(1)}/s)  ${this.style.label("trades")} ${s.trades}  ${this.style.label("books")} ${s.books}`,
        width,
      ),
      this.layout.boxRow(
        `${this.style.label("decodeErr")} ${warnIf(s.decodeErrors)}  ${this.style.label("dup")} ${warnIf(s.duplicateTrades)}  ${this.style.label("unknown")} ${warnIf(s.unknownSymbols)}  ${this.style.label("resync")} ${warnIf(s.resyncs)}  ${this.style.label("reconnects")} ${warnIf(s.reconnects)}`,
        width,
      ),
      this.layout.boxLine(width, "middle"),
    ];
  }

  private renderBuffers(width: number): string[] {
    const w = this.source.writer.getStats();
    const pendingStyle: StyleToken =
      w.pending > 1000 ? "yellow"
      : w.pending > 0 ? "green"
      : "dim";

    return [
      this.layout.sectionHeader(this.style.wrap("BUFFERS", "bold", "cyan"), width),
      this.layout.boxRow(
        `${this.style.label("pending")} ${this.style.wrap(String(w.pending), pendingStyle)}  ${this.style.label("written")} ${w.written}  ${this.style.label("failedFlushes")} ${this.style.wrap(String(w.failedFlushes), w.failedFlushes > 0 ? "red" : "dim")}`,
        width,
      ),
      this.layout.boxLine(width, "middle"),
    ];
  }

  private renderLogs(width: number): string[] {
    const lines = [this.layout.sectionHeader(this.style.wrap("LOGS", "bold", "cyan"), width)];
    const recent = this.logs.latest(8);

    if (recent.length === 0) {
      lines.push(this.layout.boxRow(this.style.label("No logs yet"), width));
    }
    for (const r of recent) {
      lines.push(this.layout.boxRow(this.formatLog(r), width));
    }

    lines.push(this.layout.boxLine(width, "bottom"));
    return lines;
  }

  private formatLog(r: LogRecord): string {
    const time = this.style.label(new Date(r.tsMs).toISOString().slice(11, 19));
    switch (r.level) {
      case LogLevel.ERROR:
        return `${time} ${this.style.badge("ERR", "bgRed", "white", "bold")} ${this.style.wrap(r.message, "red")}`;
      case LogLevel.WARN:
        return `${time} ${this.style.badge("WRN", "bgYellow", "white", "bold")} ${this.style.wrap(r.message, "yellow")}`;
      case LogLevel.INFO:
        return `${time} ${this.style.wrap("INF", "cyan")} ${r.message}`;
      case LogLevel.DEBUG:
        return `${time} ${this.style.wrap("DBG", "dim")} ${this.style.wrap(r.message, "dim")}`;
      case LogLevel.LOG:
        return `${time} ${this.style.wrap("LOG", "dim")} ${r.message}`;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────────────────

  private sampleRates(nowMs: number): void {
    const dtMs = nowMs - this.lastSampleAtMs;
    if (dtMs < 1000) return;

    const messages = this.source.ingestor.getStats().messages;
    this.messagesPerSec = ((messages - this.lastSampleMessages) * 1000) / dtMs;
    this.lastSampleMessages = messages;
    this.lastSampleAtMs = nowMs;
  }

  private onIngestorEvent(event: IngestorEvent): void {
    if (event.type === "state") {
      this.logs.push({
        tsMs: event.ts.getTime(),
        level: event.state === "disconnected" ? LogLevel.WARN : LogLevel.INFO,
        message: `market data: ${event.state}${event.reason !== undefined ? ` (${event.reason})` : ""}`,
      });
    }
  }
}
