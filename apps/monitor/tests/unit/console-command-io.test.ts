import { PassThrough } from "node:stream";

import { LogLevel } from "@crypto-monitor/utils";
import { captureLogs } from "@crypto-monitor/utils/testing";
import { describe, expect, test } from "vitest";

import { ConsoleCommandIO, type NoticeBoard } from "../../src/services/console-command-io";
import type { Severity } from "../../src/types";

class FakeNotices implements NoticeBoard {
  readonly pinned: { message: string; severity: Severity }[] = [];
  constructor(public running: boolean) {}

  pin(message: string, severity: Severity): void {
    this.pinned.push({ message, severity });
  }
}

function makeIO(notices: NoticeBoard | null = null) {
  const input = new PassThrough();
  const written: string[] = [];
  const io = new ConsoleCommandIO({
    input,
    output: {
      write: (chunk: string) => {
        written.push(chunk);
        return true;
      },
    },
    notices,
  });
  return { input, written, io };
}

describe("ConsoleCommandIO.readCommand", () => {
  test("yields input lines in order, then null at end of input", async () => {
    const { input, io } = makeIO();
    input.write("status\nhelp\n");
    input.end();

    expect(await io.readCommand()).toBe("status");
    expect(await io.readCommand()).toBe("help");
    expect(await io.readCommand()).toBeNull();
    io.close();
  });

  test("a read pending at close resolves null", async () => {
    const { io } = makeIO();
    const pending = io.readCommand();

    io.close();

    expect(await pending).toBeNull();
    expect(await io.readCommand()).toBeNull();
  });
});

describe("ConsoleCommandIO.report", () => {
  test("writes to the output with a severity prefix", () => {
    const { io, written } = makeIO();

    io.report("hello", "info");
    io.report("careful", "warn");
    io.report("bad", "error");
    io.close();

    expect(written).toEqual(["hello\n", "warning: careful\n", "error: bad\n"]);
  });

  test("pins persistent messages and still prints them while the view is off", () => {
    const notices = new FakeNotices(false);
    const { io, written } = makeIO(notices);

    io.report("symbols: BTCUSDT", "info", { persistent: true });
    io.report("transient", "info");
    io.close();

    expect(notices.pinned).toEqual([{ message: "symbols: BTCUSDT", severity: "info" }]);
    expect(written).toEqual(["symbols: BTCUSDT\n", "transient\n"]);
  });

  test("routes through the logger while the view owns the screen", () => {
    const { io, written } = makeIO(new FakeNotices(true));
    const logs = captureLogs();
    try {
      io.report("flush failed", "error");
      io.report("ok", "info");
    } finally {
      logs.restore();
      io.close();
    }

    expect(written).toEqual([]);
    expect(logs.records.map(r => [r.level, r.message])).toEqual([
      [LogLevel.ERROR, "flush failed"],
      [LogLevel.INFO, "ok"],
    ]);
  });
});
