import { describe, expect, test } from "vitest";

import { LayoutPolicy } from "../../src/cli-dashboard/layout-policy";
import { TTYRenderer } from "../../src/cli-dashboard/tty-renderer";

function makeRenderer(columns = 80) {
  const writes: string[] = [];
  const renderer = new TTYRenderer(s => writes.push(s), new LayoutPolicy(() => columns));
  return { writes, renderer };
}

describe("TTYRenderer", () => {
  test("writes changed lines only", () => {
    const { writes, renderer } = makeRenderer();

    renderer.render(["a", "b"]);
    renderer.render(["a", "c"]);

    expect(writes).toEqual(["\x1b[1;1H\x1b[2Ka\x1b[2;1H\x1b[2Kb", "\x1b[2;1H\x1b[2Kc"]);
  });

  test("does not write when the frame is unchanged", () => {
    const { writes, renderer } = makeRenderer();

    renderer.render(["a", "b", "c"]);
    renderer.render(["a", "b", "c"]);

    expect(writes).toHaveLength(1);
  });

  test("erases lines removed from the frame", () => {
    const { writes, renderer } = makeRenderer();

    renderer.render(["line1", "line2", "line3"]);
    renderer.render(["line1"]);

    expect(writes[1]).toBe("\x1b[2;1H\x1b[2K\x1b[3;1H\x1b[2K");
  });

  test("replaces line breaks and tabs with spaces", () => {
    const { writes, renderer } = makeRenderer();

    renderer.render(["hello\nworld\tx"]);

    expect(writes[0]).toBe("\x1b[1;1H\x1b[2Khello world x");
  });

  test("clamps lines to the terminal width", () => {
    const { writes, renderer } = makeRenderer(10);

    renderer.render(["0123456789ABCDEFGHIJ"]);

    expect(writes[0]).toBe("\x1b[1;1H\x1b[2K012345678\x1b[0m…");
  });

  test("reset forces a full redraw", () => {
    const { writes, renderer } = makeRenderer();

    renderer.render(["x"]);
    renderer.reset();
    renderer.render(["x"]);

    expect(writes).toHaveLength(2);
  });
});
