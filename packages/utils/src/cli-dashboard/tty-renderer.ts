import { LayoutPolicy } from "./layout-policy";

const ANSI = {
  cup: (row: number, col: number) => `\x1b[${row};${col}H`,
  eraseLine: "\x1b[2K",
} as const;

/**
 * Diff renderer: rewrites only the lines that changed since the previous frame.
 */
export class TTYRenderer {
  private prev: string[] = [];
  private readonly write: (chunk: string) => void;
  private readonly layout: LayoutPolicy;

  constructor(write: (chunk: string) => void, layout: LayoutPolicy = new LayoutPolicy()) {
    this.write = write;
    this.layout = layout;
  }

  reset(): void {
    this.prev = [];
  }

  private normalizeLine(line: string, maxCols: number): string {
    // One frame line must map to exactly one terminal line.
    let s = "";
    for (const ch of line) {
      const code = ch.charCodeAt(0);
      if (ch === "\n" || ch === "\r" || ch === "\t" || ch === "\u2028" || ch === "\u2029") {
        s += " ";
        continue;
      }
      // Drop C0 controls and DEL, keep ESC for SGR sequences.
      if ((code < 32 && code !== 27) || code === 127) continue;
      s += ch;
    }

    if (maxCols > 0 && this.layout.visibleLength(s) > maxCols) {
      s = this.layout.truncate(s, maxCols);
    }
    return s;
  }

  render(frame: ReadonlyArray<string>): void {
    const cols = this.layout.getTerminalWidth();
    const next = frame.map(line => this.normalizeLine(line, cols));

    const chunks: string[] = [];
    const maxLines = Math.max(this.prev.length, next.length);

    for (let i = 0; i < maxLines; i++) {
      const nextLine = next[i];
      if (nextLine === undefined) {
        chunks.push(ANSI.cup(i + 1, 1), ANSI.eraseLine);
        continue;
      }
      if (this.prev[i] === nextLine) continue;
      chunks.push(ANSI.cup(i + 1, 1), ANSI.eraseLine, nextLine);
    }

    if (chunks.length === 0) return;

    this.prev = next;
    this.write(chunks.join(""));
  }
}
