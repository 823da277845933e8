// Unicode box-drawing characters for the dashboard frame
export const BOX = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
  teeRight: "├",
  teeLeft: "┤",
} as const;

const DEFAULT_TERM_WIDTH = 120;

export class LayoutPolicy {
  private readonly columns: () => number | undefined;

  constructor(columns: () => number | undefined = () => process.stdout.columns) {
    this.columns = columns;
  }

  getTerminalWidth(): number {
    return this.columns() ?? DEFAULT_TERM_WIDTH;
  }

  /**
   * Length of text as displayed, skipping ANSI SGR sequences.
   */
  visibleLength(text: string): number {
    let visibleLen = 0;
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 27 && text[i + 1] === "[") {
        i += 2;
        while (i < text.length && text[i] !== "m") i++;
        continue;
      }
      visibleLen++;
    }
    return visibleLen;
  }

  /**
   * Cut text to `width` visible columns, keeping ANSI sequences intact and
   * ending with an ellipsis.
   */
  truncate(text: string, width: number): string {
    if (width <= 0) return "";
    if (this.visibleLength(text) <= width) return text;

    let result = "";
    let visibleLen = 0;
    const targetWidth = width - 1; // room for the ellipsis

    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 27 && text[i + 1] === "[") {
        let seq = "";
        while (i < text.length) {
          seq += text[i];
          if (text[i] === "m") break;
          i++;
        }
        result += seq;
        continue;
      }

      if (visibleLen >= targetWidth) break;
      result += text[i];
      visibleLen++;
    }

    return `${result}\x1b[0m…`;
  }

  padRight(text: string, width: number): string {
    const visibleLen = this.visibleLength(text);
    if (visibleLen >= width) return text;
    return text + " ".repeat(width - visibleLen);
  }

  boxLine(width: number, type: "middle" | "bottom"): string {
    const innerWidth = Math.max(0, width - 2);
    const left = type === "middle" ? BOX.teeRight : BOX.bottomLeft;
    const right = type === "middle" ? BOX.teeLeft : BOX.bottomRight;
    return left + BOX.horizontal.repeat(innerWidth) + right;
  }

  /**
   * Content row between vertical borders, truncated to fit.
   */
  boxRow(content: string, width: number): string {
    const innerWidth = Math.max(0, width - 4);
    const fitted = this.visibleLength(content) > innerWidth ? this.truncate(content, innerWidth) : content;
    return `${BOX.vertical} ${this.padRight(fitted, innerWidth)} ${BOX.vertical}`;
  }

  /**
   * Top border with a centered title: ┌──── TITLE ────┐
   */
  sectionHeader(title: string, width: number): string {
    const innerWidth = Math.max(0, width - 2);
    const maxTitleLen = Math.max(1, innerWidth - 4);
    const fitted = this.visibleLength(title) > maxTitleLen ? this.truncate(title, maxTitleLen) : title;
    const remaining = Math.max(2, innerWidth - this.visibleLength(fitted) - 2);
    const leftDash = Math.floor(remaining / 2);
    const rightDash = remaining - leftDash;

    return `${BOX.topLeft}${BOX.horizontal.repeat(leftDash)} ${fitted} ${BOX.horizontal.repeat(rightDash)}${BOX.topRight}`;
  }

  formatAgeMs(nowMs: number, tsMs?: number | null): string {
    if (tsMs === null || tsMs === undefined) return "-";
    return this.formatDurationMs(Math.max(0, nowMs - tsMs)).trim();
  }

  /**
   * Fixed-width duration for uptime and elapsed timers.
   */
  formatDurationMs(durationMs: number): string {
    const d = Math.max(0, Math.floor(durationMs));
    const s =
      d < 1_000 ? `${d}ms`
      : d < 60_000 ? `${(d / 1_000).toFixed(1)}s`
      : d < 3_600_000 ? `${(d / 60_000).toFixed(1)}m`
      : `${(d / 3_600_000).toFixed(1)}h`;
    return s.padStart(6, " ");
  }
}
