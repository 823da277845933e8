export type StyleToken =
  | "reset"
  | "dim"
  | "bold"
  | "red"
  | "yellow"
  | "green"
  | "cyan"
  | "blue"
  | "magenta"
  | "white"
  | "bgRed"
  | "bgYellow"
  | "bgGreen"
  | "bgCyan"
  | "bgGray";

const ANSI: Record<StyleToken, string> = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  white: "\x1b[97m",
  bgRed: "\x1b[41m",
  bgYellow: "\x1b[43m",
  bgGreen: "\x1b[42m",
  bgCyan: "\x1b[46m",
  bgGray: "\x1b[100m",
};

/**
 * ANSI styling that collapses to plain text when color is disabled
 * (config flag or the NO_COLOR convention).
 */
export class Style {
  private readonly noColor: boolean;

  constructor(args: { noColor: boolean; env?: NodeJS.ProcessEnv }) {
    const env = args.env ?? process.env;
    this.noColor = args.noColor || env.NO_COLOR !== undefined;
  }

  enabled(): boolean {
    return !this.noColor;
  }

  token(t: StyleToken): string {
    return this.noColor ? "" : ANSI[t];
  }

  /**
   * Wrap text with style tokens and reset at the end.
   * e.g. style.wrap("ERROR", "bold", "red") => "\x1b[1m\x1b[31mERROR\x1b[0m"
   */
  wrap(text: string, ...tokens: StyleToken[]): string {
    if (this.noColor) return text;
    return tokens.map(t => ANSI[t]).join("") + text + ANSI.reset;
  }

  /**
   * Dimmed label, e.g. "Pending:".
   */
  label(text: string): string {
    return this.wrap(text, "dim");
  }

  /**
   * Padded badge for status indicators: " OK ".
   */
  badge(text: string, ...tokens: StyleToken[]): string {
    return this.wrap(` ${text} `, ...tokens);
  }
}
