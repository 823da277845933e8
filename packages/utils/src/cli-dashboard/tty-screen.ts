const ANSI = {
  altScreenOn: "\x1b[?1049h",
  altScreenOff: "\x1b[?1049l",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
} as const;

/**
 * Enters/leaves the alternate screen buffer. start/stop are idempotent.
 *
 * Restoring the terminal on exit is the owner's job: the process shutdown path
 * calls stop(), so no signal handlers are registered here.
 */
export class TTYScreen {
  private readonly enabled: boolean;
  private readonly write: (chunk: string) => void;
  private started = false;

  constructor(args: { enabled: boolean; write: (chunk: string) => void }) {
    this.enabled = args.enabled;
    this.write = args.write;
  }

  isStarted(): boolean {
    return this.started;
  }

  start(): void {
    if (!this.enabled || this.started) return;
    this.started = true;
    this.write(ANSI.altScreenOn + ANSI.hideCursor);
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    this.write(ANSI.showCursor + ANSI.altScreenOff);
  }
}
