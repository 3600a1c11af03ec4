/**
 * Progress feedback while snippets compile and run and while sinks deploy.
 * Everything goes to stderr so program output on stdout stays clean.
 */

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const FRAME_MS = 80;

/** One piece of work in flight; each concurrent caller finishes its own. */
export interface StatusTask {
  succeed(text: string): void;
  fail(text: string): void;
}

export interface StatusReporter {
  start(text: string): StatusTask;
  /** Drop every task still in flight without a final line. */
  stop(): void;
}

/** The slice of a tty stream the reporter writes to. */
export interface StatusStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

interface ActiveTask {
  text: string;
}

/**
 * Spinner on a TTY, one line per event otherwise (CI, pipes). With several
 * tasks in flight the spinner shows the newest and counts the rest.
 */
export class TerminalStatusReporter implements StatusReporter {
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private active: ActiveTask[] = [];
  private readonly isTTY: boolean;

  constructor(private stream: StatusStream = process.stderr) {
    this.isTTY = Boolean(stream.isTTY);
  }

  start(text: string): StatusTask {
    const task: ActiveTask = { text };
    this.active.push(task);

    if (!this.isTTY) {
      this.stream.write(`  ◌ ${text}\n`);
    } else {
      this.render();
      if (this.timer === null) {
        this.timer = setInterval(() => this.render(), FRAME_MS);
        // A spinner alone must not keep the process alive
        this.timer.unref();
      }
    }

    return {
      succeed: done => this.finish(task, '✔', done),
      fail: done => this.finish(task, '✖', done),
    };
  }

  stop(): void {
    this.active = [];
    this.clearTimer();
    if (this.isTTY) this.stream.write('\r\x1b[K');
  }

  private finish(task: ActiveTask, symbol: string, text: string): void {
    const index = this.active.indexOf(task);
    if (index === -1) return;
    this.active.splice(index, 1);

    if (this.isTTY) this.stream.write('\r\x1b[K');
    this.stream.write(`  ${symbol} ${text}\n`);

    if (this.active.length === 0) {
      this.clearTimer();
    } else if (this.isTTY) {
      this.render();
    }
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private render(): void {
    if (this.active.length === 0) return;
    const current = this.active[this.active.length - 1];
    const glyph = FRAMES[this.frame++ % FRAMES.length];
    const more = this.active.length > 1 ? ` (+${this.active.length - 1} more)` : '';
    this.stream.write(`\r\x1b[K  ${glyph} ${current.text}${more}`);
  }
}

const SILENT_TASK: StatusTask = {
  succeed: () => {},
  fail: () => {},
};

/** For --quiet and tests. */
export class SilentStatusReporter implements StatusReporter {
  start(_text: string): StatusTask {
    return SILENT_TASK;
  }
  stop(): void {}
}
