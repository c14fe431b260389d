import terminalKit from 'terminal-kit';

export type Style =
  | 'plain'
  | 'bold'
  | 'dim'
  | 'alert'
  | 'ok'
  | 'info'
  | 'user'
  | 'project'
  | 'text'
  | 'muted'
  | 'red'
  | 'green'
  | 'yellow'
  | 'blue'
  | 'magenta'
  | 'cyan';

export interface Segment {
  text: string;
  style?: Style;
}

export type Line = Segment[];

/**
 * What the review engine needs from a terminal. Keys arrive one at a time
 * without echo; readLine is the only place typed text is collected.
 */
export interface ReviewTerminal {
  clear(): void;
  print(line: Line | string): void;
  /** Next key name: a printable character, or ENTER / ESCAPE / CTRL_C / ... */
  readKey(): Promise<string>;
  /** Line prompt; null when cancelled. */
  readLine(label: string): Promise<string | null>;
}

export function lineText(line: Line | string): string {
  return typeof line === 'string' ? line : line.map((s) => s.text).join('');
}

type Term = typeof terminalKit.terminal;

type KeyListener = (name: string) => void;

export interface KeyEvents {
  on(event: 'key', listener: KeyListener): unknown;
  removeListener(event: 'key', listener: KeyListener): unknown;
}

/**
 * Buffers key events from one persistent listener. terminal-kit emits every
 * key of a stdin chunk synchronously, so keys typed ahead wait here until
 * the next read.
 */
export class KeyQueue {
  private readonly pending: string[] = [];
  private waiter: KeyListener | null = null;
  private paused = false;

  private readonly onKey: KeyListener = (name) => {
    if (this.paused) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(name);
      return;
    }
    this.pending.push(name);
  };

  constructor(private readonly source: KeyEvents) {}

  attach(): void {
    this.source.on('key', this.onKey);
  }

  detach(): void {
    this.source.removeListener('key', this.onKey);
    this.pending.length = 0;
  }

  /** While paused (a line prompt owns the keyboard) keys are not queued. */
  setPaused(paused: boolean): void {
    this.paused = paused;
  }

  next(): Promise<string> {
    const queued = this.pending.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    return new Promise<string>((resolve) => {
      this.waiter = resolve;
    });
  }
}

export class KitTerminal implements ReviewTerminal {
  private readonly paint: Record<Style, (s: string) => void>;
  private readonly keys: KeyQueue;

  constructor(
    private readonly term: Term,
    private readonly colorsDisabled: boolean
  ) {
    this.keys = new KeyQueue({
      on: (event, listener) => term.on(event, listener),
      removeListener: (event, listener) => term.removeListener(event, listener),
    });
    this.paint = {
      plain: (s) => term(s),
      bold: (s) => term.bold(s),
      dim: (s) => term.dim(s),
      alert: (s) => term.bgRed.white(s),
      ok: (s) => term.bgGreen.black(s),
      info: (s) => term.bgBlue.white(s),
      user: (s) => term.bgYellow.black(s),
      project: (s) => term.bgCyan.black(s),
      text: (s) => term.bgWhite.black(s),
      muted: (s) => term.bgBlack.white(s),
      red: (s) => term.red(s),
      green: (s) => term.green(s),
      yellow: (s) => term.yellow(s),
      blue: (s) => term.blue(s),
      magenta: (s) => term.magenta(s),
      cyan: (s) => term.cyan(s),
    };
  }

  /** Single-key input, no echo. */
  open(): void {
    this.term.grabInput(true);
    this.term.hideCursor(true);
    this.keys.attach();
  }

  close(): void {
    this.keys.detach();
    this.term.grabInput(false);
    this.term.hideCursor(false);
    this.term.styleReset();
    this.term('\n');
  }

  clear(): void {
    this.term.clear();
  }

  print(line: Line | string): void {
    const segments = typeof line === 'string' ? [{ text: line }] : line;
    for (const segment of segments) {
      const style = this.colorsDisabled ? 'plain' : (segment.style ?? 'plain');
      this.paint[style](segment.text);
      this.term.styleReset();
    }
    this.term('\n');
  }

  readKey(): Promise<string> {
    return this.keys.next();
  }

  readLine(label: string): Promise<string | null> {
    this.term(label);
    this.term.hideCursor(false);
    this.keys.setPaused(true);
    return new Promise<string | null>((resolve) => {
      this.term.inputField({ cancelable: true }, (error: unknown, input?: string) => {
        this.keys.setPaused(false);
        this.term.hideCursor(true);
        this.term('\n');
        if (error) {
          resolve(null);
          return;
        }
        resolve(input ?? null);
      });
    });
  }
}
