import { lineText, type Line, type ReviewTerminal } from '../../src/tui/terminal.js';

/**
 * Scripted terminal: keys and typed lines are consumed in order, output is
 * kept as plain text split into screens at every clear().
 */
export class FakeTerminal implements ReviewTerminal {
  readonly screens: string[][] = [[]];

  constructor(
    private readonly keys: string[] = [],
    private readonly lines: Array<string | null> = []
  ) {}

  clear(): void {
    this.screens.push([]);
  }

  print(line: Line | string): void {
    this.current().push(lineText(line));
  }

  async readKey(): Promise<string> {
    const key = this.keys.shift();
    if (key === undefined) {
      throw new Error('FakeTerminal: no more keys');
    }
    return key;
  }

  async readLine(label: string): Promise<string | null> {
    this.current().push(label);
    const line = this.lines.shift();
    if (line === undefined) {
      throw new Error('FakeTerminal: no more lines');
    }
    return line;
  }

  get output(): string[] {
    return this.screens.flat();
  }

  get remainingKeys(): number {
    return this.keys.length;
  }

  private current(): string[] {
    let screen = this.screens[this.screens.length - 1];
    if (!screen) {
      screen = [];
      this.screens.push(screen);
    }
    return screen;
  }
}
