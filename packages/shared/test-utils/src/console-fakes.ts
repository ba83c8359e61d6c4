/**
 * In-process stand-ins for the terminal: a line reader that replays a script
 * and an output sink that records everything written to it.
 */

const ANSI_ESCAPE = /\x1B\[[0-9;]*[A-Za-z]/g;

export class ScriptedLineReader {
  readonly prompts: string[] = [];
  private closed = false;

  constructor(private readonly lines: string[]) {}

  async readLine(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    if (this.closed) return null;
    return this.lines.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }

  get remaining(): number {
    return this.lines.length;
  }
}

export class MemoryOutput {
  private buffer = '';
  clears = 0;

  write(text: string): void {
    this.clears += (text.match(/\x1B\[2J/g) ?? []).length;
    this.buffer += text;
  }

  get text(): string {
    return this.buffer.replace(ANSI_ESCAPE, '');
  }

  /**
   * Output split into lines, with terminal escape sequences removed
   */
  get lines(): string[] {
    return this.text.split('\n');
  }
}
