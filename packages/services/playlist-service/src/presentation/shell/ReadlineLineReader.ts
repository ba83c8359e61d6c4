import * as readline from 'readline';
import type { LineReader } from './types';

/**
 * LineReader over a readline interface. Lines that arrive while no prompt is
 * waiting are queued, so piped input is not lost.
 */
export class ReadlineLineReader implements LineReader {
  private readonly rl: readline.Interface;
  private readonly queued: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output });

    this.rl.on('line', line => {
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(line);
      } else {
        this.queued.push(line);
      }
    });

    this.rl.on('SIGINT', () => this.close());

    this.rl.on('close', () => {
      this.closed = true;
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(null);
      }
    });
  }

  readLine(prompt: string): Promise<string | null> {
    const next = this.queued.shift();
    if (next !== undefined) {
      this.writePrompt(prompt);
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    this.writePrompt(prompt);
    return new Promise(resolve => {
      this.waiting = resolve;
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private writePrompt(prompt: string): void {
    // Input may have ended with lines still queued; readline rejects use after close.
    if (this.closed) {
      this.output.write(prompt);
      return;
    }
    this.rl.setPrompt(prompt);
    this.rl.prompt();
  }
}
