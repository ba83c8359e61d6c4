/**
 * Source of user input, one line at a time. Resolves null once the input is
 * closed (end of stream, Ctrl-C).
 */
export interface LineReader {
  readLine(prompt: string): Promise<string | null>;
  close(): void;
}

export interface OutputSink {
  write(text: string): void;
}
