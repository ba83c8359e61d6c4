import { describe, it, expect } from 'vitest';
import { MemoryOutput, ScriptedLineReader } from '@playlist-tui/test-utils';
import { runPlaylistApp } from '../app';
import type { LineReader } from '../presentation/shell';

describe('runPlaylistApp', () => {
  it('should exit with 0 after the user leaves the menu', async () => {
    const output = new MemoryOutput();
    const errorOutput = new MemoryOutput();

    const exitCode = await runPlaylistApp({
      env: { LOG_LEVEL: 'error' },
      reader: new ScriptedLineReader(['1', 'Road Trip', '', '0']),
      output,
      errorOutput,
    });

    expect(exitCode).toBe(0);
    expect(output.lines).toContain("  ✅  Playlist 'Road Trip' created!");
    expect(output.lines.slice(-2)).toEqual(['  Goodbye! 👋', '']);
    expect(errorOutput.text).toBe('');
  });

  it('should use the configured locale', async () => {
    const output = new MemoryOutput();

    await runPlaylistApp({
      env: { LOG_LEVEL: 'error', PLAYLIST_LOCALE: 'da-DK' },
      reader: new ScriptedLineReader(['0']),
      output,
      errorOutput: new MemoryOutput(),
    });

    expect(output.lines.slice(-2)).toEqual(['  Farvel! 👋', '']);
  });

  it('should exit with 1 and start no session for invalid configuration', async () => {
    const reader = new ScriptedLineReader(['0']);
    const output = new MemoryOutput();
    const errorOutput = new MemoryOutput();

    const exitCode = await runPlaylistApp({ env: { PLAYLIST_LOCALE: 'fr-FR' }, reader, output, errorOutput });

    expect(exitCode).toBe(1);
    expect(errorOutput.text).toBe('Invalid configuration: locale\n');
    expect(reader.prompts).toEqual([]);
    expect(output.text).toBe('');
  });

  it('should let errors raised during the session propagate', async () => {
    const errorOutput = new MemoryOutput();
    const brokenReader: LineReader = {
      readLine: async () => {
        throw new Error('terminal lost');
      },
      close: () => undefined,
    };

    await expect(
      runPlaylistApp({ env: { LOG_LEVEL: 'error' }, reader: brokenReader, output: new MemoryOutput(), errorOutput })
    ).rejects.toThrow('terminal lost');
    expect(errorOutput.text).toBe('');
  });
});
