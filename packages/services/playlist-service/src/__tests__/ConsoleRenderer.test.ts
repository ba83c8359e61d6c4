import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryOutput } from '@playlist-tui/test-utils';
import { ConsoleRenderer } from '../presentation/shell';
import { createTranslator, type Translator } from '../i18n';
import { PlaylistError, PlaylistErrorCode } from '../application/errors';

describe('ConsoleRenderer', () => {
  let out: MemoryOutput;
  let renderer: ConsoleRenderer;

  beforeEach(async () => {
    out = new MemoryOutput();
    renderer = new ConsoleRenderer(out, await createTranslator('en-US'));
  });

  it('should draw the title inside a box', () => {
    renderer.header();

    expect(out.lines).toEqual([
      `╔${'═'.repeat(38)}╗`,
      '║     🎵  Playlist Manager TUI  🎵     ║',
      `╚${'═'.repeat(38)}╝`,
      '',
      '',
    ]);
  });

  it('should list menu choices in order with exit last', () => {
    renderer.menu();

    expect(out.lines[1]).toBe('│  [1]  Create playlist                │');
    expect(out.lines.slice(1, 6).map(line => line.slice(3, 6))).toEqual(['[1]', '[2]', '[3]', '[4]', '[0]']);
    expect(out.lines[5]).toBe('│  [0]  Exit                           │');
    expect(out.lines[6]).toBe(`└${'─'.repeat(38)}┘`);
  });

  it('should align box edges by terminal columns rather than string length', () => {
    const labels: Record<string, string> = { 'app.title': 'Musik 音楽', 'menu.play': 'Play 🎵' };
    const translator: Translator = { t: key => labels[key] ?? key, exists: () => false, affirmative: 'y' };
    const wide = new ConsoleRenderer(out, translator);

    wide.header();
    wide.menu();

    expect(out.lines[1]).toBe(`║${' '.repeat(14)}Musik 音楽${' '.repeat(14)}║`);
    expect(out.lines[7]).toBe(`│  [3]  Play 🎵${' '.repeat(24)}│`);
  });

  it('should clear the screen with an escape sequence', () => {
    renderer.clear();

    expect(out.clears).toBe(1);
    expect(out.text).toBe('');
  });

  it('should prefix notices with their glyph', () => {
    renderer.success('Done');
    renderer.warning('Careful');
    renderer.failure(PlaylistError.offline());

    expect(out.lines).toEqual([
      '',
      '  ✅  Done',
      '',
      '  ⚠️   Careful',
      '',
      '  ❌  No internet connection - try again.',
      '',
    ]);
  });

  it('should render playlists with numbered songs', () => {
    renderer.playlists([
      { name: 'Road Trip', songs: ['Sunny Day', 'Night Drive'] },
      { name: 'Workout', songs: [] },
    ]);

    expect(out.lines).toEqual([
      '',
      '  📁  Road Trip',
      '       1. Sunny Day',
      '       2. Night Drive',
      '  📁  Workout',
      '       (no songs)',
      '',
    ]);
  });

  it('should show a placeholder when there are no playlists', () => {
    renderer.playlists([]);

    expect(out.lines).toEqual(['', '  (no playlists yet)', '']);
  });

  it('should describe failures from the locale using their details', () => {
    expect(renderer.describe(PlaylistError.songNotFound('Coastline'))).toBe("Song 'Coastline' does not exist.");
  });

  it('should fall back to the error message for codes without a translation', () => {
    const error = new PlaylistError('Disk on fire', PlaylistErrorCode.INTERNAL_ERROR);

    expect(renderer.describe(error)).toBe('Disk on fire');
  });

  it('should use the active locale for failures', async () => {
    const danish = new ConsoleRenderer(out, await createTranslator('da-DK'));

    expect(danish.describe(PlaylistError.emptyPlaylist('Road Trip'))).toBe("Playlist 'Road Trip' er tom.");
  });
});
