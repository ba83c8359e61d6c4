import stringWidth from 'string-width';
import type { PlaylistError } from '../../application/errors';
import type { PlaylistSnapshot } from '../../domains/playlists';
import type { TranslationValues, Translator } from '../../i18n';
import type { OutputSink } from './types';

const BOX_WIDTH = 38;
const CLEAR_SCREEN = '\x1B[2J\x1B[H';

const MENU_ENTRIES = [
  ['1', 'menu.create'],
  ['2', 'menu.addSong'],
  ['3', 'menu.play'],
  ['4', 'menu.list'],
  ['0', 'menu.exit'],
] as const;

// Widths are terminal columns: emoji and CJK take two, combining marks none.
function center(text: string, width: number): string {
  const free = Math.max(0, width - stringWidth(text));
  const left = Math.floor(free / 2);
  return ' '.repeat(left) + text + ' '.repeat(free - left);
}

function padEnd(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - stringWidth(text)));
}

function toTranslationValues(details: Record<string, unknown> | undefined): TranslationValues {
  const values: TranslationValues = {};
  for (const [key, value] of Object.entries(details ?? {})) {
    if (typeof value === 'string' || typeof value === 'number') {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Writes every screen element of the TUI. Knows nothing about flow; the
 * shell decides what to draw and when.
 */
export class ConsoleRenderer {
  constructor(
    private readonly out: OutputSink,
    private readonly translator: Translator
  ) {}

  clear(): void {
    this.out.write(CLEAR_SCREEN);
  }

  header(): void {
    const rule = '═'.repeat(BOX_WIDTH);
    this.writeLines([`╔${rule}╗`, `║${center(this.translator.t('app.title'), BOX_WIDTH)}║`, `╚${rule}╝`, '']);
  }

  menu(): void {
    const rule = '─'.repeat(BOX_WIDTH);
    const entries = MENU_ENTRIES.map(([choice, key]) => {
      const label = `  [${choice}]  ${this.translator.t(key)}`;
      return `│${padEnd(label, BOX_WIDTH)}│`;
    });
    this.writeLines([`┌${rule}┐`, ...entries, `└${rule}┘`]);
  }

  section(titleKey: string): void {
    this.writeLines([`  ── ${this.translator.t(titleKey)} ──`, '']);
  }

  success(message: string): void {
    this.writeLines(['', `  ✅  ${message}`]);
  }

  failure(error: PlaylistError): void {
    this.writeLines(['', `  ❌  ${this.describe(error)}`]);
  }

  warning(message: string): void {
    this.writeLines(['', `  ⚠️   ${message}`]);
  }

  blank(): void {
    this.writeLines(['']);
  }

  line(text: string): void {
    this.writeLines([`  ${text}`]);
  }

  /**
   * Each playlist name, then its songs numbered from 1
   */
  playlists(playlists: readonly PlaylistSnapshot[]): void {
    const lines = [''];
    if (playlists.length === 0) {
      lines.push(`  ${this.translator.t('list.noPlaylists')}`);
    }
    for (const playlist of playlists) {
      lines.push(`  📁  ${playlist.name}`);
      if (playlist.songs.length === 0) {
        lines.push(`       ${this.translator.t('list.noSongs')}`);
      }
      playlist.songs.forEach((song, index) => lines.push(`       ${index + 1}. ${song}`));
    }
    this.writeLines(lines);
  }

  /**
   * Localised display text for a failure, falling back to the error's own message
   */
  describe(error: PlaylistError): string {
    const key = `errors.${error.code}`;
    if (!this.translator.exists(key)) {
      return error.message;
    }
    return this.translator.t(key, toTranslationValues(error.details));
  }

  private writeLines(lines: string[]): void {
    this.out.write(lines.map(line => `${line}\n`).join(''));
  }
}
