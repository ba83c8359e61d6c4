import {
  generateCorrelationId,
  getLogger,
  isErrorCode,
  runWithContext,
  type StructuredLogger,
} from '@playlist-tui/platform-core';
import { PlaylistErrorCode } from '../../application/errors';
import type { PlaylistService } from '../../application/services';
import type { PlaybackStarted, PlaylistResult } from '../../domains/playlists';
import type { Translator } from '../../i18n';
import type { ConsoleRenderer } from './ConsoleRenderer';
import type { LineReader } from './types';

export interface PlaylistShellDependencies {
  service: PlaylistService;
  reader: LineReader;
  renderer: ConsoleRenderer;
  translator: Translator;
  logger?: StructuredLogger;
}

type MenuAction = 'create' | 'addSong' | 'play' | 'list' | 'exit' | 'invalid';

const MENU_CHOICES = new Map<string, MenuAction>([
  ['1', 'create'],
  ['2', 'addSong'],
  ['3', 'play'],
  ['4', 'list'],
  ['0', 'exit'],
]);

/**
 * Interactive read-evaluate-render loop over the playlist service.
 */
export class PlaylistShell {
  private readonly service: PlaylistService;
  private readonly reader: LineReader;
  private readonly renderer: ConsoleRenderer;
  private readonly translator: Translator;
  private readonly logger: StructuredLogger;
  private inputClosed = false;

  constructor(deps: PlaylistShellDependencies) {
    this.service = deps.service;
    this.reader = deps.reader;
    this.renderer = deps.renderer;
    this.translator = deps.translator;
    this.logger = deps.logger ?? getLogger('playlist-shell');
  }

  /**
   * Resolves when the user picks exit or the input closes.
   */
  async run(): Promise<void> {
    for (;;) {
      this.renderer.clear();
      this.renderer.header();
      this.renderer.menu();

      const choice = await this.ask('menu.choose');
      if (this.inputClosed) break;

      const action = MENU_CHOICES.get(choice) ?? 'invalid';
      if (action === 'exit') break;

      await runWithContext({ correlationId: generateCorrelationId(), action }, () => this.dispatch(action));
      if (this.inputClosed) break;
    }

    this.renderer.clear();
    this.renderer.line(this.translator.t('app.goodbye'));
    this.logger.info('Shell stopped', { inputClosed: this.inputClosed });
  }

  private async dispatch(action: Exclude<MenuAction, 'exit'>): Promise<void> {
    this.logger.debug('Menu action selected', { action });
    switch (action) {
      case 'create':
        return this.handleCreate();
      case 'addSong':
        return this.handleAddSong();
      case 'play':
        return this.handlePlay();
      case 'list':
        return this.handleList();
      case 'invalid':
        this.renderer.warning(this.translator.t('warnings.invalidChoice'));
        return this.pause();
    }
  }

  private async handleCreate(): Promise<void> {
    this.openScreen('screens.create');

    const name = await this.ask('prompts.newPlaylistName');
    if (this.inputClosed) return;

    if (!name) {
      this.renderer.warning(this.translator.t('warnings.emptyName'));
    } else {
      this.render(this.service.createPlaylist(name), () =>
        this.translator.t('success.created', { playlistName: name })
      );
    }
    await this.pause();
  }

  private async handleAddSong(): Promise<void> {
    this.openScreen('screens.addSong');
    this.renderer.playlists(this.service.listPlaylists());
    this.renderer.blank();

    const playlistName = await this.ask('prompts.playlistName');
    const songName = await this.ask('prompts.songName');
    if (this.inputClosed) return;

    if (!playlistName || !songName) {
      this.renderer.warning(this.translator.t('warnings.emptyFields'));
    } else {
      this.render(this.service.addSong(playlistName, songName), () =>
        this.translator.t('success.songAdded', { playlistName, songName })
      );
    }
    await this.pause();
  }

  private async handlePlay(): Promise<void> {
    this.openScreen('screens.play');
    this.renderer.playlists(this.service.listPlaylists());
    this.renderer.blank();

    const playlistName = await this.ask('prompts.playlistName');
    const songName = await this.ask('prompts.songName');
    const isOnline = this.isAffirmative(await this.ask('prompts.online'));
    if (this.inputClosed) return;

    if (!playlistName || !songName) {
      this.renderer.warning(this.translator.t('warnings.emptyFields'));
    } else {
      await this.playWithRetry(playlistName, songName, isOnline);
    }
    await this.pause();
  }

  /**
   * One play attempt; on an offline failure, one more attempt with the online
   * flag forced on if the user agrees. Never more than two calls.
   */
  private async playWithRetry(playlistName: string, songName: string, isOnline: boolean): Promise<void> {
    const first = this.service.playSong(playlistName, songName, isOnline);
    this.renderPlayback(first);
    if (first.success || !isErrorCode(first.error, PlaylistErrorCode.OFFLINE)) return;

    const retry = await this.ask('prompts.retry');
    if (this.inputClosed || !this.isAffirmative(retry)) return;

    this.logger.info('Retrying playback online', { playlistName, songName });
    this.renderPlayback(this.service.playSong(playlistName, songName, true));
  }

  private handleList(): Promise<void> {
    this.openScreen('screens.list');
    this.renderer.playlists(this.service.listPlaylists());
    return this.pause();
  }

  private renderPlayback(result: PlaylistResult<PlaybackStarted>): void {
    this.render(result, playback => this.translator.t('success.nowPlaying', { songName: playback.songName }));
  }

  private render<T>(result: PlaylistResult<T>, successMessage: (data: T) => string): void {
    if (result.success) {
      this.renderer.success(successMessage(result.data));
    } else {
      this.renderer.failure(result.error);
    }
  }

  private openScreen(titleKey: string): void {
    this.renderer.clear();
    this.renderer.header();
    this.renderer.section(titleKey);
  }

  private async pause(): Promise<void> {
    this.renderer.blank();
    await this.ask('prompts.pause');
  }

  private isAffirmative(answer: string): boolean {
    return answer.toLowerCase() === this.translator.affirmative;
  }

  /**
   * Prompts with the translated label and returns the trimmed answer; empty
   * once the input has closed.
   */
  private async ask(labelKey: string): Promise<string> {
    if (this.inputClosed) return '';
    const line = await this.reader.readLine(`  ${this.translator.t(labelKey)} `);
    if (line === null) {
      this.inputClosed = true;
      return '';
    }
    return line.trim();
  }
}
