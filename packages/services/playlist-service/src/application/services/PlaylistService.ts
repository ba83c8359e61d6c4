import { getLogger, type StructuredLogger } from '@playlist-tui/platform-core';
import type { PlaybackStarted, PlaylistCollection, PlaylistResult, PlaylistSnapshot } from '../../domains/playlists';

/**
 * Entry point the shell talks to. Delegates every call to the collection it
 * was given and logs the outcome; results pass through unchanged.
 */
export class PlaylistService {
  constructor(
    private readonly collection: PlaylistCollection,
    private readonly logger: StructuredLogger = getLogger('playlist-service')
  ) {}

  createPlaylist(name: string): PlaylistResult<void> {
    this.logger.debug('Creating playlist', { playlistName: name });
    return this.logOutcome('createPlaylist', this.collection.create(name), { playlistName: name });
  }

  addSong(playlistName: string, songName: string): PlaylistResult<void> {
    this.logger.debug('Adding song to playlist', { playlistName, songName });
    return this.logOutcome('addSong', this.collection.addSong(playlistName, songName), { playlistName, songName });
  }

  playSong(playlistName: string, songName: string, isOnline: boolean): PlaylistResult<PlaybackStarted> {
    this.logger.debug('Playing song', { playlistName, songName, isOnline });
    return this.logOutcome('playSong', this.collection.play(playlistName, songName, isOnline), {
      playlistName,
      songName,
      isOnline,
    });
  }

  listPlaylists(): PlaylistSnapshot[] {
    const playlists = this.collection.list();
    this.logger.debug('Listing playlists', { count: playlists.length });
    return playlists;
  }

  private logOutcome<T>(
    operation: string,
    result: PlaylistResult<T>,
    context: Record<string, unknown>
  ): PlaylistResult<T> {
    if (result.success) {
      this.logger.info(`${operation} succeeded`, context);
    } else {
      this.logger.warn(`${operation} rejected`, { ...context, code: result.error.code });
    }
    return result;
  }
}
