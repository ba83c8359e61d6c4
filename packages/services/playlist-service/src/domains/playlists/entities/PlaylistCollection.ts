/**
 * PlaylistCollection - the in-memory mapping from playlist name to its songs.
 *
 * Names and songs compare by exact string equality. Playlists and songs are
 * only ever added; every operation either applies fully or leaves the
 * collection untouched and returns a failure.
 */

import { Result } from '@playlist-tui/shared-contracts';
import { PlaylistError } from '../../../application/errors';
import type { PlaybackStarted, PlaylistSnapshot } from '../types';

export type PlaylistResult<T> = Result<T, PlaylistError>;

export class PlaylistCollection {
  private readonly playlists = new Map<string, string[]>();

  /**
   * Emptiness of `name` is the caller's concern.
   */
  create(name: string): PlaylistResult<void> {
    if (this.playlists.has(name)) {
      return Result.fail(PlaylistError.playlistAlreadyExists(name));
    }
    this.playlists.set(name, []);
    return Result.ok(undefined);
  }

  addSong(playlistName: string, songName: string): PlaylistResult<void> {
    const songs = this.playlists.get(playlistName);
    if (!songs) {
      return Result.fail(PlaylistError.playlistNotFound(playlistName));
    }
    if (songs.includes(songName)) {
      return Result.fail(PlaylistError.songAlreadyInPlaylist(songName));
    }
    songs.push(songName);
    return Result.ok(undefined);
  }

  /**
   * Identity checks run before the connectivity check, so an `OFFLINE`
   * failure means the playlist and song are known to be valid.
   */
  play(playlistName: string, songName: string, isOnline: boolean): PlaylistResult<PlaybackStarted> {
    const songs = this.playlists.get(playlistName);
    if (!songs) {
      return Result.fail(PlaylistError.playlistNotFound(playlistName));
    }
    if (songs.length === 0) {
      return Result.fail(PlaylistError.emptyPlaylist(playlistName));
    }
    if (!songs.includes(songName)) {
      return Result.fail(PlaylistError.songNotFound(songName));
    }
    if (!isOnline) {
      return Result.fail(PlaylistError.offline());
    }
    return Result.ok({ playlistName, songName });
  }

  list(): PlaylistSnapshot[] {
    return Array.from(this.playlists, ([name, songs]) => ({ name, songs: [...songs] }));
  }
}
