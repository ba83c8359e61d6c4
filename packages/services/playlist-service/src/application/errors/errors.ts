import { DomainErrorCode, createDomainServiceError } from '@playlist-tui/platform-core';

const PlaylistDomainCodes = {
  PLAYLIST_ALREADY_EXISTS: 'PLAYLIST_ALREADY_EXISTS',
  PLAYLIST_NOT_FOUND: 'PLAYLIST_NOT_FOUND',
  SONG_ALREADY_IN_PLAYLIST: 'SONG_ALREADY_IN_PLAYLIST',
  SONG_NOT_FOUND: 'SONG_NOT_FOUND',
  EMPTY_PLAYLIST: 'EMPTY_PLAYLIST',
  OFFLINE: 'OFFLINE',
  // Reserved for a user/account feature; nothing produces it yet.
  INVALID_USER: 'INVALID_USER',
} as const;

export const PlaylistErrorCode = { ...DomainErrorCode, ...PlaylistDomainCodes } as const;

const PlaylistErrorBase = createDomainServiceError('Playlist', PlaylistErrorCode);

export class PlaylistError extends PlaylistErrorBase {
  static playlistAlreadyExists(playlistName: string) {
    return new PlaylistError(
      `Playlist '${playlistName}' already exists.`,
      PlaylistErrorCode.PLAYLIST_ALREADY_EXISTS,
      { playlistName }
    );
  }

  static playlistNotFound(playlistName: string) {
    return new PlaylistError(`Playlist '${playlistName}' was not found.`, PlaylistErrorCode.PLAYLIST_NOT_FOUND, {
      playlistName,
    });
  }

  static songAlreadyInPlaylist(songName: string) {
    return new PlaylistError(
      `Song '${songName}' is already in the playlist.`,
      PlaylistErrorCode.SONG_ALREADY_IN_PLAYLIST,
      { songName }
    );
  }

  static songNotFound(songName: string) {
    return new PlaylistError(`Song '${songName}' does not exist.`, PlaylistErrorCode.SONG_NOT_FOUND, { songName });
  }

  static emptyPlaylist(playlistName: string) {
    return new PlaylistError(`Playlist '${playlistName}' is empty.`, PlaylistErrorCode.EMPTY_PLAYLIST, {
      playlistName,
    });
  }

  static offline() {
    return new PlaylistError('No internet connection - try again.', PlaylistErrorCode.OFFLINE);
  }
}
