export interface PlaylistSnapshot {
  readonly name: string;
  readonly songs: readonly string[];
}

export interface PlaybackStarted {
  readonly playlistName: string;
  readonly songName: string;
}
