export * from './entities';
export type { PlaybackStarted, PlaylistSnapshot } from './types';
