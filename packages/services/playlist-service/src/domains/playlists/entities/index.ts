export { PlaylistCollection, type PlaylistResult } from './PlaylistCollection';
