export { PlaylistService } from './PlaylistService';
