export { PlaylistError, PlaylistErrorCode } from './errors';
