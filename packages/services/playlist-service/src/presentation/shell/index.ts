export { PlaylistShell, type PlaylistShellDependencies } from './PlaylistShell';
export { ConsoleRenderer } from './ConsoleRenderer';
export { ReadlineLineReader } from './ReadlineLineReader';
export type { LineReader, OutputSink } from './types';
