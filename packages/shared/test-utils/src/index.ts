export { createMockLogger, type MockLogger } from './logger-mock.js';
export { ScriptedLineReader, MemoryOutput } from './console-fakes.js';
