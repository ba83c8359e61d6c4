/**
 * Shared contracts for the playlist TUI packages
 */

export * from './common/index.js';
