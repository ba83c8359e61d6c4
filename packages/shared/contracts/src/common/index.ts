/**
 * Common Contracts
 *
 * Shared types for common patterns across all packages
 */

export * from './result.js';
