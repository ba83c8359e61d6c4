/**
 * Configuration Module - Index
 *
 * Exports all configuration functionality for platform-core
 */

export * from './environment-config.js';
export * from './config-builder.js';
