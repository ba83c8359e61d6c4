/**
 * Configuration Builder Utilities
 *
 * Fluent API for building configuration objects
 */

import { getConfig, type EnvSource } from './environment-config.js';

/**
 * Environment-aware configuration builder
 */
export class ConfigBuilder<T extends Record<string, unknown>> {
  private config: Record<string, unknown> = {};

  constructor(private readonly source: EnvSource = process.env) {}

  add<K extends keyof T & string>(key: K, defaultValue: T[K], envKey?: string): this {
    const envKeyToUse = envKey || key.toUpperCase();
    this.config[key] = getConfig(envKeyToUse, defaultValue, undefined, this.source);
    return this;
  }

  /**
   * The raw values, before any schema has looked at them
   */
  build(): Readonly<Record<string, unknown>> {
    return { ...this.config };
  }
}

/**
 * Create a configuration builder instance
 */
export function createConfig<T extends Record<string, unknown>>(source?: EnvSource): ConfigBuilder<T> {
  return new ConfigBuilder<T>(source);
}
