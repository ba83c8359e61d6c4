/**
 * Environment Configuration Utilities
 *
 * Environment variable lookup. Validation is left to each service's schema.
 */

export type EnvSource = Record<string, string | undefined>;

/**
 * Read one variable. Booleans and numbers are parsed from the default's type
 * unless a parser is given; a parser that throws yields the default.
 */
export function getConfig<T>(
  key: string,
  defaultValue: T,
  parser?: (value: string) => T,
  source: EnvSource = process.env
): T {
  const value = source[key];

  if (value === undefined || value === '') {
    return defaultValue;
  }

  if (parser) {
    try {
      return parser(value);
    } catch {
      return defaultValue;
    }
  }

  if (typeof defaultValue === 'boolean') {
    return (value.toLowerCase() === 'true') as unknown as T;
  }

  if (typeof defaultValue === 'number') {
    const parsed = parseInt(value, 10);
    return (isNaN(parsed) ? defaultValue : parsed) as unknown as T;
  }

  return value as unknown as T;
}
