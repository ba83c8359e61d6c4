import { z } from 'zod';
import { ConfigurationError, createConfig, type EnvSource } from '@playlist-tui/platform-core';
import { DEFAULT_LANGUAGE, SUPPORTED_LANGUAGE_CODES } from '../i18n/types';

export const SERVICE_NAME = 'playlist-service';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export const ServiceConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']),
  logLevel: z.enum(LOG_LEVELS),
  logFile: z.string().min(1).optional(),
  locale: z.enum(SUPPORTED_LANGUAGE_CODES),
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

/**
 * Reads NODE_ENV, LOG_LEVEL, LOG_FILE and PLAYLIST_LOCALE.
 * Throws ConfigurationError naming every invalid field.
 */
export function loadServiceConfig(source: EnvSource = process.env): ServiceConfig {
  const raw = createConfig<{ nodeEnv: string; logLevel: string; logFile: string | undefined; locale: string }>(source)
    .add('nodeEnv', 'development', 'NODE_ENV')
    .add('logLevel', 'warn', 'LOG_LEVEL')
    .add('logFile', undefined, 'LOG_FILE')
    .add('locale', DEFAULT_LANGUAGE, 'PLAYLIST_LOCALE')
    .build();

  const parsed = ServiceConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.'));
    throw new ConfigurationError(fields.join(', '), {
      issues: parsed.error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message })),
    });
  }
  return parsed.data;
}
