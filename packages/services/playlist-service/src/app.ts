/**
 * Playlist TUI composition: validates configuration, wires the shell and
 * runs it against the given input and output.
 */

import {
  configureLogging,
  getLogger,
  serializeError,
  wrapError,
  type EnvSource,
} from '@playlist-tui/platform-core';
import { PlaylistService } from './application/services';
import { loadServiceConfig, SERVICE_NAME, type ServiceConfig } from './config/service-config';
import { PlaylistCollection } from './domains/playlists';
import { createTranslator } from './i18n';
import { ConsoleRenderer, PlaylistShell, type LineReader, type OutputSink } from './presentation/shell';

export interface PlaylistAppOptions {
  env: EnvSource;
  reader: LineReader;
  output: OutputSink;
  errorOutput: OutputSink;
}

/**
 * Resolves with the process exit code: 1 for invalid configuration, 0 once
 * the shell stops. Errors raised during the session are not caught here.
 */
export async function runPlaylistApp({ env, reader, output, errorOutput }: PlaylistAppOptions): Promise<number> {
  const logger = getLogger(SERVICE_NAME);

  let serviceConfig: ServiceConfig;
  try {
    serviceConfig = loadServiceConfig(env);
  } catch (error) {
    const failure = wrapError(error);
    logger.error('Playlist TUI failed to start', { error: serializeError(failure) });
    errorOutput.write(`${failure.message}\n`);
    return 1;
  }

  configureLogging({ level: serviceConfig.logLevel, logFile: serviceConfig.logFile });
  logger.info('Starting playlist TUI', { locale: serviceConfig.locale, env: serviceConfig.nodeEnv });

  const translator = await createTranslator(serviceConfig.locale);
  const shell = new PlaylistShell({
    service: new PlaylistService(new PlaylistCollection()),
    reader,
    renderer: new ConsoleRenderer(output, translator),
    translator,
  });

  await shell.run();
  return 0;
}
