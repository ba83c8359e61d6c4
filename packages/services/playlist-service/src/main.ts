/**
 * Playlist TUI - interactive terminal entry point
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import {
  getLogger,
  registerGlobalErrorHandlers,
  registerShutdownHook,
  serializeError,
  wrapError,
} from '@playlist-tui/platform-core';
import { runPlaylistApp } from './app';
import { SERVICE_NAME } from './config/service-config';
import { ReadlineLineReader } from './presentation/shell';

async function main(): Promise<void> {
  // Never override variables already set in the environment
  config({ path: resolve(process.cwd(), '.env'), override: false });
  registerGlobalErrorHandlers(SERVICE_NAME);

  const reader = new ReadlineLineReader(process.stdin, process.stdout);
  registerShutdownHook(async () => reader.close());

  try {
    process.exitCode = await runPlaylistApp({
      env: process.env,
      reader,
      output: process.stdout,
      errorOutput: process.stderr,
    });
  } finally {
    reader.close();
  }
}

main().catch((error: unknown) => {
  const failure = wrapError(error);
  getLogger(SERVICE_NAME).error('Playlist TUI stopped on an unexpected error', { error: serializeError(failure) });
  process.stderr.write(`${failure.message}\n`);
  process.exit(1);
});
