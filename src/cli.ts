#!/usr/bin/env node
/**
 * macro-tui executable.
 *
 * Loads config, then hands stdin/stdout to the app. Termination signals
 * abort the loop so the terminal is restored before the process exits.
 */

import { runApp } from './app.js';
import { CatalogReadError } from './catalog/loader.js';
import { loadConfig } from './config/loader.js';
import { createLogger } from './shared/logger.js';
import { createFdOutput } from './terminal/output.js';

const SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;

async function main(): Promise<number> {
  const config = loadConfig();
  const logger = createLogger(config.logging);

  const abort = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info('signal received', { signal });
    abort.abort();
  };
  for (const signal of SIGNALS) process.once(signal, onSignal);

  try {
    await runApp({
      config,
      logger,
      input: process.stdin,
      screen: process.stdout,
      output: createFdOutput(process.stdout.fd),
      signal: abort.signal,
    });
    return 0;
  } catch (err: unknown) {
    if (err instanceof CatalogReadError) {
      logger.error('catalog unreadable', { path: err.path });
      console.error(err.message);
      return 1;
    }
    throw err;
  } finally {
    for (const signal of SIGNALS) process.off(signal, onSignal);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  }
);
