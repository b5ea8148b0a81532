#!/usr/bin/env node
import logger from './server/logger.js';
import { validateStartupEnvironment } from './server/config.js';
import { EXIT_FAILURE, runCli } from './server/cli.js';

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled promise rejection:', reason);
  process.exitCode = EXIT_FAILURE;
});

(async function main() {
  try {
    validateStartupEnvironment();
  } catch (err: unknown) {
    logger.fatal({ err }, 'Startup environment validation failed');
    process.exitCode = EXIT_FAILURE;
    return;
  }
  process.exitCode = await runCli(process.argv.slice(2));
})();
