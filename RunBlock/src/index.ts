#!/usr/bin/env node

/**
 * runblock CLI entry point.
 */

import { loadEnvFile } from '@margin/shared/Utils/env.js';
import { Logger } from '@margin/shared/Utils/logger.js';

// .env first: loggers and config read the environment when their modules load
loadEnvFile(import.meta.url, 1);

const { runCli } = await import('./cli.js');
const logger = new Logger('runblock');

async function main(): Promise<void> {
  const controller = new AbortController();
  const shutdown = (): void => controller.abort();
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    process.exitCode = await runCli(process.argv.slice(2), {
      stdout: (text) => process.stdout.write(text),
      stderr: (text) => process.stderr.write(text),
      signal: controller.signal,
    });
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
