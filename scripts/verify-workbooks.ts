#!/usr/bin/env node
import 'dotenv/config';

process.env.LOG_STREAM ??= 'stderr';
process.env.LOG_LEVEL ??= 'warn';

// Loaded after the environment is set so the logger picks it up
const { createProgram } = await import('../src/cli/verify-command.js');
const { logger } = await import('../src/infrastructure/logger.js');

await createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error({ err: error instanceof Error ? error.message : String(error) }, 'Unhandled error');
    process.exit(1);
  });
