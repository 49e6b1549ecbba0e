#!/usr/bin/env node
import { main } from './cli.js';
import { isAppError } from './domain/errors.js';
import { logger } from './infra/logger.js';

try {
  process.exitCode = await main();
} catch (error) {
  if (isAppError(error)) {
    logger.error(`Error: ${error.message}`, { code: error.code });
  } else {
    logger.error('Unexpected failure', {
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  }
  process.exitCode = 1;
}
