import { CommanderError } from 'commander';
import { AppError, RemoteServiceError, toError } from '../utils/errors';
import { logger } from '../utils/logger';

export const USAGE_EXIT_CODE = 2;

// Commander signals help and version output through errors once exitOverride() is set.
const INFORMATIONAL_CODES = new Set(['commander.helpDisplayed', 'commander.help', 'commander.version']);

/** Reports a failed command and returns the process exit code. */
export function handleCommandError(error: unknown, writeErr: (text: string) => void): number {
  if (error instanceof CommanderError) {
    // Commander has already printed its own message.
    return INFORMATIONAL_CODES.has(error.code) ? 0 : USAGE_EXIT_CODE;
  }

  if (error instanceof RemoteServiceError) {
    logger.error('Calendar service call failed', {
      service: error.service,
      operation: error.operation,
      error: error.originalError.message,
    });
    writeErr(`Error: ${error.message}\n`);
    return error.exitCode;
  }

  if (error instanceof AppError) {
    logger.debug('Command rejected', { code: error.code, error: error.message });
    writeErr(`Error: ${error.message}\n`);
    return error.exitCode;
  }

  const err = toError(error);
  logger.error('Unhandled error', { error: err.message, stack: err.stack });
  writeErr(`Error: ${err.message}\n`);
  return 1;
}
