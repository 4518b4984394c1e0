import { isUserFacingOutcome } from '../core/errors';
import { Logger } from '../utils/logger';

/**
 * Print a failure and exit. Expected outcomes (unknown version, unsupported platform, ...) read as plain messages.
 */
export function exitWithError(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);

  if (isUserFacingOutcome(error)) {
    Logger.warning(message);
  } else {
    Logger.error(message);
    if (error instanceof Error && error.stack) {
      Logger.debug(error.stack);
    }
  }

  process.exit(1);
}
