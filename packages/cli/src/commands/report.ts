import { errorMessage, InkpressError, Logger } from "@inkpress/core";

/**
 * Prints a fatal error and returns the exit code for it.
 */
export function reportFailure(logger: Logger, e: unknown): number {
    if (e instanceof InkpressError) {
        logger.error(e.message);
    } else {
        logger.error(`Error: ${errorMessage(e)}`);
    }
    return 1;
}
