import { InvalidMessageError, QueryTimeoutError, StoreUnavailableError } from "@/lib/errors";
import { formatAnyError } from "@/lib/error-formatter";
import { logger } from "./logger";

/**
 * sysexits-style codes so scripts can tell bad input from a broken data directory
 */
export function exitCodeFor(error: unknown): number {
    if (error instanceof InvalidMessageError) return 65;
    if (error instanceof StoreUnavailableError) return 74;
    if (error instanceof QueryTimeoutError) return 75;
    return 1;
}

/**
 * Log a CLI failure and exit
 * @param context - Prefix naming the command step that failed
 */
export function handleCliError(error: unknown, context?: string, exitCode = exitCodeFor(error)): never {
    const errorMessage = formatAnyError(error);

    logger.error(context ? `${context}: ${errorMessage}` : errorMessage);

    if (error instanceof Error && error.stack && process.env.DEBUG) {
        logger.debug(error.stack);
    }
    if (error instanceof Error && error.cause !== undefined) {
        logger.debug(`Caused by: ${formatAnyError(error.cause)}`);
    }

    process.exit(exitCode);
}
