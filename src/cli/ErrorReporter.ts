// ============================================================================
// ErrorReporter — Top-level error handling for CLI commands
// ============================================================================

import { SchedulerError } from "../kernel/Errors";
import { Logger } from "../utils/Logger";

const log = new Logger("cpusched");

/** One-line description for engine errors, the stack for anything else. */
export function describeError(e: unknown): string {
    if (e instanceof SchedulerError) {
        return e.describe();
    }
    if (e instanceof Error) {
        return e.stack ?? e.message;
    }
    return `Non-Error thrown: ${String(e)}`;
}

/** Log `e` and mark the process as failed. */
function report(e: unknown): void {
    log.error(describeError(e));
    process.exitCode = 1;
}

/**
 * Wraps a command action: errors are logged and the process exit code is
 * set to 1 instead of letting them escape as an unhandled exception.
 *
 * Usage:
 *   .action(ErrorReporter.wrapCommand((file, options) => { ... }))
 */
export const ErrorReporter = {
    wrapCommand<A extends unknown[]>(action: (...args: A) => void): (...args: A) => void {
        return (...args: A) => {
            try {
                action(...args);
            } catch (e: unknown) {
                report(e);
            }
        };
    },

    report,
};
