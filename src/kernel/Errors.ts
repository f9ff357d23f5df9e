// ============================================================================
// Errors — Engine error taxonomy
// ============================================================================

import type { ProcessId } from "./Process";

/** Where in the input or the run an error was detected. */
export interface ErrorContext {
    processId?: ProcessId;
    /** Simulated time of the decision that failed */
    time?: number;
    [key: string]: unknown;
}

/**
 * Base class for every error the engine raises. Callers can branch on
 * `instanceof SchedulerError` to separate engine failures from bugs.
 */
export class SchedulerError extends Error {
    readonly context: ErrorContext;

    constructor(message: string, context: ErrorContext = {}) {
        super(message);
        this.name = new.target.name;
        this.context = context;
    }

    /** Message followed by the non-empty context fields, for log output. */
    describe(): string {
        const parts = Object.entries(this.context)
            .filter(([, value]) => value !== undefined)
            .map(([key, value]) => `${key}=${Array.isArray(value) ? value.join("|") : String(value)}`);
        return parts.length > 0
            ? `${this.name}: ${this.message} (${parts.join(", ")})`
            : `${this.name}: ${this.message}`;
    }
}

/** Malformed process fields. Raised at registration; never enters a run. */
export class InvalidInputError extends SchedulerError {}

/** Registration of an id that is already present. The registry is unchanged. */
export class DuplicateIdError extends SchedulerError {}

/** Bad policy parameters, unknown or cyclic dependencies, bad workload files. */
export class ConfigurationError extends SchedulerError {}

/** Unfinished processes remain but none can ever become ready. */
export class DeadlockError extends SchedulerError {}

/** An operation that needs at least one process got none. */
export class EmptyInputError extends SchedulerError {}

/** Metrics requested before every process has a finish time. */
export class SimulationIncompleteError extends SchedulerError {}
