// ============================================================================
// Policy — The single capability every scheduling algorithm implements
// ============================================================================

import { Process } from "../kernel/Process";
import { ProcessRegistry } from "../kernel/ProcessRegistry";
import { PolicyKindType } from "../config/PolicyConfig";

/** Everything a policy may look at when choosing the next dispatch. */
export interface DecisionContext {
    /** Current simulated time */
    time: number;
    /** Non-empty, sorted by ascending id */
    ready: readonly Process[];
    /** Read-only view of the run-state; policies never mutate it */
    registry: ProcessRegistry;
    /** Process that held the CPU in the immediately preceding segment, if unfinished */
    running: Process | null;
    /** Earliest arrival after `time` among unfinished processes */
    nextArrival: number | null;
}

/** Run `process` for `duration` time units (0 < duration <= remainingTime). */
export interface Decision {
    process: Process;
    duration: number;
}

export interface SchedulingPolicy {
    readonly kind: PolicyKindType;
    /** Display name including parameters, e.g. "Round Robin (q=2)" */
    readonly label: string;
    /**
     * True when consecutive decisions for the same process are one piece of
     * work (the Simulator merges them into a single Gantt segment). Slice
     * based policies keep one segment per slice.
     */
    readonly continuous: boolean;

    decide(context: DecisionContext): Decision;
}

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

/** Lowest element by `compare`; `items` must be non-empty. */
export function pickBest<T>(items: readonly T[], compare: (a: T, b: T) => number): T {
    let best = items[0];
    for (let i = 1; i < items.length; i++) {
        if (compare(items[i], best) < 0) {
            best = items[i];
        }
    }
    return best;
}

/** Run to completion. */
export function toCompletion(process: Process): Decision {
    return { process, duration: process.remainingTime };
}

/** Run until completion or the next arrival, whichever comes first. */
export function untilNextArrival(process: Process, context: DecisionContext): Decision {
    const { nextArrival, time } = context;
    const duration = nextArrival === null
        ? process.remainingTime
        : Math.min(process.remainingTime, nextArrival - time);
    return { process, duration };
}

/**
 * Instant a ready process joined the tail of the ready queue. `readySince`
 * is set by the Simulator for every ready process before `decide()`.
 */
export function enqueuedAt(process: Process): number {
    return process.readySince ?? process.arrivalTime;
}
