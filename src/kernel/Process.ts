// ============================================================================
// Process — Input facts and per-run state of one simulated process
// ============================================================================

import { ProcessStatus, ProcessStatusType } from "./ProcessStatus";

export type ProcessId = string;

/** Sentinel process id used by idle Gantt segments. */
export const IDLE_ID = "idle";

/** Plain input tuple, as supplied by a workload file or a caller. */
export interface ProcessSpec {
    id: ProcessId;
    arrivalTime: number;
    burstTime: number;
    /** Lower number = higher priority unless a policy is configured otherwise */
    priority: number;
    dependencies?: readonly ProcessId[];
}

/**
 * A process in the registry. The input fields are read-only; the run-state
 * fields below them belong to the Simulator for the duration of one run
 * and are restored by `resetRunState()` before every run.
 */
export class Process {
    readonly id: ProcessId;
    readonly arrivalTime: number;
    readonly burstTime: number;
    readonly priority: number;
    readonly dependencies: ReadonlySet<ProcessId>;

    // -------------------------------------------------------------------------
    // Run-state
    // -------------------------------------------------------------------------

    public remainingTime: number;

    /** First dispatch instant; `null` until dispatched. */
    public startTime: number | null = null;

    /** Completion instant; assigned once per run. */
    public finishTime: number | null = null;

    /** End of the most recent slice this process ran. */
    public lastRanAt: number | null = null;

    /**
     * Instant the process last (re-)entered the ready set: its unblock
     * instant, then the end of each slice that left it unfinished.
     */
    public readySince: number | null = null;

    /** Number of separate dispatches (MLFQ derives the level from it). */
    public dispatchCount = 0;

    public status: ProcessStatusType = ProcessStatus.NEW;

    constructor(spec: ProcessSpec) {
        this.id = spec.id;
        this.arrivalTime = spec.arrivalTime;
        this.burstTime = spec.burstTime;
        this.priority = spec.priority;
        this.dependencies = new Set(spec.dependencies ?? []);
        this.remainingTime = spec.burstTime;
    }

    resetRunState(): void {
        this.remainingTime = this.burstTime;
        this.startTime = null;
        this.finishTime = null;
        this.lastRanAt = null;
        this.readySince = null;
        this.dispatchCount = 0;
        this.status = ProcessStatus.NEW;
    }

    isFinished(): boolean {
        return this.finishTime !== null;
    }

    /** Back to a plain input tuple (dependencies sorted for stable output). */
    toSpec(): ProcessSpec {
        return {
            id: this.id,
            arrivalTime: this.arrivalTime,
            burstTime: this.burstTime,
            priority: this.priority,
            dependencies: Array.from(this.dependencies).sort(),
        };
    }

    toString(): string {
        return `${this.id}(arr=${this.arrivalTime}, burst=${this.burstTime}, prio=${this.priority})`;
    }
}
