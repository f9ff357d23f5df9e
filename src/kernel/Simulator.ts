// ============================================================================
// Simulator — Discrete-event loop driving one policy over one registry
// ============================================================================

import { IDLE_ID, Process } from "./Process";
import { ProcessRegistry } from "./ProcessRegistry";
import { PROCESS_STATUS_NAMES, ProcessStatus, ProcessStatusType } from "./ProcessStatus";
import { SimulationState, SimulationStateType } from "./SimulationState";
import { GanttSegment, ReadySnapshot } from "./Timeline";
import { DeadlockError, EmptyInputError, SchedulerError } from "./Errors";
import { unblockedAt, validateDependencies } from "./Readiness";
import { ReadinessTracker } from "./ReadinessTracker";
import { SchedulingPolicy } from "../policies/Policy";
import { MetricsRecord, computeMetrics } from "../metrics/Metrics";
import { LogLevel, Logger } from "../utils/Logger";

const log = new Logger("Simulator");

/** Progress is logged every this many steps at DEBUG. */
const PROGRESS_INTERVAL = 100;

export interface SimulationResult {
    policy: string;
    segments: GanttSegment[];
    metrics: MetricsRecord;
    readyHistory: ReadySnapshot[];
}

export type SimulationOutcome =
    | { status: typeof SimulationState.FINISHED; result: SimulationResult }
    | { status: typeof SimulationState.ABORTED; time: number; segments: GanttSegment[] };

/**
 * Owns the run-state of `registry` for the duration of one run.
 *
 * State machine:
 *   NOT_STARTED → RUNNING ↔ IDLE → FINISHED
 *   (any state before FINISHED) → ABORTED via run(signal)
 *
 * Each `step()` takes one decision: either an idle gap up to the next
 * readiness event or one policy dispatch. Segments are appended in time
 * order and partition [0, time] at every step boundary, so a run stopped
 * between steps still has a consistent partial timeline.
 */
export class Simulator {
    private static runs = 0;

    /** Distinguishes this run's delta-logged state from other runs of the same policy. */
    private readonly runId = ++Simulator.runs;

    private _state: SimulationStateType = SimulationState.NOT_STARTED;
    private _time = 0;
    private _segments: GanttSegment[] = [];
    private _readyHistory: ReadySnapshot[] = [];

    /** Unfinished process that held the CPU in the last segment. */
    private current: Process | null = null;

    private stepCount = 0;
    private maxSteps = 0;
    private tracker: ReadinessTracker;

    constructor(
        private readonly registry: ProcessRegistry,
        private readonly policy: SchedulingPolicy
    ) {
        this.tracker = new ReadinessTracker(registry);
    }

    get state(): SimulationStateType {
        return this._state;
    }

    get time(): number {
        return this._time;
    }

    get segments(): readonly GanttSegment[] {
        return this._segments;
    }

    get readyHistory(): readonly ReadySnapshot[] {
        return this._readyHistory;
    }

    // -----------------------------------------------------------------------
    // Lifecycle
    // -----------------------------------------------------------------------

    /** Validate the workload and reset run-state. Called by the first step. */
    private start(): void {
        if (this.registry.size === 0) {
            throw new EmptyInputError("Cannot simulate an empty registry");
        }
        validateDependencies(this.registry);
        this.registry.resetRunState();
        this.tracker = new ReadinessTracker(this.registry);

        this._time = 0;
        this._segments = [];
        this._readyHistory = [];
        this.current = null;
        this.stepCount = 0;

        // Every busy step consumes at least one unit of burst and every idle
        // step is followed by a busy one.
        const totalBurst = this.registry.getAll().reduce((sum, p) => sum + p.burstTime, 0);
        this.maxSteps = 2 * totalBurst + 2;

        log.debug(() => `Starting ${this.policy.label} over ${this.registry.size} processes`);
    }

    private transition(next: SimulationStateType): void {
        this._state = next;
        log.alert(`run${this.runId}:state`, next, LogLevel.TRACE);
    }

    private allFinished(): boolean {
        return this.tracker.done;
    }

    // -----------------------------------------------------------------------
    // Stepping
    // -----------------------------------------------------------------------

    /**
     * Advance by one decision. Returns the segment that was appended or
     * extended, or `null` once the run is finished or aborted.
     */
    step(): GanttSegment | null {
        if (this._state === SimulationState.FINISHED || this._state === SimulationState.ABORTED) {
            return null;
        }
        if (this._state === SimulationState.NOT_STARTED) {
            this.start();
        }
        if (this.allFinished()) {
            this.transition(SimulationState.FINISHED);
            return null;
        }

        this.stepCount++;
        if (this.stepCount > this.maxSteps) {
            throw new DeadlockError("Simulation made no progress", {
                time: this._time,
                blocked: this.unfinishedIds(),
            });
        }
        log.throttle(this.stepCount, PROGRESS_INTERVAL, () =>
            `step ${this.stepCount}: t=${this._time}, ${this._segments.length} segments`
        );

        const ready = this.tracker.readyAt(this._time);
        for (const process of ready) {
            if (process.readySince === null) {
                process.readySince = unblockedAt(process, this.registry) ?? this._time;
            }
        }
        this._readyHistory.push({ time: this._time, ready: ready.map(p => p.id) });

        const segment = ready.length === 0 ? this.idle() : this.dispatch(ready);

        if (this.allFinished()) {
            this.transition(SimulationState.FINISHED);
            log.debug(() => `${this.policy.label} finished at t=${this._time} after ${this.stepCount} steps`);
        }
        return segment;
    }

    private idle(): GanttSegment {
        const next = this.tracker.nextEventAfter(this._time);
        if (next === null) {
            throw new DeadlockError("No process can become ready", {
                time: this._time,
                blocked: this.unfinishedIds(),
            });
        }

        if (this.current) {
            this.setStatus(this.current, ProcessStatus.WAITING);
            this.current = null;
        }
        this.transition(SimulationState.IDLE);

        const segment: GanttSegment = { processId: IDLE_ID, start: this._time, end: next };
        this._segments.push(segment);
        log.trace(() => `idle ${segment.start}-${segment.end}`);
        this._time = next;
        return segment;
    }

    private dispatch(ready: Process[]): GanttSegment {
        const time = this._time;
        const { process, duration } = this.policy.decide({
            time,
            ready,
            registry: this.registry,
            running: this.current,
            nextArrival: this.tracker.nextArrivalAfter(time),
        });

        if (!ready.includes(process) || !Number.isInteger(duration) ||
            duration <= 0 || duration > process.remainingTime) {
            throw new SchedulerError(`${this.policy.label} returned an invalid decision`, {
                processId: process.id,
                time,
                duration,
            });
        }

        const continues = this.current === process;
        if (this.current && !continues) {
            this.setStatus(this.current, ProcessStatus.WAITING);
        }
        if (!continues || !this.policy.continuous) {
            process.dispatchCount++;
        }
        if (process.startTime === null) {
            process.startTime = time;
        }
        this.transition(SimulationState.RUNNING);

        const end = time + duration;
        process.remainingTime -= duration;
        process.lastRanAt = end;
        this.setStatus(process, ProcessStatus.RUNNING);

        const segment = this.appendSegment(process, time, end);

        if (process.remainingTime === 0) {
            process.finishTime = end;
            this.setStatus(process, ProcessStatus.FINISHED);
            this.tracker.finished(process);
            this.current = null;
        } else {
            process.readySince = end;
            this.current = process;
        }

        this._time = end;
        return segment;
    }

    private setStatus(process: Process, status: ProcessStatusType): void {
        if (process.status === status) return;
        process.status = status;
        log.trace(() => `t=${this._time}: ${process.id} -> ${PROCESS_STATUS_NAMES[status]}`);
    }

    /** Extend the last segment for continuous work, otherwise start a new one. */
    private appendSegment(process: Process, start: number, end: number): GanttSegment {
        const last = this._segments[this._segments.length - 1];
        if (this.policy.continuous && last !== undefined &&
            last.processId === process.id && last.end === start) {
            last.end = end;
            return last;
        }
        const segment: GanttSegment = { processId: process.id, start, end };
        this._segments.push(segment);
        return segment;
    }

    private unfinishedIds(): string[] {
        return this.registry.getAll().filter(p => !p.isFinished()).map(p => p.id);
    }

    // -----------------------------------------------------------------------
    // Full runs
    // -----------------------------------------------------------------------

    /**
     * Step until finished. When `signal` is aborted the run stops between
     * steps and the partial timeline is returned.
     */
    run(signal?: AbortSignal): SimulationOutcome {
        while (this._state !== SimulationState.FINISHED) {
            if (signal?.aborted || this._state === SimulationState.ABORTED) {
                this.transition(SimulationState.ABORTED);
                log.warning(`${this.policy.label} aborted at t=${this._time}`);
                return { status: SimulationState.ABORTED, time: this._time, segments: [...this._segments] };
            }
            this.step();
        }
        return { status: SimulationState.FINISHED, result: this.result() };
    }

    /** Result of a finished run. */
    result(): SimulationResult {
        return {
            policy: this.policy.label,
            segments: this._segments.map(s => ({ ...s })),
            metrics: computeMetrics(this.registry, this._segments),
            readyHistory: [...this._readyHistory],
        };
    }
}
