// ============================================================================
// MlfqPolicy — Multi-level feedback queue with doubling quanta
// ============================================================================

import { PolicyKind } from "../config/PolicyConfig";
import { Process } from "../kernel/Process";
import { by, chain } from "../utils/Compare";
import { Decision, DecisionContext, SchedulingPolicy, pickBest } from "./Policy";
import { queueOrder } from "./RoundRobinPolicy";

/**
 * Every process enters level 0 and drops one level per expired slice,
 * down to `levels - 1`. Level `n` has quantum `quantum * 2^n`. The
 * highest non-empty level is served FIFO; slices are not preempted.
 */
export class MlfqPolicy implements SchedulingPolicy {
    readonly kind = PolicyKind.MLFQ;
    readonly label: string;
    readonly continuous = false;

    private readonly order: (a: Process, b: Process) => number;

    constructor(readonly quantum: number, readonly levels: number) {
        this.label = `MLFQ (q=${quantum}, ${levels} levels)`;
        this.order = chain<Process>(by(p => this.levelOf(p)), queueOrder);
    }

    /** Every dispatch of a still-unfinished process was a full, expired slice. */
    levelOf(process: Process): number {
        return Math.min(this.levels - 1, process.dispatchCount);
    }

    quantumFor(level: number): number {
        return this.quantum * 2 ** level;
    }

    decide(context: DecisionContext): Decision {
        const next = pickBest(context.ready, this.order);
        const slice = this.quantumFor(this.levelOf(next));
        return { process: next, duration: Math.min(slice, next.remainingTime) };
    }
}
