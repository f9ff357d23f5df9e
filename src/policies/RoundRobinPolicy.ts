// ============================================================================
// RoundRobinPolicy — FIFO ready queue with a fixed time quantum
// ============================================================================

import { PolicyKind } from "../config/PolicyConfig";
import { Process } from "../kernel/Process";
import { by, chain, compareIds } from "../utils/Compare";
import { Decision, DecisionContext, SchedulingPolicy, enqueuedAt, pickBest } from "./Policy";

/**
 * FIFO order of the ready queue, derived from run-state instead of a
 * stored queue:
 *   1. Instant the process joined the queue (readiness, or end of its slice)
 *   2. At the same instant, processes that just became ready go before the
 *      process whose slice just expired
 *   3. Then arrival time, then id
 */
export const queueOrder = chain<Process>(
    by(enqueuedAt),
    by(p => (p.lastRanAt !== null ? 1 : 0)),
    by(p => p.arrivalTime),
    (a, b) => compareIds(a.id, b.id)
);

/** Head of the queue runs for min(quantum, remaining); unfinished work is requeued. */
export class RoundRobinPolicy implements SchedulingPolicy {
    readonly kind = PolicyKind.ROUND_ROBIN;
    readonly label: string;
    readonly continuous = false;

    constructor(readonly quantum: number) {
        this.label = `Round Robin (q=${quantum})`;
    }

    decide(context: DecisionContext): Decision {
        const head = pickBest(context.ready, queueOrder);
        return { process: head, duration: Math.min(this.quantum, head.remainingTime) };
    }
}
