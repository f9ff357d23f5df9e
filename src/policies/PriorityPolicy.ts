// ============================================================================
// PriorityPolicy — Static priority, non-preemptive and preemptive variants
// ============================================================================

import { PolicyKind, PriorityOrder } from "../config/PolicyConfig";
import { Process } from "../kernel/Process";
import { by, chain, compareIds } from "../utils/Compare";
import { Decision, DecisionContext, SchedulingPolicy, pickBest, toCompletion } from "./Policy";
import { PreemptivePolicy } from "./PreemptivePolicy";

/**
 * Orient a priority so that smaller always means "runs first".
 * "ascending": priority 0 beats priority 5 (the default).
 * "descending": priority 5 beats priority 0.
 */
export function priorityRank(process: Process, order: PriorityOrder): number {
    return order === "ascending" ? process.priority : -process.priority;
}

/** Best priority runs to completion; ties to the smallest id, then earliest arrival. */
export class PriorityPolicy implements SchedulingPolicy {
    readonly kind = PolicyKind.PRIORITY;
    readonly label: string;
    readonly continuous = true;

    private readonly order: (a: Process, b: Process) => number;

    constructor(readonly priorityOrder: PriorityOrder = "ascending") {
        this.label = `Priority (non-preemptive, ${priorityOrder})`;
        this.order = chain<Process>(
            by(p => priorityRank(p, priorityOrder)),
            (a, b) => compareIds(a.id, b.id),
            by(p => p.arrivalTime)
        );
    }

    decide(context: DecisionContext): Decision {
        return toCompletion(pickBest(context.ready, this.order));
    }
}

/** A newly ready process with strictly better priority preempts at its arrival. */
export class PriorityPreemptivePolicy extends PreemptivePolicy {
    readonly kind = PolicyKind.PRIORITY_PREEMPTIVE;
    readonly label: string;

    constructor(readonly priorityOrder: PriorityOrder = "ascending") {
        super();
        this.label = `Priority (preemptive, ${priorityOrder})`;
    }

    protected rank(process: Process): number {
        return priorityRank(process, this.priorityOrder);
    }
}
