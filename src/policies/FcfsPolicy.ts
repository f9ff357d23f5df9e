// ============================================================================
// FcfsPolicy — First come, first served (non-preemptive)
// ============================================================================

import { PolicyKind } from "../config/PolicyConfig";
import { Process } from "../kernel/Process";
import { by, chain, compareIds } from "../utils/Compare";
import { Decision, DecisionContext, SchedulingPolicy, pickBest, toCompletion } from "./Policy";

const fcfsOrder = chain<Process>(
    by(p => p.arrivalTime),
    (a, b) => compareIds(a.id, b.id)
);

/** Earliest arrival runs to completion; ties go to the smallest id. */
export class FcfsPolicy implements SchedulingPolicy {
    readonly kind = PolicyKind.FCFS;
    readonly label = "FCFS";
    readonly continuous = true;

    decide(context: DecisionContext): Decision {
        return toCompletion(pickBest(context.ready, fcfsOrder));
    }
}
