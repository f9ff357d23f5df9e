// ============================================================================
// SjfPolicy — Shortest job first (non-preemptive)
// ============================================================================

import { PolicyKind } from "../config/PolicyConfig";
import { Process } from "../kernel/Process";
import { by, chain, compareIds } from "../utils/Compare";
import { Decision, DecisionContext, SchedulingPolicy, pickBest, toCompletion } from "./Policy";

const sjfOrder = chain<Process>(
    by(p => p.burstTime),
    (a, b) => compareIds(a.id, b.id)
);

/** Smallest burst runs to completion; ties go to the smallest id. */
export class SjfPolicy implements SchedulingPolicy {
    readonly kind = PolicyKind.SJF;
    readonly label = "SJF (non-preemptive)";
    readonly continuous = true;

    decide(context: DecisionContext): Decision {
        return toCompletion(pickBest(context.ready, sjfOrder));
    }
}
