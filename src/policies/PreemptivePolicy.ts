// ============================================================================
// PreemptivePolicy — Event-driven "best key wins, strictly" preemption
// ============================================================================

import { Process } from "../kernel/Process";
import { compareIds } from "../utils/Compare";
import { Decision, DecisionContext, SchedulingPolicy, pickBest, untilNextArrival } from "./Policy";
import { PolicyKindType } from "../config/PolicyConfig";

/**
 * Base for policies that re-evaluate at every arrival and completion.
 *
 * The process that held the CPU keeps it unless some ready process has a
 * strictly smaller `rank()`. Otherwise the smallest rank wins, ties to the
 * smallest id. Each slice ends at the next arrival so the preemption check
 * happens at the arrival instant.
 */
export abstract class PreemptivePolicy implements SchedulingPolicy {
    abstract readonly kind: PolicyKindType;
    abstract readonly label: string;
    readonly continuous = true;

    /** Smaller is better. */
    protected abstract rank(process: Process, context: DecisionContext): number;

    decide(context: DecisionContext): Decision {
        const best = pickBest(context.ready, (a, b) =>
            this.rank(a, context) - this.rank(b, context) || compareIds(a.id, b.id)
        );

        const running = context.running;
        if (running && running !== best && context.ready.includes(running) &&
            !(this.rank(best, context) < this.rank(running, context))) {
            return untilNextArrival(running, context);
        }
        return untilNextArrival(best, context);
    }
}
