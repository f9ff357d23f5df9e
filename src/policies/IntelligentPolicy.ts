// ============================================================================
// IntelligentPolicy — Weighted scoring with starvation boost
// ============================================================================

import { IntelligentWeights, PolicyKind } from "../config/PolicyConfig";
import { Process } from "../kernel/Process";
import { compareIds } from "../utils/Compare";
import { Decision, DecisionContext, SchedulingPolicy, enqueuedAt, pickBest } from "./Policy";

export interface ScoredProcess {
    process: Process;
    /** Time spent in the ready set since it last joined it */
    waiting: number;
    starving: boolean;
    score: number;
}

function normalize(value: number, min: number, max: number): number {
    return max > min ? (value - min) / (max - min) : 0;
}

/**
 * Scores every ready process as
 *
 *   score = wWait * normWait - wBurst * normRemaining - wPriority * normPriority
 *
 * with each term scaled to [0, 1] over the current ready set (normWait and
 * normRemaining against the largest value present, normPriority 0 for the
 * best priority present and 1 for the worst; lower number = better).
 * The highest score wins, ties to the smallest id.
 *
 * Starvation boost: a process whose wait reached `starvationThreshold`
 * outranks every non-starving process; among starving processes the
 * longest wait wins. Slices are cut short at the instant another ready
 * process would cross the threshold, so a lone starving process is
 * dispatched exactly when it crosses.
 */
export class IntelligentPolicy implements SchedulingPolicy {
    readonly kind = PolicyKind.INTELLIGENT;
    readonly label: string;
    readonly continuous = false;

    constructor(
        readonly weights: IntelligentWeights,
        readonly starvationThreshold: number,
        readonly slice: number
    ) {
        this.label = `Intelligent (w=${weights.waiting}/${weights.burst}/${weights.priority}, ` +
            `starve>=${starvationThreshold}, slice=${slice})`;
    }

    /** Score the ready set at `time`. Exposed for reports and tests. */
    score(ready: readonly Process[], time: number): ScoredProcess[] {
        const waits = ready.map(p => time - enqueuedAt(p));
        const maxWait = Math.max(0, ...waits);
        const maxRemaining = Math.max(...ready.map(p => p.remainingTime));
        const bestPriority = Math.min(...ready.map(p => p.priority));
        const worstPriority = Math.max(...ready.map(p => p.priority));

        return ready.map((process, i) => {
            const waiting = waits[i];
            const score =
                this.weights.waiting * normalize(waiting, 0, maxWait) -
                this.weights.burst * normalize(process.remainingTime, 0, maxRemaining) -
                this.weights.priority * normalize(process.priority, bestPriority, worstPriority);
            return {
                process,
                waiting,
                starving: waiting >= this.starvationThreshold,
                score,
            };
        });
    }

    decide(context: DecisionContext): Decision {
        const { time, ready, nextArrival } = context;
        const scored = this.score(ready, time);

        const winner = pickBest(scored, (a, b) => {
            if (a.starving !== b.starving) return a.starving ? -1 : 1;
            if (a.starving) {
                return b.waiting - a.waiting || compareIds(a.process.id, b.process.id);
            }
            return b.score - a.score || compareIds(a.process.id, b.process.id);
        });

        const chosen = winner.process;
        let duration = Math.min(chosen.remainingTime, this.slice);
        if (nextArrival !== null) {
            duration = Math.min(duration, nextArrival - time);
        }
        for (const other of ready) {
            if (other === chosen) continue;
            const crossesAt = enqueuedAt(other) + this.starvationThreshold;
            if (crossesAt > time) {
                duration = Math.min(duration, crossesAt - time);
            }
        }

        return { process: chosen, duration };
    }
}
