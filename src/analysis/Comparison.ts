// ============================================================================
// Comparison — Run several policies over one workload and pick the best
// ============================================================================

import { ProcessRegistry } from "../kernel/ProcessRegistry";
import { SimulationResult } from "../kernel/Simulator";
import { EmptyInputError } from "../kernel/Errors";
import { PolicyConfig, PolicyKind } from "../config/PolicyConfig";
import { simulate } from "../simulate";
import { Logger } from "../utils/Logger";

const log = new Logger("Comparison");

export interface PolicyComparison {
    config: PolicyConfig;
    result: SimulationResult;
}

/** One configuration per policy kind, in PolicyKind order. */
export function defaultPolicyConfigs(quantum = 2): PolicyConfig[] {
    return [
        { kind: PolicyKind.FCFS },
        { kind: PolicyKind.SJF },
        { kind: PolicyKind.SRTF },
        { kind: PolicyKind.ROUND_ROBIN, quantum },
        { kind: PolicyKind.PRIORITY },
        { kind: PolicyKind.PRIORITY_PREEMPTIVE },
        { kind: PolicyKind.INTELLIGENT },
        { kind: PolicyKind.MLFQ, quantum },
    ];
}

/**
 * Simulate each configuration on its own clone of `registry`, so the
 * caller's run-state is left untouched. Results keep the order of `configs`.
 */
export function comparePolicies(
    registry: ProcessRegistry,
    configs: readonly PolicyConfig[] = defaultPolicyConfigs()
): PolicyComparison[] {
    return configs.map(config => {
        const result = simulate(registry.clone(), config);
        log.debug(() => `${result.policy}: avg wait ${result.metrics.averageWaitingTime.toFixed(2)}`);
        return { config, result };
    });
}

/**
 * Lowest average waiting time, then lowest average turnaround time,
 * then the earliest entry.
 */
export function recommendPolicy(comparisons: readonly PolicyComparison[]): PolicyComparison {
    let best: PolicyComparison | undefined;
    for (const candidate of comparisons) {
        if (best === undefined) {
            best = candidate;
            continue;
        }
        const a = candidate.result.metrics;
        const b = best.result.metrics;
        if (a.averageWaitingTime < b.averageWaitingTime ||
            (a.averageWaitingTime === b.averageWaitingTime && a.averageTurnaroundTime < b.averageTurnaroundTime)) {
            best = candidate;
        }
    }
    if (best === undefined) {
        throw new EmptyInputError("No policy results to compare");
    }
    return best;
}

/** Comparison table, one row per policy, recommended row marked with `*`. */
export function formatComparison(comparisons: readonly PolicyComparison[]): string {
    const best = recommendPolicy(comparisons);
    const width = Math.max(6, ...comparisons.map(c => c.result.policy.length));
    const lines = [
        `  ${"Policy".padEnd(width)}  avg wait  avg turnaround  avg response  switches`,
    ];
    for (const c of comparisons) {
        const m = c.result.metrics;
        const mark = c === best ? "*" : " ";
        lines.push(
            `${mark} ${c.result.policy.padEnd(width)}  ` +
            `${m.averageWaitingTime.toFixed(2).padStart(8)}  ` +
            `${m.averageTurnaroundTime.toFixed(2).padStart(14)}  ` +
            `${m.averageResponseTime.toFixed(2).padStart(12)}  ` +
            `${String(m.contextSwitches).padStart(8)}`
        );
    }
    lines.push(`Recommended: ${best.result.policy}`);
    return lines.join("\n");
}
