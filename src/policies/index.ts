// ============================================================================
// Policy factory — PolicyConfig → SchedulingPolicy
// ============================================================================

import { PolicyConfig, PolicyKind, resolvePolicyConfig } from "../config/PolicyConfig";
import { SchedulingPolicy } from "./Policy";
import { FcfsPolicy } from "./FcfsPolicy";
import { SjfPolicy } from "./SjfPolicy";
import { SrtfPolicy } from "./SrtfPolicy";
import { RoundRobinPolicy } from "./RoundRobinPolicy";
import { PriorityPolicy, PriorityPreemptivePolicy } from "./PriorityPolicy";
import { IntelligentPolicy } from "./IntelligentPolicy";
import { MlfqPolicy } from "./MlfqPolicy";

export * from "./Policy";
export { FcfsPolicy, SjfPolicy, SrtfPolicy, RoundRobinPolicy, PriorityPolicy, PriorityPreemptivePolicy, IntelligentPolicy, MlfqPolicy };

/** Validate `config` (ConfigurationError on bad parameters) and build its policy. */
export function createPolicy(config: PolicyConfig): SchedulingPolicy {
    const resolved = resolvePolicyConfig(config);
    switch (resolved.kind) {
        case PolicyKind.FCFS:
            return new FcfsPolicy();
        case PolicyKind.SJF:
            return new SjfPolicy();
        case PolicyKind.SRTF:
            return new SrtfPolicy();
        case PolicyKind.ROUND_ROBIN:
            return new RoundRobinPolicy(resolved.quantum);
        case PolicyKind.PRIORITY:
            return new PriorityPolicy(resolved.order);
        case PolicyKind.PRIORITY_PREEMPTIVE:
            return new PriorityPreemptivePolicy(resolved.order);
        case PolicyKind.INTELLIGENT:
            return new IntelligentPolicy(resolved.weights, resolved.starvationThreshold, resolved.slice);
        case PolicyKind.MLFQ:
            return new MlfqPolicy(resolved.quantum, resolved.levels);
    }
}
