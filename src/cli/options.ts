// ============================================================================
// CLI options — Raw command-line strings → typed configuration
// ============================================================================

import {
    IntelligentWeights,
    PolicyConfig,
    PolicyKind,
    PolicyKindType,
    POLICY_KINDS,
    PriorityOrder,
    isPolicyKind,
} from "../config/PolicyConfig";
import { ConfigurationError } from "../kernel/Errors";

/** Policy when neither the flags nor the workload file name one. */
export const DEFAULT_POLICY: PolicyKindType = PolicyKind.INTELLIGENT;
/** Quantum for rr/mlfq when neither the flags nor the file give one. */
export const DEFAULT_QUANTUM = 2;

/** Policy flags as commander hands them over. */
export interface PolicyFlags {
    policy?: string;
    quantum?: string;
    levels?: string;
    order?: string;
    threshold?: string;
    slice?: string;
    weights?: string;
}

export function parseInteger(flag: string, raw: string): number {
    const value = Number(raw.trim());
    if (raw.trim() === "" || !Number.isInteger(value)) {
        throw new ConfigurationError(`--${flag} expects an integer, got "${raw}"`, { parameter: flag });
    }
    return value;
}

function parseKind(raw: string): PolicyKindType {
    const kind = raw.trim().toLowerCase();
    if (!isPolicyKind(kind)) {
        throw new ConfigurationError(`Unknown policy "${raw}". Valid: ${POLICY_KINDS.join(", ")}`, { policy: raw });
    }
    return kind;
}

function parseOrder(raw: string): PriorityOrder {
    const order = raw.trim().toLowerCase();
    if (order !== "ascending" && order !== "descending") {
        throw new ConfigurationError(`--order expects "ascending" or "descending", got "${raw}"`, {
            parameter: "order",
        });
    }
    return order;
}

/** "w,b,p" → weights. Empty parts keep the default. */
export function parseWeights(raw: string): Partial<IntelligentWeights> {
    const parts = raw.split(",").map(part => part.trim());
    if (parts.length !== 3) {
        throw new ConfigurationError(`--weights expects "waiting,burst,priority", got "${raw}"`, {
            parameter: "weights",
        });
    }
    const names = ["waiting", "burst", "priority"] as const;
    const weights: Partial<IntelligentWeights> = {};
    names.forEach((name, i) => {
        const part = parts[i];
        if (part === "") return;
        const value = Number(part);
        if (Number.isNaN(value)) {
            throw new ConfigurationError(`--weights: "${part}" is not a number`, { parameter: `weights.${name}` });
        }
        weights[name] = value;
    });
    return weights;
}

/**
 * Merge command-line flags over the workload file's policy. A `--policy`
 * naming a different kind discards the file's parameters. Range checks
 * are left to resolvePolicyConfig.
 */
export function policyFromOptions(flags: PolicyFlags, filePolicy?: PolicyConfig): PolicyConfig {
    const kind = flags.policy !== undefined ? parseKind(flags.policy) : filePolicy?.kind ?? DEFAULT_POLICY;
    const base = filePolicy?.kind === kind ? filePolicy : undefined;

    const quantum = flags.quantum !== undefined ? parseInteger("quantum", flags.quantum) : undefined;

    switch (kind) {
        case PolicyKind.FCFS:
        case PolicyKind.SJF:
        case PolicyKind.SRTF:
            return { kind };
        case PolicyKind.ROUND_ROBIN:
            return {
                kind,
                quantum: quantum ?? (base?.kind === PolicyKind.ROUND_ROBIN ? base.quantum : DEFAULT_QUANTUM),
            };
        case PolicyKind.MLFQ: {
            const fromFile = base?.kind === PolicyKind.MLFQ ? base : undefined;
            return {
                kind,
                quantum: quantum ?? fromFile?.quantum ?? DEFAULT_QUANTUM,
                levels: flags.levels !== undefined ? parseInteger("levels", flags.levels) : fromFile?.levels,
            };
        }
        case PolicyKind.PRIORITY:
        case PolicyKind.PRIORITY_PREEMPTIVE: {
            const fromFile =
                base?.kind === PolicyKind.PRIORITY || base?.kind === PolicyKind.PRIORITY_PREEMPTIVE ? base : undefined;
            return {
                kind,
                order: flags.order !== undefined ? parseOrder(flags.order) : fromFile?.order,
            };
        }
        case PolicyKind.INTELLIGENT: {
            const fromFile = base?.kind === PolicyKind.INTELLIGENT ? base : undefined;
            return {
                kind,
                weights: flags.weights !== undefined
                    ? { ...fromFile?.weights, ...parseWeights(flags.weights) }
                    : fromFile?.weights,
                starvationThreshold: flags.threshold !== undefined
                    ? parseInteger("threshold", flags.threshold)
                    : fromFile?.starvationThreshold,
                slice: flags.slice !== undefined ? parseInteger("slice", flags.slice) : fromFile?.slice,
            };
        }
    }
}
