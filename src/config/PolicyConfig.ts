// ============================================================================
// PolicyConfig — Policy selection and its parameters
// ============================================================================

import { ConfigurationError } from "../kernel/Errors";

export const PolicyKind = {
    FCFS: "fcfs",
    SJF: "sjf",
    SRTF: "srtf",
    ROUND_ROBIN: "rr",
    PRIORITY: "priority",
    PRIORITY_PREEMPTIVE: "priority-preemptive",
    INTELLIGENT: "intelligent",
    MLFQ: "mlfq",
} as const;

export type PolicyKindType = (typeof PolicyKind)[keyof typeof PolicyKind];

export const POLICY_KINDS: readonly PolicyKindType[] = Object.values(PolicyKind);

/** Which end of the priority scale wins. */
export type PriorityOrder = "ascending" | "descending";

export interface IntelligentWeights {
    waiting: number;
    burst: number;
    priority: number;
}

export type PolicyConfig =
    | { kind: typeof PolicyKind.FCFS }
    | { kind: typeof PolicyKind.SJF }
    | { kind: typeof PolicyKind.SRTF }
    | { kind: typeof PolicyKind.ROUND_ROBIN; quantum: number }
    | { kind: typeof PolicyKind.PRIORITY; order?: PriorityOrder }
    | { kind: typeof PolicyKind.PRIORITY_PREEMPTIVE; order?: PriorityOrder }
    | {
          kind: typeof PolicyKind.INTELLIGENT;
          weights?: Partial<IntelligentWeights>;
          starvationThreshold?: number;
          slice?: number;
      }
    | { kind: typeof PolicyKind.MLFQ; quantum: number; levels?: number };

export type ResolvedPolicyConfig =
    | { kind: typeof PolicyKind.FCFS }
    | { kind: typeof PolicyKind.SJF }
    | { kind: typeof PolicyKind.SRTF }
    | { kind: typeof PolicyKind.ROUND_ROBIN; quantum: number }
    | { kind: typeof PolicyKind.PRIORITY; order: PriorityOrder }
    | { kind: typeof PolicyKind.PRIORITY_PREEMPTIVE; order: PriorityOrder }
    | {
          kind: typeof PolicyKind.INTELLIGENT;
          weights: IntelligentWeights;
          starvationThreshold: number;
          slice: number;
      }
    | { kind: typeof PolicyKind.MLFQ; quantum: number; levels: number };

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_WEIGHTS: IntelligentWeights = { waiting: 1, burst: 1, priority: 1 };
export const DEFAULT_STARVATION_THRESHOLD = 10;
export const DEFAULT_SLICE = 2;
export const DEFAULT_MLFQ_LEVELS = 3;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function positiveInteger(kind: string, name: string, value: number): number {
    if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError(`${kind}: ${name} must be a positive integer, got ${String(value)}`, {
            policy: kind,
            parameter: name,
        });
    }
    return value;
}

function weight(name: string, value: number): number {
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigurationError(`intelligent: weight "${name}" must be a finite number >= 0, got ${String(value)}`, {
            policy: PolicyKind.INTELLIGENT,
            parameter: `weights.${name}`,
        });
    }
    return value;
}

function priorityOrder(kind: string, order: PriorityOrder | undefined): PriorityOrder {
    if (order === undefined) return "ascending";
    if (order !== "ascending" && order !== "descending") {
        throw new ConfigurationError(`${kind}: order must be "ascending" or "descending", got ${String(order)}`, {
            policy: kind,
            parameter: "order",
        });
    }
    return order;
}

export function isPolicyKind(value: string): value is PolicyKindType {
    return POLICY_KINDS.some(kind => kind === value);
}

/** Apply defaults and reject invalid parameters. */
export function resolvePolicyConfig(config: PolicyConfig): ResolvedPolicyConfig {
    switch (config.kind) {
        case PolicyKind.FCFS:
        case PolicyKind.SJF:
        case PolicyKind.SRTF:
            return { kind: config.kind };
        case PolicyKind.ROUND_ROBIN:
            return { kind: config.kind, quantum: positiveInteger(config.kind, "quantum", config.quantum) };
        case PolicyKind.PRIORITY:
        case PolicyKind.PRIORITY_PREEMPTIVE:
            return { kind: config.kind, order: priorityOrder(config.kind, config.order) };
        case PolicyKind.INTELLIGENT: {
            const weights = { ...DEFAULT_WEIGHTS, ...config.weights };
            return {
                kind: config.kind,
                weights: {
                    waiting: weight("waiting", weights.waiting),
                    burst: weight("burst", weights.burst),
                    priority: weight("priority", weights.priority),
                },
                starvationThreshold: positiveInteger(
                    config.kind,
                    "starvationThreshold",
                    config.starvationThreshold ?? DEFAULT_STARVATION_THRESHOLD
                ),
                slice: positiveInteger(config.kind, "slice", config.slice ?? DEFAULT_SLICE),
            };
        }
        case PolicyKind.MLFQ:
            return {
                kind: config.kind,
                quantum: positiveInteger(config.kind, "quantum", config.quantum),
                levels: positiveInteger(config.kind, "levels", config.levels ?? DEFAULT_MLFQ_LEVELS),
            };
        default: {
            const unreachable: never = config;
            return unknownKind(unreachable);
        }
    }
}

/** Input that bypassed the type system (e.g. parsed JSON). */
function unknownKind(config: { kind?: unknown }): never {
    const kind = config.kind;
    throw new ConfigurationError(`Unknown policy "${String(kind)}". Valid: ${POLICY_KINDS.join(", ")}`, {
        policy: String(kind),
    });
}
