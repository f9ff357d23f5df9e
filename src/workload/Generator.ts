// ============================================================================
// Generator — Random workloads for demos and property tests
// ============================================================================

import _ from "lodash";
import { ProcessSpec } from "../kernel/Process";
import { ConfigurationError } from "../kernel/Errors";
import { RandomSource, randomInt } from "../utils/Random";

export interface GenerateOptions {
    /** Number of processes; random in [3, 10] when omitted */
    count?: number;
    rng?: RandomSource;
    maxArrival?: number;
    maxBurst?: number;
    maxPriority?: number;
    /** Number used for the first id (P1, P2, ...) */
    firstIndex?: number;
}

export const GENERATOR_DEFAULTS = {
    minCount: 3,
    maxCount: 10,
    maxArrival: 10,
    maxBurst: 10,
    maxPriority: 5,
} as const;

function nonNegativeInteger(name: string, value: number): number {
    if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(`${name} must be a non-negative integer, got ${String(value)}`, { parameter: name });
    }
    return value;
}

/**
 * Random processes with arrival in [0, maxArrival], burst in
 * [1, maxBurst] and priority in [0, maxPriority]. No dependencies.
 */
export function generateWorkload(options: GenerateOptions = {}): ProcessSpec[] {
    const rng = options.rng ?? Math.random;
    const maxArrival = nonNegativeInteger("maxArrival", options.maxArrival ?? GENERATOR_DEFAULTS.maxArrival);
    const maxBurst = nonNegativeInteger("maxBurst", options.maxBurst ?? GENERATOR_DEFAULTS.maxBurst);
    const maxPriority = nonNegativeInteger("maxPriority", options.maxPriority ?? GENERATOR_DEFAULTS.maxPriority);
    const firstIndex = nonNegativeInteger("firstIndex", options.firstIndex ?? 1);

    if (maxBurst < 1) {
        throw new ConfigurationError("maxBurst must be at least 1", { parameter: "maxBurst" });
    }
    const count = options.count ?? randomInt(rng, GENERATOR_DEFAULTS.minCount, GENERATOR_DEFAULTS.maxCount);
    if (!Number.isInteger(count) || count <= 0) {
        throw new ConfigurationError(`count must be a positive integer, got ${String(count)}`, { parameter: "count" });
    }

    return _.times(count, i => ({
        id: `P${firstIndex + i}`,
        arrivalTime: randomInt(rng, 0, maxArrival),
        burstTime: randomInt(rng, 1, maxBurst),
        priority: randomInt(rng, 0, maxPriority),
        dependencies: [],
    }));
}
