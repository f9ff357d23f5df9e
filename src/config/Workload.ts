// ============================================================================
// Workload — JSON workload files (process list + optional policy)
// ============================================================================

import * as fs from "fs";
import { Static, TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ProcessSpec } from "../kernel/Process";
import { ProcessRegistry } from "../kernel/ProcessRegistry";
import { ConfigurationError } from "../kernel/Errors";
import { PolicyConfig, PolicyKind } from "./PolicyConfig";
import { Logger } from "../utils/Logger";

const log = new Logger("Workload");

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/**
 * One process as stored on disk. Field ranges (arrival >= 0, burst > 0)
 * are checked by the registry, which reports them as InvalidInputError.
 */
export const ProcessEntrySchema = Type.Object(
    {
        pid: Type.String({ minLength: 1 }),
        arrival: Type.Integer(),
        burst: Type.Integer(),
        priority: Type.Optional(Type.Integer()),
        dependencies: Type.Optional(Type.Array(Type.String())),
    },
    { additionalProperties: false }
);

const PriorityOrderSchema = Type.Union([Type.Literal("ascending"), Type.Literal("descending")]);

export const PolicyEntrySchema = Type.Object(
    {
        kind: Type.Union([
            Type.Literal(PolicyKind.FCFS),
            Type.Literal(PolicyKind.SJF),
            Type.Literal(PolicyKind.SRTF),
            Type.Literal(PolicyKind.ROUND_ROBIN),
            Type.Literal(PolicyKind.PRIORITY),
            Type.Literal(PolicyKind.PRIORITY_PREEMPTIVE),
            Type.Literal(PolicyKind.INTELLIGENT),
            Type.Literal(PolicyKind.MLFQ),
        ]),
        quantum: Type.Optional(Type.Integer()),
        levels: Type.Optional(Type.Integer()),
        order: Type.Optional(PriorityOrderSchema),
        weights: Type.Optional(
            Type.Object(
                {
                    waiting: Type.Optional(Type.Number()),
                    burst: Type.Optional(Type.Number()),
                    priority: Type.Optional(Type.Number()),
                },
                { additionalProperties: false }
            )
        ),
        starvationThreshold: Type.Optional(Type.Integer()),
        slice: Type.Optional(Type.Integer()),
    },
    { additionalProperties: false }
);

export const WorkloadFileSchema = Type.Union([
    Type.Array(ProcessEntrySchema),
    Type.Object(
        {
            processes: Type.Array(ProcessEntrySchema),
            policy: Type.Optional(PolicyEntrySchema),
        },
        { additionalProperties: false }
    ),
]);

export type ProcessEntry = Static<typeof ProcessEntrySchema>;
export type PolicyEntry = Static<typeof PolicyEntrySchema>;
export type WorkloadFile = Static<typeof WorkloadFileSchema>;

export interface Workload {
    registry: ProcessRegistry;
    policy?: PolicyConfig;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function check<T extends TSchema>(schema: T, data: unknown, what: string): Static<T> {
    if (Value.Check(schema, data)) {
        return data;
    }
    const problems = [...Value.Errors(schema, data)]
        .slice(0, 5)
        .map(e => `${e.path || "/"}: ${e.message}`);
    throw new ConfigurationError(`Invalid ${what}: ${problems.join("; ")}`, { problems });
}

function requireQuantum(entry: PolicyEntry): number {
    if (entry.quantum === undefined) {
        throw new ConfigurationError(`${entry.kind}: quantum is required`, {
            policy: entry.kind,
            parameter: "quantum",
        });
    }
    return entry.quantum;
}

/** Map a validated policy entry onto the PolicyConfig union. */
export function toPolicyConfig(entry: PolicyEntry): PolicyConfig {
    switch (entry.kind) {
        case PolicyKind.FCFS:
        case PolicyKind.SJF:
        case PolicyKind.SRTF:
            return { kind: entry.kind };
        case PolicyKind.ROUND_ROBIN:
            return { kind: entry.kind, quantum: requireQuantum(entry) };
        case PolicyKind.MLFQ:
            return { kind: entry.kind, quantum: requireQuantum(entry), levels: entry.levels };
        case PolicyKind.PRIORITY:
        case PolicyKind.PRIORITY_PREEMPTIVE:
            return { kind: entry.kind, order: entry.order };
        case PolicyKind.INTELLIGENT:
            return {
                kind: entry.kind,
                weights: entry.weights,
                starvationThreshold: entry.starvationThreshold,
                slice: entry.slice,
            };
    }
}

export function toProcessSpec(entry: ProcessEntry): ProcessSpec {
    return {
        id: entry.pid,
        arrivalTime: entry.arrival,
        burstTime: entry.burst,
        priority: entry.priority ?? 0,
        dependencies: entry.dependencies ?? [],
    };
}

/**
 * Validate parsed JSON and build a registry from it.
 * Shape errors raise ConfigurationError; bad field values raise the
 * registry's InvalidInputError / DuplicateIdError.
 */
export function parseWorkload(data: unknown): Workload {
    const file = check(WorkloadFileSchema, data, "workload file");
    const entries = Array.isArray(file) ? file : file.processes;
    const policyEntry = Array.isArray(file) ? undefined : file.policy;

    const registry = ProcessRegistry.from(entries.map(toProcessSpec));
    return policyEntry ? { registry, policy: toPolicyConfig(policyEntry) } : { registry };
}

/** Inverse of parseWorkload, as a plain JSON-ready object. */
export function toWorkloadFile(registry: ProcessRegistry, policy?: PolicyConfig): WorkloadFile {
    const processes: ProcessEntry[] = registry.getAll().map(p => {
        const entry: ProcessEntry = {
            pid: p.id,
            arrival: p.arrivalTime,
            burst: p.burstTime,
            priority: p.priority,
        };
        if (p.dependencies.size > 0) {
            entry.dependencies = [...p.dependencies].sort();
        }
        return entry;
    });
    return policy ? { processes, policy } : { processes };
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

export function loadWorkload(path: string): Workload {
    let text: string;
    try {
        text = fs.readFileSync(path, "utf8");
    } catch (e: unknown) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Cannot read workload file: ${reason}`, { path });
    }

    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (e: unknown) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Workload file is not valid JSON: ${reason}`, { path });
    }

    const workload = parseWorkload(data);
    log.debug(() => `Loaded ${workload.registry.size} processes from ${path}`);
    return workload;
}

export function saveWorkload(path: string, registry: ProcessRegistry, policy?: PolicyConfig): void {
    fs.writeFileSync(path, JSON.stringify(toWorkloadFile(registry, policy), null, 2) + "\n", "utf8");
    log.debug(() => `Saved ${registry.size} processes to ${path}`);
}
