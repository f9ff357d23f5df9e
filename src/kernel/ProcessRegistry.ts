// ============================================================================
// ProcessRegistry — Process table keyed by id, with run-state reset
// ============================================================================

import { Process, ProcessId, ProcessSpec, IDLE_ID } from "./Process";
import { DuplicateIdError, InvalidInputError } from "./Errors";
import { Logger } from "../utils/Logger";

const log = new Logger("Registry");

function checkInteger(spec: ProcessSpec, field: "arrivalTime" | "burstTime" | "priority"): void {
    const value = spec[field];
    if (!Number.isInteger(value)) {
        throw new InvalidInputError(`${field} must be an integer, got ${String(value)}`, {
            processId: spec.id,
        });
    }
}

/**
 * Holds the processes of one workload. Insertion order is preserved and
 * is the order used for reports; scheduling decisions never depend on it.
 *
 * A registry carries the run-state of its processes, so it must not be
 * driven by two simulations at once. Use `clone()` for independent runs.
 */
export class ProcessRegistry {
    private processTable: Map<ProcessId, Process> = new Map();

    /** Validate and register a process. */
    add(spec: ProcessSpec): Process {
        if (typeof spec.id !== "string" || spec.id.trim() === "") {
            throw new InvalidInputError("Process id must be a non-empty string", {
                processId: spec.id,
            });
        }
        if (spec.id === IDLE_ID) {
            throw new InvalidInputError(`"${IDLE_ID}" is reserved for idle segments`, {
                processId: spec.id,
            });
        }
        if (this.processTable.has(spec.id)) {
            throw new DuplicateIdError(`Process "${spec.id}" is already registered`, {
                processId: spec.id,
            });
        }

        checkInteger(spec, "arrivalTime");
        checkInteger(spec, "burstTime");
        checkInteger(spec, "priority");

        if (spec.arrivalTime < 0) {
            throw new InvalidInputError(`arrivalTime must be >= 0, got ${spec.arrivalTime}`, {
                processId: spec.id,
            });
        }
        if (spec.burstTime <= 0) {
            throw new InvalidInputError(`burstTime must be > 0, got ${spec.burstTime}`, {
                processId: spec.id,
            });
        }
        if (spec.dependencies?.includes(spec.id)) {
            throw new InvalidInputError("A process cannot depend on itself", {
                processId: spec.id,
            });
        }

        const process = new Process(spec);
        this.processTable.set(process.id, process);
        log.debug(() => `Registered ${process.toString()}`);
        return process;
    }

    /** Register several processes; stops at the first invalid one. */
    addAll(specs: Iterable<ProcessSpec>): void {
        for (const spec of specs) {
            this.add(spec);
        }
    }

    /** Remove a process. Absent ids are a no-op. */
    remove(id: ProcessId): void {
        if (this.processTable.delete(id)) {
            log.debug(() => `Removed ${id}`);
        }
    }

    get(id: ProcessId): Process | undefined {
        return this.processTable.get(id);
    }

    has(id: ProcessId): boolean {
        return this.processTable.has(id);
    }

    /** All processes in insertion order. */
    getAll(): Process[] {
        return Array.from(this.processTable.values());
    }

    get size(): number {
        return this.processTable.size;
    }

    /** Restore every process to its pre-run state. */
    resetRunState(): void {
        for (const process of this.processTable.values()) {
            process.resetRunState();
        }
    }

    /** Independent registry with the same inputs and fresh run-state. */
    clone(): ProcessRegistry {
        const copy = new ProcessRegistry();
        for (const process of this.processTable.values()) {
            copy.processTable.set(process.id, new Process(process.toSpec()));
        }
        return copy;
    }

    static from(specs: Iterable<ProcessSpec>): ProcessRegistry {
        const registry = new ProcessRegistry();
        registry.addAll(specs);
        return registry;
    }
}
