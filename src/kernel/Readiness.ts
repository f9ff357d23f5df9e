// ============================================================================
// Readiness — Which processes may run at a given instant, and when next
// ============================================================================

import { Process, ProcessId } from "./Process";
import { ProcessRegistry } from "./ProcessRegistry";
import { ConfigurationError } from "./Errors";
import { compareIds } from "../utils/Compare";

/** True when every dependency of `process` finished at or before `time`. */
export function dependenciesMet(process: Process, time: number, registry: ProcessRegistry): boolean {
    for (const depId of process.dependencies) {
        const dep = registry.get(depId);
        if (!dep || dep.finishTime === null || dep.finishTime > time) {
            return false;
        }
    }
    return true;
}

/**
 * Processes eligible for dispatch at `time`: arrived, unfinished and with
 * every dependency finished. Sorted by ascending id.
 */
export function readySet(time: number, registry: ProcessRegistry): Process[] {
    return registry
        .getAll()
        .filter(p =>
            p.arrivalTime <= time &&
            p.remainingTime > 0 &&
            dependenciesMet(p, time, registry)
        )
        .sort((a, b) => compareIds(a.id, b.id));
}

/**
 * The instant `process` became (or will become) eligible: the later of its
 * arrival and its dependencies' finish times. `null` while a dependency is
 * still unfinished.
 */
export function unblockedAt(process: Process, registry: ProcessRegistry): number | null {
    let at = process.arrivalTime;
    for (const depId of process.dependencies) {
        const dep = registry.get(depId);
        if (!dep || dep.finishTime === null) return null;
        at = Math.max(at, dep.finishTime);
    }
    return at;
}

/**
 * Earliest instant after `time` at which an unfinished process becomes
 * eligible without any further CPU work. `null` when no such event exists.
 */
export function nextEventTime(time: number, registry: ProcessRegistry): number | null {
    let next: number | null = null;
    for (const process of registry.getAll()) {
        if (process.isFinished()) continue;
        const at = unblockedAt(process, registry);
        if (at !== null && at > time && (next === null || at < next)) {
            next = at;
        }
    }
    return next;
}

/** Earliest arrival after `time` among unfinished processes, or `null`. */
export function nextArrivalAfter(time: number, registry: ProcessRegistry): number | null {
    let next: number | null = null;
    for (const process of registry.getAll()) {
        if (process.isFinished() || process.arrivalTime <= time) continue;
        if (next === null || process.arrivalTime < next) {
            next = process.arrivalTime;
        }
    }
    return next;
}

// ---------------------------------------------------------------------------
// Dependency graph validation
// ---------------------------------------------------------------------------

const VISITING = 1;
const DONE = 2;

/**
 * Reject dependencies on unknown ids and dependency cycles. Runs before a
 * simulation starts; an unsatisfiable graph never reaches the loop.
 */
export function validateDependencies(registry: ProcessRegistry): void {
    const processes = registry.getAll().sort((a, b) => compareIds(a.id, b.id));

    for (const process of processes) {
        for (const depId of process.dependencies) {
            if (!registry.has(depId)) {
                throw new ConfigurationError(
                    `Process "${process.id}" depends on unknown process "${depId}"`,
                    { processId: process.id, dependency: depId }
                );
            }
        }
    }

    const marks = new Map<ProcessId, number>();
    const path: ProcessId[] = [];

    const visit = (id: ProcessId): void => {
        const mark = marks.get(id);
        if (mark === DONE) return;
        if (mark === VISITING) {
            const cycle = [...path.slice(path.indexOf(id)), id];
            throw new ConfigurationError(
                `Dependency cycle: ${cycle.join(" -> ")}`,
                { processId: id, cycle }
            );
        }

        marks.set(id, VISITING);
        path.push(id);
        const process = registry.get(id);
        if (process) {
            const deps = Array.from(process.dependencies).sort(compareIds);
            for (const depId of deps) {
                visit(depId);
            }
        }
        path.pop();
        marks.set(id, DONE);
    };

    for (const process of processes) {
        visit(process.id);
    }
}
