// ============================================================================
// ReadinessTracker — Incremental ready set for one simulation run
// ============================================================================

import { Process, ProcessId } from "./Process";
import { ProcessRegistry } from "./ProcessRegistry";
import { dependenciesMet, unblockedAt } from "./Readiness";
import { by, chain, compareIds } from "../utils/Compare";

const byId = (a: Process, b: Process): number => compareIds(a.id, b.id);

/**
 * Same answers as `readySet`, `nextEventTime` and `nextArrivalAfter`, without
 * rescanning the registry on every step. Arrivals are sorted once; a process
 * is admitted when the clock passes its arrival and moves from blocked to
 * ready when its last dependency finishes.
 *
 * Time must not move backwards between calls.
 */
export class ReadinessTracker {
    private readonly byArrival: Process[];
    private cursor = 0;

    /** Arrived, unfinished, dependencies met. Kept sorted by id. */
    private readonly ready: Process[] = [];
    /** Arrived, unfinished, waiting on a dependency. */
    private readonly blocked = new Set<Process>();
    private readonly dependents = new Map<ProcessId, Process[]>();
    private unfinished: number;

    constructor(private readonly registry: ProcessRegistry) {
        const all = registry.getAll().filter(p => !p.isFinished());
        this.byArrival = all.sort(chain<Process>(by(p => p.arrivalTime), byId));
        this.unfinished = all.length;

        for (const process of all) {
            for (const depId of process.dependencies) {
                const list = this.dependents.get(depId);
                if (list) list.push(process);
                else this.dependents.set(depId, [process]);
            }
        }
    }

    /** True once every tracked process has finished. */
    get done(): boolean {
        return this.unfinished === 0;
    }

    private admit(time: number): void {
        while (this.cursor < this.byArrival.length) {
            const process = this.byArrival[this.cursor];
            if (process === undefined || process.arrivalTime > time) break;
            this.cursor++;
            if (dependenciesMet(process, time, this.registry)) {
                this.insert(process);
            } else {
                this.blocked.add(process);
            }
        }
    }

    private insert(process: Process): void {
        let lo = 0;
        let hi = this.ready.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            const other = this.ready[mid];
            if (other !== undefined && byId(other, process) < 0) lo = mid + 1;
            else hi = mid;
        }
        this.ready.splice(lo, 0, process);
    }

    /** Processes eligible at `time`, by ascending id. */
    readyAt(time: number): Process[] {
        this.admit(time);
        // A dependency removed from the registry mid-run unreadies its dependents.
        return this.ready.filter(p => dependenciesMet(p, time, this.registry));
    }

    /** Record that `process` finished; its dependents may become ready. */
    finished(process: Process): void {
        const index = this.ready.indexOf(process);
        if (index >= 0) this.ready.splice(index, 1);
        this.blocked.delete(process);
        this.unfinished--;

        const time = process.finishTime;
        if (time === null) return;
        for (const dependent of this.dependents.get(process.id) ?? []) {
            if (this.blocked.has(dependent) && dependenciesMet(dependent, time, this.registry)) {
                this.blocked.delete(dependent);
                this.insert(dependent);
            }
        }
    }

    /** Earliest arrival after `time` among processes not yet admitted. */
    nextArrivalAfter(time: number): number | null {
        this.admit(time);
        return this.byArrival[this.cursor]?.arrivalTime ?? null;
    }

    /**
     * Earliest instant after `time` at which a process becomes eligible
     * without further CPU work. Dependencies only finish at the end of a
     * dispatch, so only processes still to arrive can supply one.
     */
    nextEventAfter(time: number): number | null {
        this.admit(time);
        for (let i = this.cursor; i < this.byArrival.length; i++) {
            const process = this.byArrival[i];
            if (process === undefined) break;
            const at = unblockedAt(process, this.registry);
            if (at !== null && at > time) return at;
        }
        return null;
    }
}
