// ============================================================================
// Metrics — Per-process and aggregate figures derived from a finished run
// ============================================================================

import _ from "lodash";
import { ProcessId } from "../kernel/Process";
import { ProcessRegistry } from "../kernel/ProcessRegistry";
import { GanttSegment, durationOf, isIdle } from "../kernel/Timeline";
import { EmptyInputError, SimulationIncompleteError } from "../kernel/Errors";

export interface ProcessMetrics {
    id: ProcessId;
    arrivalTime: number;
    burstTime: number;
    priority: number;
    startTime: number;
    finishTime: number;
    /** finishTime - arrivalTime */
    turnaroundTime: number;
    /** turnaroundTime - burstTime */
    waitingTime: number;
    /** startTime - arrivalTime */
    responseTime: number;
}

export interface MetricsRecord {
    /** Registry insertion order */
    processes: ProcessMetrics[];
    averageWaitingTime: number;
    averageTurnaroundTime: number;
    averageResponseTime: number;
    /** busyTime / elapsedTime, 0..1 */
    cpuUtilization: number;
    /** Completed processes per time unit of elapsedTime */
    throughput: number;
    busyTime: number;
    idleTime: number;
    /** Last finish time minus earliest arrival time */
    elapsedTime: number;
    /** End of the last segment */
    makespan: number;
    /** Changes of running process between consecutive busy segments */
    contextSwitches: number;
}

/**
 * Derive the MetricsRecord from a finished registry and its timeline.
 * Pure: neither argument is modified.
 */
export function computeMetrics(registry: ProcessRegistry, segments: readonly GanttSegment[]): MetricsRecord {
    const all = registry.getAll();
    if (all.length === 0) {
        throw new EmptyInputError("Metrics need at least one process");
    }

    const processes: ProcessMetrics[] = all.map(p => {
        if (p.finishTime === null || p.startTime === null) {
            throw new SimulationIncompleteError(`Process "${p.id}" has not finished`, { processId: p.id });
        }
        const turnaroundTime = p.finishTime - p.arrivalTime;
        return {
            id: p.id,
            arrivalTime: p.arrivalTime,
            burstTime: p.burstTime,
            priority: p.priority,
            startTime: p.startTime,
            finishTime: p.finishTime,
            turnaroundTime,
            waitingTime: turnaroundTime - p.burstTime,
            responseTime: p.startTime - p.arrivalTime,
        };
    });

    const [idle, busy] = _.partition(segments, isIdle);
    const busyTime = _.sumBy(busy, durationOf);
    const idleTime = _.sumBy(idle, durationOf);

    const earliestArrival = _.min(processes.map(p => p.arrivalTime)) ?? 0;
    const lastFinish = _.max(processes.map(p => p.finishTime)) ?? 0;
    const elapsedTime = lastFinish - earliestArrival;

    const lastSegment = _.last(segments);

    return {
        processes,
        averageWaitingTime: _.meanBy(processes, p => p.waitingTime),
        averageTurnaroundTime: _.meanBy(processes, p => p.turnaroundTime),
        averageResponseTime: _.meanBy(processes, p => p.responseTime),
        cpuUtilization: elapsedTime > 0 ? busyTime / elapsedTime : 0,
        throughput: elapsedTime > 0 ? processes.length / elapsedTime : 0,
        busyTime,
        idleTime,
        elapsedTime,
        makespan: lastSegment ? lastSegment.end : lastFinish,
        contextSwitches: countContextSwitches(busy),
    };
}

/** Number of adjacent pairs with different process ids (idle segments already removed). */
function countContextSwitches(busy: readonly GanttSegment[]): number {
    let switches = 0;
    for (let i = 1; i < busy.length; i++) {
        if (busy[i].processId !== busy[i - 1].processId) {
            switches++;
        }
    }
    return switches;
}
