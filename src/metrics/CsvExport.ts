// ============================================================================
// CsvExport — Metrics and Gantt segments as CSV text
// ============================================================================

import { MetricsRecord } from "./Metrics";
import { GanttSegment } from "../kernel/Timeline";

type Cell = string | number;

const METRICS_HEADER = ["id", "arrival", "burst", "priority", "start", "finish", "waiting", "turnaround", "response"];
const SEGMENTS_HEADER = ["process", "start", "end"];

/** Quote a field when it holds a comma, quote or line break. */
export function escapeCsvField(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

/** Numbers are rounded to 4 decimals, integers print without a fraction. */
function formatCell(cell: Cell): string {
    if (typeof cell === "number") {
        return String(Math.round(cell * 10000) / 10000);
    }
    return escapeCsvField(cell);
}

function toLines(rows: readonly Cell[][]): string[] {
    return rows.map(row => row.map(formatCell).join(","));
}

/**
 * Per-process table, a blank line, then `metric,value` rows.
 * Ends with a newline.
 */
export function metricsToCsv(metrics: MetricsRecord): string {
    const processRows: Cell[][] = metrics.processes.map(p => [
        p.id,
        p.arrivalTime,
        p.burstTime,
        p.priority,
        p.startTime,
        p.finishTime,
        p.waitingTime,
        p.turnaroundTime,
        p.responseTime,
    ]);

    const aggregateRows: Cell[][] = [
        ["metric", "value"],
        ["average_waiting_time", metrics.averageWaitingTime],
        ["average_turnaround_time", metrics.averageTurnaroundTime],
        ["average_response_time", metrics.averageResponseTime],
        ["cpu_utilization", metrics.cpuUtilization],
        ["throughput", metrics.throughput],
        ["busy_time", metrics.busyTime],
        ["idle_time", metrics.idleTime],
        ["elapsed_time", metrics.elapsedTime],
        ["makespan", metrics.makespan],
        ["context_switches", metrics.contextSwitches],
    ];

    return [
        ...toLines([METRICS_HEADER, ...processRows]),
        "",
        ...toLines(aggregateRows),
    ].join("\n") + "\n";
}

export function segmentsToCsv(segments: readonly GanttSegment[]): string {
    const rows: Cell[][] = segments.map(s => [s.processId, s.start, s.end]);
    return toLines([SEGMENTS_HEADER, ...rows]).join("\n") + "\n";
}
