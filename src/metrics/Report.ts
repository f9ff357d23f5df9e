// ============================================================================
// Report — Console report for one simulation result
// ============================================================================

import _ from "lodash";
import { SimulationResult } from "../kernel/Simulator";
import { durationOf, isIdle } from "../kernel/Timeline";

/** Longest bar drawn in the per-process section. */
const MAX_BAR = 30;

/**
 * Human-readable summary: Gantt listing, per-process busy bars and
 * aggregates. Lines are joined with "\n", no trailing newline.
 */
export function formatReport(result: SimulationResult): string {
    const { metrics, segments } = result;
    const lines: string[] = [];

    lines.push(`--- ⚙️ ${result.policy} ---`);

    lines.push("Gantt:");
    for (const segment of segments) {
        const name = isIdle(segment) ? "(idle)" : segment.processId;
        lines.push(`  ${String(segment.start).padStart(4)} - ${String(segment.end).padEnd(4)} ${name}`);
    }

    lines.push("Processes:");
    const idWidth = Math.max(2, ...metrics.processes.map(p => p.id.length));
    const busyById = _.groupBy(segments.filter(s => !isIdle(s)), s => s.processId);
    const longest = Math.max(1, ...metrics.processes.map(p => p.burstTime));
    for (const p of metrics.processes) {
        const busy = _.sumBy(busyById[p.id] ?? [], durationOf);
        const bar = "█".repeat(Math.max(1, Math.round((busy / longest) * MAX_BAR)));
        lines.push(
            `  ${p.id.padEnd(idWidth)} ${bar} ` +
            `burst=${p.burstTime} wait=${p.waitingTime} turnaround=${p.turnaroundTime} response=${p.responseTime}`
        );
    }

    lines.push("Summary:");
    lines.push(`  Average waiting time:    ${metrics.averageWaitingTime.toFixed(2)}`);
    lines.push(`  Average turnaround time: ${metrics.averageTurnaroundTime.toFixed(2)}`);
    lines.push(`  Average response time:   ${metrics.averageResponseTime.toFixed(2)}`);
    lines.push(`  CPU utilization:         ${(metrics.cpuUtilization * 100).toFixed(2)}%`);
    lines.push(`  Throughput:              ${metrics.throughput.toFixed(4)} processes/unit`);
    lines.push(`  Busy / idle time:        ${metrics.busyTime} / ${metrics.idleTime}`);
    lines.push(`  Context switches:        ${metrics.contextSwitches}`);

    return lines.join("\n");
}
