// ============================================================================
// Timeline — Gantt segments and ready-queue snapshots produced by a run
// ============================================================================

import { IDLE_ID, ProcessId } from "./Process";

/** One interval of the CPU timeline. `end > start`. */
export interface GanttSegment {
    /** Process id, or IDLE_ID */
    processId: ProcessId;
    start: number;
    end: number;
}

/** Ready set observed at a decision instant (ids ascending). */
export interface ReadySnapshot {
    time: number;
    ready: ProcessId[];
}

export function isIdle(segment: GanttSegment): boolean {
    return segment.processId === IDLE_ID;
}

export function durationOf(segment: GanttSegment): number {
    return segment.end - segment.start;
}

/** Segments belonging to one process, in timeline order. */
export function segmentsOf(segments: readonly GanttSegment[], id: ProcessId): GanttSegment[] {
    return segments.filter(s => s.processId === id);
}
