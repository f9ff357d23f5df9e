// ============================================================================
// ProcessStatus — Run-state status of a simulated process
// ============================================================================

export const ProcessStatus = {
    /** Never dispatched in the current run */
    NEW: 0,
    /** Holds the CPU in the most recent segment */
    RUNNING: 1,
    /** Dispatched before, preempted or sliced out, still unfinished */
    WAITING: 2,
    FINISHED: 3,
} as const;

export type ProcessStatusType =
    (typeof ProcessStatus)[keyof typeof ProcessStatus];

export const PROCESS_STATUS_NAMES: Record<ProcessStatusType, string> = {
    [ProcessStatus.NEW]: "NEW",
    [ProcessStatus.RUNNING]: "RUNNING",
    [ProcessStatus.WAITING]: "WAITING",
    [ProcessStatus.FINISHED]: "FINISHED",
};
