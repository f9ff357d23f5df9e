// ============================================================================
// SimulationState — Lifecycle of one Simulator run
// ============================================================================

export const SimulationState = {
    NOT_STARTED: "NOT_STARTED",
    /** A process holds the CPU */
    RUNNING: "RUNNING",
    /** Nothing is ready; the CPU idles until the next event */
    IDLE: "IDLE",
    FINISHED: "FINISHED",
    /** Stopped between steps by the caller */
    ABORTED: "ABORTED",
} as const;

export type SimulationStateType = (typeof SimulationState)[keyof typeof SimulationState];
