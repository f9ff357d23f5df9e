// ============================================================================
// Public API
// ============================================================================

export * from "./kernel/Errors";
export * from "./kernel/Process";
export * from "./kernel/ProcessStatus";
export * from "./kernel/ProcessRegistry";
export * from "./kernel/Readiness";
export * from "./kernel/ReadinessTracker";
export * from "./kernel/SimulationState";
export * from "./kernel/Simulator";
export * from "./kernel/Timeline";
export * from "./config/PolicyConfig";
export * from "./config/Workload";
export * from "./policies";
export * from "./metrics/Metrics";
export * from "./metrics/CsvExport";
export * from "./metrics/Report";
export * from "./analysis/Comparison";
export * from "./workload/Generator";
export * from "./utils/Random";
export { Logger, LogLevel, parseLogLevel } from "./utils/Logger";
export type { LogLevelType, LogSink } from "./utils/Logger";
export { simulate } from "./simulate";
