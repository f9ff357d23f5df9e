// ============================================================================
// Logger — Tagged console logging with lazy eval, throttling and delta alerts
// ============================================================================

/**
 * Log levels for filtering console output.
 * Higher value = more severe (ERROR=4 is always shown).
 * TRACE is the most verbose.
 */
export const LogLevel = {
    TRACE: 0,
    DEBUG: 1,
    INFO: 2,
    WARNING: 3,
    ERROR: 4,
} as const;

export type LogLevelType = (typeof LogLevel)[keyof typeof LogLevel];

/** Message source: string or lazy function that is only built when printed. */
export type LogMessage = string | (() => string);

/** Environment variable read once to seed the global level. */
export const LOG_LEVEL_ENV = "CPUSCHED_LOG_LEVEL";

const LEVEL_EMOJI: Record<number, string> = {
    [LogLevel.TRACE]: "🔍",
    [LogLevel.DEBUG]: "🐛",
    [LogLevel.INFO]: "ℹ️",
    [LogLevel.WARNING]: "⚠️",
    [LogLevel.ERROR]: "🛑",
};

const LEVEL_LABELS: Record<number, string> = {
    [LogLevel.TRACE]: "TRACE",
    [LogLevel.DEBUG]: "DEBUG",
    [LogLevel.INFO]: "INFO",
    [LogLevel.WARNING]: "WARN",
    [LogLevel.ERROR]: "ERROR",
};

const LEVEL_NAMES: Record<string, LogLevelType> = {
    TRACE: LogLevel.TRACE,
    DEBUG: LogLevel.DEBUG,
    INFO: LogLevel.INFO,
    WARNING: LogLevel.WARNING,
    WARN: LogLevel.WARNING,
    ERROR: LogLevel.ERROR,
};

/** Resolve a level name ("debug", "WARN", ...) or `undefined` if unknown. */
export function parseLogLevel(name: string): LogLevelType | undefined {
    return LEVEL_NAMES[name.toUpperCase().trim()];
}

/** Receives fully formatted lines. Defaults to console.log. */
export type LogSink = (line: string) => void;

/**
 * Structured logger with:
 * - Level-based filtering (TRACE → ERROR)
 * - Lazy evaluation: pass `() => "expensive " + computation` so the string
 *   is only built when the message passes the level filter
 * - Delta alerts: only log when a keyed value changes
 * - Modulo throttling: log every N-th value of a caller-supplied counter
 *
 * The level and the sink are global (static) so every subsystem logger
 * follows the same `--log-level` setting.
 */
export class Logger {
    /** The subsystem / module tag shown in brackets. */
    private tag: string;

    /** Cached global level. Populated on first access from the environment. */
    private static _cachedLevel?: LogLevelType;

    private static _sink: LogSink = (line) => console.log(line);

    /**
     * Previous values for delta alerting, keyed by `tag:key`.
     * Cleared when it grows past 1000 entries (keys may be per-process).
     */
    private static _deltaCache: Map<string, string> = new Map();

    constructor(tag: string) {
        this.tag = tag;
    }

    // -----------------------------------------------------------------------
    // Public API — each accepts string OR lazy () => string
    // -----------------------------------------------------------------------

    trace(msg: LogMessage): void {
        this.log(LogLevel.TRACE, msg);
    }

    debug(msg: LogMessage): void {
        this.log(LogLevel.DEBUG, msg);
    }

    info(msg: LogMessage): void {
        this.log(LogLevel.INFO, msg);
    }

    warning(msg: LogMessage): void {
        this.log(LogLevel.WARNING, msg);
    }

    warn(msg: LogMessage): void {
        this.log(LogLevel.WARNING, msg);
    }

    error(msg: LogMessage): void {
        this.log(LogLevel.ERROR, msg);
    }

    // -----------------------------------------------------------------------
    // Smart Logging — Delta Alerts & Modulo Throttling
    // -----------------------------------------------------------------------

    /**
     * Delta Alert — only logs if `value` changed since the last call
     * with the same `key`.
     *
     * Example:
     *   log.alert("state", "RUNNING");  // logs first time
     *   log.alert("state", "RUNNING");  // suppressed (same)
     *   log.alert("state", "IDLE");     // logs (changed)
     */
    alert(key: string, value: string, level: LogLevelType = LogLevel.INFO): void {
        if (Logger._deltaCache.size > 1000) {
            Logger._deltaCache.clear();
        }

        const fullKey = `${this.tag}:${key}`;
        if (Logger._deltaCache.get(fullKey) === value) return;
        Logger._deltaCache.set(fullKey, value);
        this.log(level, `[Δ] ${key}: ${value}`);
    }

    /**
     * Modulo Throttle — only logs when `counter` is a multiple of `interval`.
     *
     * Example:
     *   log.throttle(stepCount, 100, () => `t=${time}, ${ready} ready`);
     */
    throttle(counter: number, interval: number, msg: LogMessage, level: LogLevelType = LogLevel.DEBUG): void {
        if (interval <= 0 || counter % interval !== 0) return;
        this.log(level, msg);
    }

    // -----------------------------------------------------------------------
    // Core
    // -----------------------------------------------------------------------

    private log(level: LogLevelType, msg: LogMessage): void {
        if (level < Logger.getLevel()) {
            return;
        }

        const resolved = typeof msg === "function" ? msg() : msg;
        const emoji = LEVEL_EMOJI[level] ?? "";
        const label = LEVEL_LABELS[level] ?? "???";

        Logger._sink(`${emoji} [${label}] [${this.tag}] ${resolved}`);
    }

    // -----------------------------------------------------------------------
    // Global Level Management
    // -----------------------------------------------------------------------

    /**
     * Get the current effective log level. Seeded from CPUSCHED_LOG_LEVEL
     * on first access, INFO when the variable is unset or unknown.
     */
    static getLevel(): LogLevelType {
        if (Logger._cachedLevel !== undefined) {
            return Logger._cachedLevel;
        }
        const fromEnv = process.env[LOG_LEVEL_ENV];
        Logger._cachedLevel = (fromEnv !== undefined ? parseLogLevel(fromEnv) : undefined) ?? LogLevel.INFO;
        return Logger._cachedLevel;
    }

    static setLevel(level: LogLevelType): void {
        Logger._cachedLevel = level;
    }

    /**
     * Parse a level name and apply it. Returns false (level unchanged)
     * when the name is unknown.
     */
    static setLevelByName(name: string): boolean {
        const level = parseLogLevel(name);
        if (level === undefined) {
            return false;
        }
        Logger.setLevel(level);
        return true;
    }

    /** Redirect output (tests capture lines with this). */
    static setSink(sink: LogSink): void {
        Logger._sink = sink;
    }

    static resetSink(): void {
        Logger._sink = (line) => console.log(line);
    }

    /** Clear the delta cache. */
    static resetDeltaCache(): void {
        Logger._deltaCache.clear();
    }
}
