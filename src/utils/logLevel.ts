import { LogLevel } from 'crawlee';

const LEVELS: Readonly<Record<string, LogLevel>> = {
    OFF: LogLevel.OFF,
    ERROR: LogLevel.ERROR,
    SOFT_FAIL: LogLevel.SOFT_FAIL,
    WARNING: LogLevel.WARNING,
    INFO: LogLevel.INFO,
    DEBUG: LogLevel.DEBUG,
    PERF: LogLevel.PERF,
};

/** CRAWLEE_LOG_LEVEL name → level; blank or unknown names mean INFO. */
export function resolveLogLevel(name: string, verbose = false): LogLevel {
    if (verbose) return LogLevel.DEBUG;
    return LEVELS[name.trim().toUpperCase()] ?? LogLevel.INFO;
}
