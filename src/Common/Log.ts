/**
 * Returns the current timestamp in ISO format.
 * @example
 * const ts = GetTimestamp(); // '2025-06-24T12:34:56.789Z'
 */
export function GetTimestamp(): string {
    return new Date().toISOString();
}

/**
 * Log levels for application logging.
 */
export enum LogLevel {
    Critical = 'CRITICAL',
    Error = 'ERROR',
    Warning = 'WARNING',
    Info = 'INFO',
    Debug = 'DEBUG',
}

/** Level names accepted from configuration files. */
export type LogLevelName = `debug` | `info` | `warn` | `error`;

const SEVERITY: Record<LogLevel, number> = {
    [LogLevel.Critical]: 4,
    [LogLevel.Error]: 3,
    [LogLevel.Warning]: 2,
    [LogLevel.Info]: 1,
    [LogLevel.Debug]: 0,
};

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.Debug,
    info: LogLevel.Info,
    warn: LogLevel.Warning,
    error: LogLevel.Error,
};

let _minimumLevel: LogLevel = LogLevel.Info;

function isLevelName(level: LogLevel | LogLevelName): level is LogLevelName {
    return Object.prototype.hasOwnProperty.call(LEVEL_BY_NAME, level);
}

/**
 * Sets the least severe level that still reaches the console.
 * @param level LogLevel | LogLevelName - Level or configuration name ('debug', 'info', 'warn', 'error')
 */
export function SetLogLevel(level: LogLevel | LogLevelName): void {
    _minimumLevel = isLevelName(level) ? LEVEL_BY_NAME[level] : level;
}

/** Returns the currently active minimum level. */
export function GetLogLevel(): LogLevel {
    return _minimumLevel;
}

/**
 * Logs a message at the specified log level, prepending a timestamp and source.
 * @param level LogLevel - Level of the log
 * @param message string - Message to log
 * @param from string - Source identifier (class or module)
 * @param context string - Optional context, e.g. resource type and identity
 * @example
 * log(LogLevel.Info, 'Issue #12 saved', 'Resource');
 */
export function log(level: LogLevel, message: string, from: string, context?: string): void {
    if (SEVERITY[level] < SEVERITY[_minimumLevel]) {
        return;
    }
    const timestamp = GetTimestamp();
    const body = context ? `[${context}] ${message}` : message;
    const formatted = `[${timestamp}] [${from}] ${body}`;
    const logger = console;

    switch (level) {
        case LogLevel.Critical:
        case LogLevel.Error:
            logger.error(formatted);
            break;
        case LogLevel.Warning:
            logger.warn(formatted);
            break;
        case LogLevel.Info:
            logger.info(formatted);
            break;
        case LogLevel.Debug:
            logger.debug(formatted);
            break;
    }
}

/**
 * Shorthands per level.
 */
export namespace log {
    /** Logs a critical level message. */
    export function critical(message: string, from: string, context?: string): void {
        log(LogLevel.Critical, message, from, context);
    }

    /** Logs an error level message. */
    export function error(message: string, from: string, context?: string): void {
        log(LogLevel.Error, message, from, context);
    }

    /** Logs a warning level message. */
    export function warning(message: string, from: string, context?: string): void {
        log(LogLevel.Warning, message, from, context);
    }

    /** Logs an informational level message. */
    export function info(message: string, from: string, context?: string): void {
        log(LogLevel.Info, message, from, context);
    }

    /** Logs a debug level message. */
    export function debug(message: string, from: string, context?: string): void {
        log(LogLevel.Debug, message, from, context);
    }
}
