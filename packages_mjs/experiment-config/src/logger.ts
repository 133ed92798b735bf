/**
 * Pipeline logger.
 *
 * One process-wide threshold shared by every scoped logger. The threshold
 * starts from EXPFLOW_LOG_LEVEL and the prefix from EXPFLOW_LOG_PREFIX.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

type EmitLevel = Exclude<LogLevel, 'silent'>;

export interface Logger {
    error(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
    trace(message: string, ...args: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
    trace: 5
};

// trace has no console method of its own
const SINKS: Record<EmitLevel, (message: string, ...args: unknown[]) => void> = {
    error: (message, ...args) => console.error(message, ...args),
    warn: (message, ...args) => console.warn(message, ...args),
    info: (message, ...args) => console.info(message, ...args),
    debug: (message, ...args) => console.debug(message, ...args),
    trace: (message, ...args) => console.log(message, ...args)
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    const normalized = value?.trim().toLowerCase();
    if (!normalized) return undefined;
    return Object.keys(SEVERITY).find((level): level is LogLevel => level === normalized);
}

let threshold: LogLevel = parseLogLevel(process.env.EXPFLOW_LOG_LEVEL) ?? 'info';

const ROOT_PREFIX = process.env.EXPFLOW_LOG_PREFIX || '[expflow]';

export function getLogLevel(): LogLevel {
    return threshold;
}

/** Unknown level names are ignored. */
export function setLogLevel(level: string): void {
    threshold = parseLogLevel(level) ?? threshold;
}

function createLogger(prefix: string): Logger {
    const emit = (level: EmitLevel) => (message: string, ...args: unknown[]): void => {
        if (SEVERITY[level] <= SEVERITY[threshold]) {
            SINKS[level](`${prefix} ${message}`, ...args);
        }
    };

    return {
        error: emit('error'),
        warn: emit('warn'),
        info: emit('info'),
        debug: emit('debug'),
        trace: emit('trace')
    };
}

const loggers = new Map<string, Logger>();

/** Logger whose messages carry `[expflow][scope]`. Cached per scope. */
export function getLogger(scope?: string): Logger {
    const prefix = scope ? `${ROOT_PREFIX}[${scope}]` : ROOT_PREFIX;
    let logger = loggers.get(prefix);
    if (!logger) {
        logger = createLogger(prefix);
        loggers.set(prefix, logger);
    }
    return logger;
}
