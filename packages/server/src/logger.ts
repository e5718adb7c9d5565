/**
 * Leveled console logging.
 *
 * @packageDocumentation
 */

import pc from 'picocolors';

/**
 * Log levels, from least to most verbose.
 */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Where log lines are written. `console` satisfies it.
 */
export interface LogSink {
    log(message: string): void;
    error(message: string): void;
}

/**
 * A logger that drops messages above its level.
 */
export interface Logger {
    readonly level: LogLevel;
    error(message: string): void;
    warn(message: string): void;
    info(message: string): void;
    debug(message: string): void;
}

/**
 * Checks whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

const LABELS: Record<LogLevel, string> = {
    error: pc.red('error'),
    warn: pc.yellow('warn '),
    info: pc.cyan('info '),
    debug: pc.gray('debug'),
};

/**
 * Creates a logger writing to `sink`.
 *
 * Errors and warnings go to `sink.error`, everything else to `sink.log`.
 *
 * @param level - Most verbose level to print
 * @param sink - Output target
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug');
 * logger.debug('Matched [GET] /api/users/:id');
 * ```
 */
export function createLogger(
    level: LogLevel = 'info',
    sink: LogSink = console,
): Logger {
    const threshold = LOG_LEVELS.indexOf(level);

    const write = (messageLevel: LogLevel, message: string): void => {
        if (LOG_LEVELS.indexOf(messageLevel) > threshold) return;
        const line = `  ${LABELS[messageLevel]} ${message}`;
        if (messageLevel === 'error' || messageLevel === 'warn') {
            sink.error(line);
        } else {
            sink.log(line);
        }
    };

    return {
        level,
        error: (message) => write('error', message),
        warn: (message) => write('warn', message),
        info: (message) => write('info', message),
        debug: (message) => write('debug', message),
    };
}

/**
 * A logger that discards everything.
 */
export const silentLogger: Logger = createLogger('error', {
    log: () => {},
    error: () => {},
});
