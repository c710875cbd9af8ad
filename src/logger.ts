/**
 * Structured logger based on pino. Output goes to stderr so that rendered
 * certificate output on stdout stays clean.
 */

import pino from 'pino';
import type { LogLevel } from './config';

const baseLogger = pino(
    {
        name: 'cert-tree',
        level: 'warn',
        base: undefined,
        formatters: {
            level: label => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
);

export interface Logger {
    debug: (message: string, data?: Record<string, unknown>) => void;
    info: (message: string, data?: Record<string, unknown>) => void;
    warn: (message: string, data?: Record<string, unknown>) => void;
    error: (message: string, data?: Record<string, unknown>) => void;
}

/**
 * Applies to every logger created by {@link createLogger}
 */
export function setLogLevel(level: LogLevel): void {
    baseLogger.level = level;
}

export function getLogLevel(): string {
    return baseLogger.level;
}

/**
 * Create a logger for a specific component
 */
export function createLogger(component: string): Logger {
    return {
        debug: (message, data) => baseLogger.debug({ component, ...data }, message),
        info: (message, data) => baseLogger.info({ component, ...data }, message),
        warn: (message, data) => baseLogger.warn({ component, ...data }, message),
        error: (message, data) => baseLogger.error({ component, ...data }, message),
    };
}
