/**
 * Leveled console logger.
 * The level comes from LOG_LEVEL (ERROR, WARN, INFO, DEBUG) and can be changed
 * at runtime with setLogLevel, e.g. from the --log-level CLI option.
 * setLogFile additionally appends every emitted line to a file (--log-file).
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';
import { format } from 'node:util';

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export const LOG_LEVELS: readonly LogLevel[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

// Lower number = higher priority
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    ERROR: 0,
    WARN: 1,
    INFO: 2,
    DEBUG: 3
};

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

function levelFromEnv(): LogLevel {
    const envLevel = process.env.LOG_LEVEL?.toUpperCase();
    return envLevel && isLogLevel(envLevel) ? envLevel : 'INFO';
}

let currentLevel: LogLevel = levelFromEnv();
let logFile: string | undefined;

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

/**
 * Also write log lines to a file, creating its directory when needed.
 * Pass undefined to stop writing to the file.
 */
export function setLogFile(filePath: string | undefined): void {
    if (filePath) {
        mkdirSync(path.dirname(filePath), { recursive: true });
    }
    logFile = filePath;
}

function shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[currentLevel];
}

function emit(level: LogLevel, consoleFn: (...args: unknown[]) => void, args: unknown[]): void {
    if (!shouldLog(level)) return;
    const header = `[${new Date().toISOString()}] [${level}]`;
    consoleFn(header, ...args);
    if (logFile) {
        appendFileSync(logFile, `${format(header, ...args)}\n`, 'utf-8');
    }
}

export const logger = {
    error: (...args: unknown[]) => emit('ERROR', console.error, args),
    warn: (...args: unknown[]) => emit('WARN', console.warn, args),
    info: (...args: unknown[]) => emit('INFO', console.info, args),
    debug: (...args: unknown[]) => emit('DEBUG', console.debug, args)
};
