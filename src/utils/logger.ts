import pino from 'pino';
import type { LogLevel } from '../types/index.js';

export type Logger = pino.Logger;

/**
 * Create the process logger: pretty, colourised lines by default, raw JSON
 * with `jsonLogs`. Called once at CLI startup; components receive it through
 * their HarvestContext.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        return pino({ level });
    }

    return pino({
        level,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'HH:MM:ss',
                ignore: 'pid,hostname',
            },
        },
    });
}
