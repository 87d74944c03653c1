import * as winston from 'winston';

import type { Logger } from './logger';

export interface WinstonLoggerOptions {
    /** Writes JSON lines to this file instead of the console. */
    filename?: string;
    level?: 'error' | 'warn' | 'info' | 'debug';
}

export class WinstonLogger implements Logger {
    constructor(private readonly _winstonLogger: winston.Logger) {}

    info(message: string): void {
        this._winstonLogger.info(message);
    }

    warn(message: string): void {
        this._winstonLogger.warn(message);
    }

    error(message: string): void {
        this._winstonLogger.error(message);
    }
}

export function createWinstonLogger(options: WinstonLoggerOptions = {}): WinstonLogger {
    const transport = options.filename
        ? new winston.transports.File({ filename: options.filename, format: winston.format.json() })
        : new winston.transports.Console({ format: winston.format.simple() });

    return new WinstonLogger(
        winston.createLogger({
            level: options.level ?? 'info',
            transports: [transport],
        })
    );
}
