import { ContractLogLevel } from './bus-log-config';

import type { BusLogConfig } from './bus-log-config';

const enum LogEnv {
    LogLevel = 'STRBUS_LOG_LEVEL',
    ArgMaxContentLen = 'STRBUS_LOG_ARG_MAX_CONTENT_LEN',
}

export class BusLogConfigImpl implements BusLogConfig {
    protected _level: ContractLogLevel;
    protected _argMaxContentLen: number;

    constructor(private readonly _env: NodeJS.ProcessEnv = process.env) {
        this._level = Math.max(ContractLogLevel.None, this.getLevelFromEnv());
        this._argMaxContentLen = Math.max(-1, this.getArgMaxContentLenFromEnv());
    }

    protected getLevelFromEnv(): number {
        const levelAny = this._env[LogEnv.LogLevel];
        if (levelAny !== undefined) {
            let level = Number(levelAny);
            if (Number.isNaN(level)) {
                return -1;
            }
            level = Math.min(level, ContractLogLevel.Max);
            level = Math.max(level, ContractLogLevel.None);
            return level;
        }
        return -1;
    }

    protected getArgMaxContentLenFromEnv(): number {
        const argMaxContentLenAny = this._env[LogEnv.ArgMaxContentLen];
        if (argMaxContentLenAny !== undefined) {
            const argMaxContentLen = Number(argMaxContentLenAny);
            return Number.isNaN(argMaxContentLen) ? -1 : argMaxContentLen;
        }
        return -1;
    }

    get level(): ContractLogLevel {
        return this._level;
    }

    set level(level: ContractLogLevel) {
        this._env[LogEnv.LogLevel] = level.toString();
        this._level = level;
    }

    set argMaxContentLen(argMaxContentLen: number) {
        this._env[LogEnv.ArgMaxContentLen] = argMaxContentLen.toString();
        this._argMaxContentLen = argMaxContentLen;
    }

    get argMaxContentLen(): number {
        return this._argMaxContentLen;
    }
}

/**
 * Joins wire strings for a log line, cutting each one to `argMaxContentLen` characters when it is >= 0.
 */
export function formatLogArgs(config: BusLogConfig, args: readonly string[]): string {
    const max = config.argMaxContentLen;
    return args.map((arg) => (max >= 0 && arg.length > max ? `${arg.substring(0, max)}...` : arg)).join(', ');
}
