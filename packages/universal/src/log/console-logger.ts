import type { Logger } from './logger';

export class ConsoleLogger implements Logger {
    constructor(private readonly _prefix?: string) {}

    info(message: string): void {
        console.info(this._format(message));
    }

    warn(message: string): void {
        console.warn(this._format(message));
    }

    error(message: string): void {
        console.error(this._format(message));
    }

    private _format(message: string): string {
        return this._prefix ? `${this._prefix} ${message}` : message;
    }
}
