import { BusNotConfiguredError } from '../errors';

import type { BusConnection } from './bus-connection';

export interface CustomBusSelector {
    readonly custom: string;
}

export type BusSelector = 'system' | 'session' | CustomBusSelector;

export function busKey(selector: BusSelector): string {
    return typeof selector === 'string' ? selector : `custom:${selector.custom}`;
}

/**
 * Connections known to the process, one per bus selector.
 */
export class BusRegistry {
    private readonly _connections = new Map<string, BusConnection>();

    set(selector: BusSelector, connection: BusConnection): void {
        this._connections.set(busKey(selector), connection);
    }

    get(selector: BusSelector): BusConnection {
        const key = busKey(selector);
        const connection = this._connections.get(key);
        if (!connection) {
            throw new BusNotConfiguredError(key);
        }
        return connection;
    }

    has(selector: BusSelector): boolean {
        return this._connections.has(busKey(selector));
    }

    delete(selector: BusSelector): boolean {
        return this._connections.delete(busKey(selector));
    }
}

export const defaultBusRegistry = new BusRegistry();
