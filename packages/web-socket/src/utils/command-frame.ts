import { isBusCommand } from '@strbus/universal';

import type { BusCommand, JsonLike } from '@strbus/universal';
import type { RawData } from 'ws';

function rawDataToString(data: RawData): string {
    if (Array.isArray(data)) {
        return Buffer.concat(data).toString('utf8');
    }
    if (Buffer.isBuffer(data)) {
        return data.toString('utf8');
    }
    return Buffer.from(data).toString('utf8');
}

/**
 * Commands travel as one JSON text frame each.
 */
export function encodeCommand(json: JsonLike, command: BusCommand): string {
    return json.stringify(command);
}

export function decodeCommand(json: JsonLike, data: RawData): BusCommand {
    const text = rawDataToString(data);
    const value = json.parse(text);
    if (!isBusCommand(value)) {
        throw new Error(`Frame is not a bus command: ${text.substring(0, 64)}`);
    }
    return value;
}
