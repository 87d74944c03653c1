import { ConversionError } from '../errors';
import { Bool, Double, Int, Str } from './value-kind';

import type { StringCodec } from './codec-registry';

const integerPattern = /^-?\d+$/;

export const intCodec: StringCodec<number> = {
    encode(value) {
        if (!Number.isSafeInteger(value)) {
            throw new ConversionError(Int.id, String(value));
        }
        return value.toString();
    },
    decode(text) {
        const value = Number(text);
        if (!integerPattern.test(text) || !Number.isSafeInteger(value)) {
            throw new ConversionError(Int.id, text);
        }
        return value;
    },
};

export const doubleCodec: StringCodec<number> = {
    encode(value) {
        return value.toString();
    },
    decode(text) {
        const value = Number(text);
        if (text.trim() === '' || (Number.isNaN(value) && text !== 'NaN')) {
            throw new ConversionError(Double.id, text);
        }
        return value;
    },
};

export const stringCodec: StringCodec<string> = {
    encode(value) {
        return value;
    },
    decode(text) {
        return text;
    },
};

export const boolCodec: StringCodec<boolean> = {
    encode(value) {
        return value ? 'true' : 'false';
    },
    decode(text) {
        switch (text) {
            case 'true':
                return true;
            case 'false':
                return false;
            default:
                throw new ConversionError(Bool.id, text);
        }
    },
};

/**
 * Codec for structured values carried as JSON text.
 */
export function jsonCodec<T>(): StringCodec<T> {
    return {
        encode(value) {
            return JSON.stringify(value);
        },
        decode(text) {
            return JSON.parse(text);
        },
    };
}
