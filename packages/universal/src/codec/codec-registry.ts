import { boolCodec, doubleCodec, intCodec, stringCodec } from './builtin-codecs';
import { Bool, Double, Int, Str } from './value-kind';
import { DefinitionError } from '../errors';

import type { AnyValueKind, ValueKind } from './value-kind';

/**
 * Converts values of one kind to and from their string form on the bus.
 * `decode` throws on text it cannot read.
 */
export interface StringCodec<T> {
    encode(value: T): string;
    decode(text: string): T;
}

export class CodecRegistry {
    private readonly _codecs = new Map<string, StringCodec<unknown>>();
    private _sealed = false;

    static withBuiltins(): CodecRegistry {
        const registry = new CodecRegistry();
        registry.register(Int, intCodec);
        registry.register(Double, doubleCodec);
        registry.register(Str, stringCodec);
        registry.register(Bool, boolCodec);
        return registry;
    }

    get sealed(): boolean {
        return this._sealed;
    }

    register<T>(kind: ValueKind<T>, codec: StringCodec<T>): this {
        if (this._sealed) {
            throw new DefinitionError(`Cannot register a codec for '${kind.id}': the codec registry is sealed`);
        }
        if (this._codecs.has(kind.id)) {
            throw new DefinitionError(`A codec is already registered for '${kind.id}'`);
        }
        this._codecs.set(kind.id, codec);
        return this;
    }

    has(kind: AnyValueKind): boolean {
        return this._codecs.has(kind.id);
    }

    lookup(kind: AnyValueKind): StringCodec<unknown> {
        const codec = this._codecs.get(kind.id);
        if (!codec) {
            throw new DefinitionError(`No codec is registered for '${kind.id}'`);
        }
        return codec;
    }

    seal(): void {
        this._sealed = true;
    }
}

export const defaultCodecRegistry = CodecRegistry.withBuiltins();
