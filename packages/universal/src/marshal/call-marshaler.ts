import { isVoidKind } from '../codec/value-kind';
import { ArgumentCountError } from '../errors';

import type { CodecRegistry } from '../codec/codec-registry';
import type { AnyValueKind } from '../codec/value-kind';

/**
 * Reply text of a method declared with a `Void` return kind.
 */
export const VOID_REPLY = '';

function checkCount(member: string, kinds: readonly AnyValueKind[], received: number): void {
    if (kinds.length !== received) {
        throw new ArgumentCountError(member, kinds.length, received);
    }
}

/**
 * Converts call arguments to their wire strings, in declaration order.
 * Codec failures are not caught.
 */
export function marshalArgs(
    codecs: CodecRegistry,
    member: string,
    kinds: readonly AnyValueKind[],
    values: readonly unknown[]
): string[] {
    checkCount(member, kinds, values.length);
    return kinds.map((kind, index) => codecs.lookup(kind).encode(values[index]));
}

export function unmarshalArgs(
    codecs: CodecRegistry,
    member: string,
    kinds: readonly AnyValueKind[],
    texts: readonly string[]
): unknown[] {
    checkCount(member, kinds, texts.length);
    return kinds.map((kind, index) => codecs.lookup(kind).decode(texts[index]));
}

export function wrapReturn(codecs: CodecRegistry, kind: AnyValueKind, value: unknown): string {
    if (isVoidKind(kind)) {
        return VOID_REPLY;
    }
    return codecs.lookup(kind).encode(value);
}

export function unwrapReturn(codecs: CodecRegistry, kind: AnyValueKind, text: string): unknown {
    if (isVoidKind(kind)) {
        return undefined;
    }
    return codecs.lookup(kind).decode(text);
}
