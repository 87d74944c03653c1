declare const kindValue: unique symbol;

/**
 * Opaque tag naming the type of a value that crosses the bus.
 * `T` exists only for the compiler; the codec registry keys on `id`.
 */
export interface ValueKind<T> {
    readonly id: string;
    readonly [kindValue]?: T;
}

export type AnyValueKind = ValueKind<unknown>;

export type KindValue<K> = K extends ValueKind<infer T> ? T : never;

export type KindValues<P extends readonly AnyValueKind[]> = {
    -readonly [I in keyof P]: KindValue<P[I]>;
};

export function defineKind<T>(id: string): ValueKind<T> {
    return Object.freeze({ id });
}

export const Int = defineKind<number>('int');
export const Double = defineKind<number>('double');
export const Str = defineKind<string>('string');
export const Bool = defineKind<boolean>('bool');

/**
 * Return kind of methods without a result. Has no codec.
 */
export const Void = defineKind<void>('void');

export function isVoidKind(kind: AnyValueKind): boolean {
    return kind.id === Void.id;
}
