import type { AnyValueKind, KindValue, KindValues } from '../codec/value-kind';

export interface MethodSignature<P extends readonly AnyValueKind[], R extends AnyValueKind> {
    readonly params: P;
    readonly returns: R;
    /** Const qualifier of the method. Informational only, calls travel the same way. */
    readonly constant: boolean;
}

export interface NotificationSignature<P extends readonly AnyValueKind[]> {
    readonly params: P;
}

export type AnyMethodSignature = MethodSignature<readonly AnyValueKind[], AnyValueKind>;
export type AnyNotificationSignature = NotificationSignature<readonly AnyValueKind[]>;

export type MethodTable = Record<string, AnyMethodSignature>;
export type NotificationTable = Record<string, AnyNotificationSignature>;

export interface MethodOptions {
    constant?: boolean;
}

/**
 * Declares a method taking `params` in order and returning `returns` (`Void` for none).
 *
 * @example
 * const methods = { add: method([Int, Int], Int), reset: method([], Void) };
 */
export function method<P extends AnyValueKind[], R extends AnyValueKind>(
    params: [...P],
    returns: R,
    options: MethodOptions = {}
): MethodSignature<P, R> {
    return { params, returns, constant: options.constant ?? false };
}

export function notification<P extends AnyValueKind[]>(params: [...P]): NotificationSignature<P> {
    return { params };
}

/** Method as written by the implementation: plain or async result. */
export type LocalMethod<S extends AnyMethodSignature> = (
    ...args: KindValues<S['params']>
) => KindValue<S['returns']> | Promise<KindValue<S['returns']>>;

/** Method as seen through the access facade. */
export type RemoteMethod<S extends AnyMethodSignature> = (
    ...args: KindValues<S['params']>
) => Promise<KindValue<S['returns']>>;

export type NotificationListener<S extends AnyNotificationSignature> = (...args: KindValues<S['params']>) => void;

export type LocalMethods<M extends MethodTable> = {
    [K in keyof M]: LocalMethod<M[K]>;
};

export type RemoteMethods<M extends MethodTable> = {
    [K in keyof M]: RemoteMethod<M[K]>;
};

/**
 * What the export adapter needs from an implementation emitting notifications.
 * Node's `EventEmitter` fits.
 */
export interface NotificationSource {
    on(event: string, listener: (...args: unknown[]) => void): unknown;
}

export type ServiceImplementation<M extends MethodTable, N extends NotificationTable> = LocalMethods<M> &
    (keyof N extends never ? unknown : NotificationSource);
