/**
 * Where a service lives on the bus.
 */
export interface BusAddress {
    readonly serviceName: string;
    readonly objectPath: string;
    readonly interfaceName: string;
}

/**
 * Object registered at a path. The connection routes incoming calls of its interface to `invoke`,
 * whose failures become error replies.
 */
export interface BusObject {
    readonly interfaceName: string;
    invoke(member: string, args: readonly string[]): string | Promise<string>;
}

export type BusSignalListener = (args: string[]) => void;

export interface BusWatch {
    cancel(): void;
}

/**
 * Primitives a service proxy needs from a bus connection.
 * Every argument and return value crosses it as a string.
 */
export interface BusConnection {
    readonly name: string;

    /** Throws `RegistrationError` when the path is already taken on this connection. */
    registerObject(objectPath: string, object: BusObject): void;
    unregisterObject(objectPath: string): void;
    /** Rejects with `RegistrationError` when another peer owns the name. */
    registerName(serviceName: string): Promise<void>;

    isRegistered(serviceName: string): Promise<boolean>;
    watchRegistration(serviceName: string, onRegistered: () => void): BusWatch;

    /** Rejects with `CallError` on any bus-level failure, including an error raised by the remote object. */
    call(address: BusAddress, member: string, args: readonly string[]): Promise<string>;
    emit(objectPath: string, interfaceName: string, member: string, args: readonly string[]): void;
    subscribe(address: BusAddress, member: string, listener: BusSignalListener): BusWatch;
}
