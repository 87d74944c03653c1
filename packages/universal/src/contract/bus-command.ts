import type { BusPeer } from './bus-peer';

export enum BusCommandKind {
    Handshake = 'HAN',
    Shutdown = 'SHT',
    RequestName = 'RQN',
    NameHasOwner = 'NHO',
    Reply = 'REP',
    NameOwnerChanged = 'NOC',
    MethodCall = 'MCA',
    MethodReturn = 'MRE',
    Error = 'ERR',
    Signal = 'SIG',
}

/**
 * Names carried by error replies produced by the bus itself rather than by a service.
 */
export enum BusErrorName {
    ServiceUnknown = 'ServiceUnknown',
    UnknownObject = 'UnknownObject',
    UnknownInterface = 'UnknownInterface',
    UnknownMethod = 'UnknownMethod',
    Failed = 'Failed',
    NoReply = 'NoReply',
    Disconnected = 'Disconnected',
    NotConnected = 'NotConnected',
}

export interface HandshakeCommand {
    kind: BusCommandKind.Handshake;
    peer: BusPeer;
}

export interface ShutdownCommand {
    kind: BusCommandKind.Shutdown;
    peer: BusPeer;
}

export interface RequestNameCommand {
    kind: BusCommandKind.RequestName;
    peer: BusPeer;
    requestId: string;
    serviceName: string;
}

export interface NameHasOwnerCommand {
    kind: BusCommandKind.NameHasOwner;
    peer: BusPeer;
    requestId: string;
    serviceName: string;
}

/**
 * Answer of the broker to `RequestName` and `NameHasOwner`.
 */
export interface ReplyCommand {
    kind: BusCommandKind.Reply;
    requestId: string;
    target: string;
    result: boolean;
    error?: string;
}

export interface NameOwnerChangedCommand {
    kind: BusCommandKind.NameOwnerChanged;
    serviceName: string;
    /** Peer id of the new owner, absent when the name was released. */
    owner?: string;
}

export interface MethodCallCommand {
    kind: BusCommandKind.MethodCall;
    peer: BusPeer;
    requestId: string;
    destination: string;
    objectPath: string;
    interfaceName: string;
    member: string;
    args: string[];
}

export interface MethodReturnCommand {
    kind: BusCommandKind.MethodReturn;
    requestId: string;
    target: string;
    value: string;
}

export interface ErrorCommand {
    kind: BusCommandKind.Error;
    requestId: string;
    target: string;
    errorName: string;
    message: string;
}

export interface SignalCommand {
    kind: BusCommandKind.Signal;
    peer: BusPeer;
    /** Service names owned by the sender, filled in by the broker. */
    senderNames?: string[];
    objectPath: string;
    interfaceName: string;
    member: string;
    args: string[];
}

export type BusCommand =
    | HandshakeCommand
    | ShutdownCommand
    | RequestNameCommand
    | NameHasOwnerCommand
    | ReplyCommand
    | NameOwnerChangedCommand
    | MethodCallCommand
    | MethodReturnCommand
    | ErrorCommand
    | SignalCommand;

const commandKinds = new Set<string>(Object.values(BusCommandKind));

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Shallow check of a command decoded from a socket frame. Commands carrying arguments
 * must carry them as an array of strings.
 */
export function isBusCommand(value: unknown): value is BusCommand {
    if (
        typeof value !== 'object' ||
        value === null ||
        !('kind' in value) ||
        typeof value.kind !== 'string' ||
        !commandKinds.has(value.kind)
    ) {
        return false;
    }
    if (value.kind === BusCommandKind.MethodCall || value.kind === BusCommandKind.Signal) {
        return 'args' in value && isStringArray(value.args);
    }
    return true;
}
