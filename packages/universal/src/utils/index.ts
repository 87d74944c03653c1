import type {
    BusAddressLike,
    ConnectOptions,
    ResolvedConnectOptions,
    ResolvedTimeoutOptions,
    TimeoutOptions,
} from '../client/connect-options';

const enum Constants {
    BusTimeout = 2000,
}

export function CheckTimeoutOptions(val?: TimeoutOptions): ResolvedTimeoutOptions {
    return { timeoutDelay: val?.timeoutDelay ?? Constants.BusTimeout };
}

function parseAddress(address: string): ConnectOptions {
    // A URL : 'ws://localhost:8082'
    if (URL.canParse(address)) {
        const url = new URL(address);
        if (url.port) {
            return { host: url.hostname, port: Number(url.port) };
        }
    }
    // A 'hostname:port' pattern : 'localhost:8082'
    const parts = address.split(':');
    if (parts.length === 2 && parts[1] !== '' && Number(parts[1]) >= 0) {
        return { host: parts[0] || undefined, port: Number(parts[1]) };
    }
    throw new Error(`Invalid bus address '${address}', expected 'port', 'host:port' or 'ws://host:port'`);
}

export function CheckConnectOptions(arg1?: BusAddressLike, arg2?: ConnectOptions | string): ResolvedConnectOptions {
    // A port number : 59233, 42153
    // A port number + hostname : 59233, '127.0.0.1'
    let options: ConnectOptions = typeof arg1 === 'object' ? arg1 : typeof arg2 === 'object' ? arg2 : {};
    if (typeof arg1 === 'number' || (typeof arg1 === 'string' && /^\d+$/.test(arg1))) {
        options = { ...options, port: Number(arg1), host: typeof arg2 === 'string' ? arg2 : options.host };
    } else if (typeof arg1 === 'string') {
        options = { ...options, ...parseAddress(arg1) };
    }
    // do no return the caller's object
    return {
        host: options.host,
        port: options.port,
        timeoutDelay: options.timeoutDelay ?? Constants.BusTimeout,
    };
}
