export interface NetOptions {
    port?: number;
    host?: string;
}

export interface TimeoutOptions {
    timeoutDelay?: number;
}

export interface ConnectOptions extends NetOptions, TimeoutOptions {}

export type CloseOptions = TimeoutOptions;

/**
 * Options once defaults are applied.
 */
export interface ResolvedConnectOptions extends NetOptions {
    timeoutDelay: number;
}

export interface ResolvedTimeoutOptions {
    timeoutDelay: number;
}

/**
 * Accepted forms of a bus address: a port, `host:port`, a `ws://host:port` URL or an options object.
 */
export type BusAddressLike = ConnectOptions | string | number;
