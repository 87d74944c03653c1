import type { RawData } from 'ws';

/**
 * The part of a `ws` WebSocket the transports use. `WebSocket` from 'ws' fits.
 */
export interface WsSocket {
    readonly url?: string;
    send(data: string): void;
    close(): void;

    on(event: 'open' | 'close', listener: () => void): unknown;
    on(event: 'message', listener: (data: RawData) => void): unknown;
    on(event: 'error', listener: (error: Error) => void): unknown;

    off(event: 'open' | 'close', listener: () => void): unknown;
    off(event: 'message', listener: (data: RawData) => void): unknown;
    off(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * The part of a `ws` WebSocketServer the broker server uses.
 */
export interface WsServerLike {
    close(cb?: (error?: Error) => void): void;
    removeAllListeners(): unknown;

    on(event: 'connection', listener: (socket: WsSocket) => void): unknown;
    on(event: 'close' | 'listening', listener: () => void): unknown;
    on(event: 'error', listener: (error: Error) => void): unknown;

    off(event: 'connection', listener: (socket: WsSocket) => void): unknown;
    off(event: 'close' | 'listening', listener: () => void): unknown;
    off(event: 'error', listener: (error: Error) => void): unknown;
}

export type WsSocketFactory = (url: string) => WsSocket;
export type WsServerFactory = (host: string, port: number) => WsServerLike;
