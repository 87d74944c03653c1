import { BusConnectionImpl, defaultBusRegistry, readBusEnvironment, uuidProvider } from '@strbus/universal';

import { WsConnector } from './ws-connector';

import type { WsSocketFactory } from '../utils/ws-socket';
import type {
    BusAddressLike,
    BusLogConfig,
    BusRegistry,
    BusSelector,
    JsonLike,
    Logger,
    UuidProvider,
} from '@strbus/universal';

export interface WebSocketConnectionContext {
    json?: JsonLike;
    logger?: Logger;
    uuidProvider?: UuidProvider;
    logConfig?: BusLogConfig;
    createSocket?: WsSocketFactory;
}

/**
 * Creates an unconnected bus connection named `name` that reaches its broker over WebSocket.
 */
export function createWebSocketConnection(name: string, ctx: WebSocketConnectionContext = {}): BusConnectionImpl {
    const uuid = ctx.uuidProvider ?? uuidProvider;
    const connector = new WsConnector(uuid, name, ctx.json ?? JSON, ctx.logger, ctx.createSocket);
    return new BusConnectionImpl(connector, uuid, ctx.logConfig, ctx.logger);
}

export async function connectWebSocketBus(
    name: string,
    address: BusAddressLike,
    ctx: WebSocketConnectionContext = {}
): Promise<BusConnectionImpl> {
    const connection = createWebSocketConnection(name, ctx);
    await connection.connect(address);
    return connection;
}

/**
 * Connects to the session and system buses named by the environment and records them in `registry`.
 * Resolves with the buses that were configured.
 */
export async function connectBusesFromEnvironment(
    name: string,
    registry: BusRegistry = defaultBusRegistry,
    env: NodeJS.ProcessEnv = process.env,
    ctx: WebSocketConnectionContext = {}
): Promise<BusSelector[]> {
    const environment = readBusEnvironment(env);
    const connected: BusSelector[] = [];
    for (const selector of ['session', 'system'] as const) {
        const address = environment[selector];
        if (address) {
            registry.set(selector, await connectWebSocketBus(name, address, ctx));
            connected.push(selector);
        }
    }
    ctx.logger?.info(`[WebSocketBus] Connected to [${connected.join(', ')}]`);
    return connected;
}
