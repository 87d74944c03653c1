import { BrokerImpl } from '@strbus/universal';

import { WsBrokerServerFactory } from './ws-broker-server-factory';

import type { WsServerFactory } from '../utils/ws-socket';
import type { JsonLike, Logger } from '@strbus/universal';

export interface WebSocketBrokerContext {
    json?: JsonLike;
    logger?: Logger;
    createServer?: WsServerFactory;
}

/**
 * Broker accepting peers over WebSocket once `connect` is called with the port to listen on.
 */
export function createWebSocketBroker(ctx: WebSocketBrokerContext = {}): BrokerImpl {
    const serverFactory = new WsBrokerServerFactory(ctx.json ?? JSON, ctx.logger, ctx.createServer);
    return new BrokerImpl(serverFactory, ctx.logger);
}
