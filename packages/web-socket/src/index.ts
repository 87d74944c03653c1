export type { WebSocketBrokerContext } from './broker/broker-factory';
export type { WebSocketConnectionContext } from './client/connection-factory';
export type { WsServerFactory, WsServerLike, WsSocket, WsSocketFactory } from './utils/ws-socket';

export { createWebSocketBroker } from './broker/broker-factory';
export { WsBrokerClient } from './broker/ws-broker-client';
export { WsBrokerServer } from './broker/ws-broker-server';
export { WsBrokerServerFactory } from './broker/ws-broker-server-factory';
export {
    connectBusesFromEnvironment,
    connectWebSocketBus,
    createWebSocketConnection,
} from './client/connection-factory';
export { WsConnector } from './client/ws-connector';
export { decodeCommand, encodeCommand } from './utils/command-frame';
export * from '@strbus/universal';
