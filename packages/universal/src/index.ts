export type { BusBroker, BrokerConnectOptions, BrokerCloseOptions } from './broker/broker';
export type { BrokerClient } from './broker/broker-client';
export type { BrokerServerFactory } from './broker/broker-server-factory';
export type { BrokerServer } from './broker/broker-server';
export type { BusAddress, BusConnection, BusObject, BusSignalListener, BusWatch } from './bus/bus-connection';
export type { BusSelector, CustomBusSelector } from './bus/bus-registry';
export type { BusConnector, BusConnectorClient } from './client/bus-connector';
export type {
    BusAddressLike,
    CloseOptions,
    ConnectOptions,
    NetOptions,
    ResolvedConnectOptions,
    ResolvedTimeoutOptions,
    TimeoutOptions,
} from './client/connect-options';
export type { LocalBus, LocalBusContext } from './client/local-bus';
export type { StringCodec } from './codec/codec-registry';
export type { AnyValueKind, KindValue, KindValues, ValueKind } from './codec/value-kind';
export type { BusEnvironment } from './config/bus-environment';
export type {
    BusCommand,
    ErrorCommand,
    HandshakeCommand,
    MethodCallCommand,
    MethodReturnCommand,
    NameHasOwnerCommand,
    NameOwnerChangedCommand,
    ReplyCommand,
    RequestNameCommand,
    ShutdownCommand,
    SignalCommand,
} from './contract/bus-command';
export type { BusPeer } from './contract/bus-peer';
export type { ErrorCodeType } from './errors';
export type { BusLogConfig } from './log/bus-log-config';
export type { Logger } from './log/logger';
export type { WinstonLoggerOptions } from './log/winston-logger';
export type { RemoteService } from './service/access-facade';
export type { ServiceContext } from './service/service-definition';
export type {
    AnyServiceDescriptor,
    NamedMethodSignature,
    NamedNotificationSignature,
    ServiceDescriptor,
    ServiceSpec,
} from './service/service-descriptor';
export type { ConnectableService, ConnectFailure, ConnectResult } from './service/service-directory';
export type {
    AnyMethodSignature,
    AnyNotificationSignature,
    LocalMethod,
    LocalMethods,
    MethodOptions,
    MethodSignature,
    MethodTable,
    NotificationListener,
    NotificationSignature,
    NotificationSource,
    NotificationTable,
    RemoteMethod,
    RemoteMethods,
    ServiceImplementation,
} from './service/signature';
export type { JsonLike } from './utils/json-like';
export type { UuidProvider } from './utils/uuid';

export { BrokerImpl } from './broker/broker-impl';
export { BusRegistry, busKey, defaultBusRegistry } from './bus/bus-registry';
export { BusConnectionImpl } from './client/bus-connection-impl';
export { BusConnectorImpl } from './client/bus-connector-impl';
export { LocalConnector } from './client/local-connector';
export { createLocalBus } from './client/local-bus';
export { boolCodec, doubleCodec, intCodec, jsonCodec, stringCodec } from './codec/builtin-codecs';
export { CodecRegistry, defaultCodecRegistry } from './codec/codec-registry';
export { Bool, Double, Int, Str, Void, defineKind, isVoidKind } from './codec/value-kind';
export { readBusEnvironment } from './config/bus-environment';
export { BusCommandKind, BusErrorName, isBusCommand } from './contract/bus-command';
export {
    ArgumentCountError,
    BusNotConfiguredError,
    BusProxyError,
    CallError,
    ConversionError,
    DefinitionError,
    ErrorCode,
    NotConnectedError,
    RegistrationError,
    UnknownMethodError,
    getErrorCode,
    hasErrorCode,
} from './errors';
export { ContractLogLevel } from './log/bus-log-config';
export { BusLogConfigImpl, formatLogArgs } from './log/bus-log-config-impl';
export { ConsoleLogger } from './log/console-logger';
export { WinstonLogger, createWinstonLogger } from './log/winston-logger';
export { VOID_REPLY, marshalArgs, unmarshalArgs, unwrapReturn, wrapReturn } from './marshal/call-marshaler';
export { AccessFacade, createAccessFacade } from './service/access-facade';
export { ExportAdapter } from './service/export-adapter';
export { ImportStub } from './service/import-stub';
export {
    ServiceDefinition,
    createServiceInterface,
    defineService,
    registerService,
} from './service/service-definition';
export { createServiceDescriptor } from './service/service-descriptor';
export {
    connectService,
    isServiceRegistered,
    waitAndConnectService,
    waitForServiceRegistration,
} from './service/service-directory';
export { method, notification } from './service/signature';
export { CheckConnectOptions, CheckTimeoutOptions } from './utils';
export { ConnectionState } from './utils/connection-state';
export { DeferredRequest } from './utils/deferred-request';
export { executeInTimeout } from './utils/execute-in-timeout';
export { uuidProvider } from './utils/uuid';
