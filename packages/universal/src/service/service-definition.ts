import { defaultBusRegistry } from '../bus/bus-registry';
import { defaultCodecRegistry } from '../codec/codec-registry';
import { createAccessFacade } from './access-facade';
import { ExportAdapter } from './export-adapter';
import { ImportStub } from './import-stub';
import { createServiceDescriptor } from './service-descriptor';
import {
    connectService,
    isServiceRegistered,
    waitAndConnectService,
    waitForServiceRegistration,
} from './service-directory';

import type { BusConnection } from '../bus/bus-connection';
import type { BusRegistry } from '../bus/bus-registry';
import type { CodecRegistry } from '../codec/codec-registry';
import type { Logger } from '../log/logger';
import type { RemoteService } from './access-facade';
import type { ServiceDescriptor, ServiceSpec } from './service-descriptor';
import type { ConnectableService, ConnectResult } from './service-directory';
import type { MethodTable, NotificationTable, ServiceImplementation } from './signature';

export interface ServiceContext {
    codecs?: CodecRegistry;
    buses?: BusRegistry;
    logger?: Logger;
}

/**
 * Everything one service description gives access to: exporting an implementation,
 * creating access facades and connecting them.
 */
export class ServiceDefinition<M extends MethodTable, N extends NotificationTable> implements ConnectableService {
    public readonly descriptor: ServiceDescriptor<M, N>;
    public readonly logger?: Logger;
    private readonly _codecs: CodecRegistry;
    private readonly _buses: BusRegistry;

    constructor(spec: ServiceSpec<M, N>, ctx: ServiceContext = {}) {
        this._codecs = ctx.codecs ?? defaultCodecRegistry;
        this._buses = ctx.buses ?? defaultBusRegistry;
        this.logger = ctx.logger;
        this.descriptor = createServiceDescriptor(spec, this._codecs);
    }

    /** Connection of the bus the service lives on. Throws `BusNotConfiguredError` when it is not set. */
    get connection(): BusConnection {
        return this._buses.get(this.descriptor.bus);
    }

    async registerService(implementation: ServiceImplementation<M, N>): Promise<ExportAdapter<M, N>> {
        return ExportAdapter.register(this.descriptor, implementation, this.connection, this._codecs, this.logger);
    }

    createServiceInterface(): RemoteService<M, N> {
        return createAccessFacade(this.descriptor, this.logger);
    }

    createImportStub(): ImportStub {
        return new ImportStub(this.descriptor, this.connection, this._codecs, this.logger);
    }

    async isServiceRegistered(): Promise<boolean> {
        return isServiceRegistered(this.descriptor.serviceName, this.connection);
    }

    async waitForServiceRegistration(): Promise<void> {
        return waitForServiceRegistration(this.descriptor.serviceName, this.connection);
    }

    connectService(facade: object): Promise<ConnectResult> {
        return connectService(this, facade);
    }

    waitAndConnectService(facade: object): Promise<ConnectResult> {
        return waitAndConnectService(this, facade);
    }

    /**
     * Creates a facade, waits for the service and connects it. The facade is returned even when
     * connecting failed; `isConnected` tells.
     */
    async createAndConnectService(): Promise<RemoteService<M, N>> {
        const facade = this.createServiceInterface();
        await this.waitAndConnectService(facade);
        return facade;
    }
}

export function defineService<M extends MethodTable, N extends NotificationTable>(
    spec: ServiceSpec<M, N>,
    ctx?: ServiceContext
): ServiceDefinition<M, N> {
    return new ServiceDefinition(spec, ctx);
}

export function registerService<M extends MethodTable, N extends NotificationTable>(
    definition: ServiceDefinition<M, N>,
    implementation: ServiceImplementation<M, N>
): Promise<ExportAdapter<M, N>> {
    return definition.registerService(implementation);
}

export function createServiceInterface<M extends MethodTable, N extends NotificationTable>(
    definition: ServiceDefinition<M, N>
): RemoteService<M, N> {
    return definition.createServiceInterface();
}
