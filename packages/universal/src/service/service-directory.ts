import { AccessFacade, attachStub } from './access-facade';

import type { BusConnection } from '../bus/bus-connection';
import type { Logger } from '../log/logger';
import type { ImportStub } from './import-stub';
import type { AnyServiceDescriptor } from './service-descriptor';

export type ConnectFailure = 'not-registered' | 'wrong-instance' | 'already-connected';

export type ConnectResult =
    | { readonly connected: true }
    | { readonly connected: false; readonly failure: ConnectFailure; readonly message: string };

/**
 * What `connectService` needs from a service definition.
 */
export interface ConnectableService {
    readonly descriptor: AnyServiceDescriptor;
    readonly connection: BusConnection;
    readonly logger?: Logger;
    createImportStub(): ImportStub;
}

export function isServiceRegistered(serviceName: string, connection: BusConnection): Promise<boolean> {
    return connection.isRegistered(serviceName);
}

/**
 * Resolves once `serviceName` has an owner on the bus. There is no timeout.
 */
export async function waitForServiceRegistration(serviceName: string, connection: BusConnection): Promise<void> {
    if (await connection.isRegistered(serviceName)) {
        return;
    }
    await new Promise<void>((resolve, reject) => {
        const watch = connection.watchRegistration(serviceName, () => {
            watch.cancel();
            resolve();
        });
        // The name may have been taken between the first check and the watch
        connection.isRegistered(serviceName).then(
            (registered) => {
                if (registered) {
                    watch.cancel();
                    resolve();
                }
            },
            (error: unknown) => {
                watch.cancel();
                reject(error);
            }
        );
    });
}

function connectFailure(logger: Logger | undefined, failure: ConnectFailure, message: string): ConnectResult {
    logger?.warn(`[ServiceDirectory] ${message}`);
    return { connected: false, failure, message };
}

/**
 * Attaches a new import stub to `facade`. Failures are reported in the result, never thrown:
 * the service must be registered, the facade must come from the same definition and must not be
 * connected yet.
 */
export async function connectService(service: ConnectableService, facade: object): Promise<ConnectResult> {
    const { descriptor, connection, logger } = service;
    if (!(await connection.isRegistered(descriptor.serviceName))) {
        return connectFailure(logger, 'not-registered', `Service ${descriptor.serviceName} is not registered`);
    }
    if (!(facade instanceof AccessFacade) || facade.descriptor !== descriptor) {
        return connectFailure(logger, 'wrong-instance', `Wrong instance to connect to ${descriptor.serviceName}`);
    }
    if (facade.isConnected) {
        return connectFailure(
            logger,
            'already-connected',
            `Can't reconnect previously connected service ${descriptor.serviceName}`
        );
    }
    facade[attachStub](service.createImportStub());
    return { connected: true };
}

/**
 * Waits for the registration, then connects. The service may go away in between.
 */
export async function waitAndConnectService(service: ConnectableService, facade: object): Promise<ConnectResult> {
    await waitForServiceRegistration(service.descriptor.serviceName, service.connection);
    return connectService(service, facade);
}
