import { expect } from 'chai';
import * as sinon from 'sinon';
import { stubInterface } from 'ts-sinon';

import { flushPromises } from '../test-utils/calculator';
import { BusConnectionImpl } from '../../src/client/bus-connection-impl';
import { createLocalBus } from '../../src/client/local-bus';
import { LocalConnector } from '../../src/client/local-connector';
import { BusErrorName } from '../../src/contract/bus-command';
import { CallError, DefinitionError, RegistrationError } from '../../src/errors';
import { ContractLogLevel } from '../../src/log/bus-log-config';

import type { StubbedInstance } from 'ts-sinon';
import type { BusAddress, BusObject } from '../../src/bus/bus-connection';
import type { LocalBus } from '../../src/client/local-bus';
import type { Logger } from '../../src/log/logger';

const echoAddress: BusAddress = {
    serviceName: 'org.example.Echo',
    objectPath: '/org/example/Echo',
    interfaceName: 'org.example.Echo',
};

function echoObject(): BusObject {
    return {
        interfaceName: 'org.example.Echo',
        invoke: (member, args) => `${member}(${args.join(',')})`,
    };
}

async function callFailure(call: Promise<string>): Promise<CallError> {
    try {
        await call;
    } catch (error) {
        if (error instanceof CallError) {
            return error;
        }
        throw error;
    }
    throw new Error('The call did not fail');
}

describe('bus-connection-impl', () => {
    let counter: number;
    let bus: LocalBus;
    let server: BusConnectionImpl;
    let client: BusConnectionImpl;

    beforeEach(async () => {
        counter = 0;
        bus = createLocalBus({ uuidProvider: () => `id${++counter}` });
        server = await bus.connect('server');
        client = await bus.connect('client');
    });

    afterEach(async () => {
        await client.close();
        await server.close();
    });

    it('should connect through its connector', () => {
        expect(server.connected).to.be.true;
        expect(server.name).to.be.equal('server');
        expect(bus.broker.peerCount).to.be.equal(2);
    });

    describe('objects and names', () => {
        it('should refuse a second object at the same path', () => {
            server.registerObject('/org/example/Echo', echoObject());

            expect(() => server.registerObject('/org/example/Echo', echoObject())).to.throw(
                RegistrationError,
                "Cannot register object at path '/org/example/Echo': path is already in use"
            );
            server.unregisterObject('/org/example/Echo');
            server.registerObject('/org/example/Echo', echoObject());
        });

        it('should register names with the broker', async () => {
            expect(await client.isRegistered('org.example.Echo')).to.be.false;

            await server.registerName('org.example.Echo');

            expect(await client.isRegistered('org.example.Echo')).to.be.true;
            await expect(client.registerName('org.example.Echo')).to.be.rejectedWith(
                RegistrationError,
                "Cannot register service 'org.example.Echo': Name 'org.example.Echo' is already owned by another peer"
            );
        });

        it('should notify watches of the exact name only', async () => {
            const onRegistered = sinon.spy();
            const watch = client.watchRegistration('org.example.Echo', onRegistered);

            await server.registerName('org.example.Other');
            sinon.assert.notCalled(onRegistered);

            await server.registerName('org.example.Echo');
            sinon.assert.calledOnce(onRegistered);

            watch.cancel();
            await client.registerName('org.example.Third');
            sinon.assert.calledOnce(onRegistered);
        });

        it('should not register names without a bus', async () => {
            const idle = new BusConnectionImpl(new LocalConnector(bus.broker, () => 'idle', 'idle'));

            await expect(idle.registerName('org.example.Echo')).to.be.rejectedWith(
                RegistrationError,
                "Cannot register service 'org.example.Echo': connection is closed"
            );
        });
    });

    describe('calls', () => {
        beforeEach(async () => {
            server.registerObject(echoAddress.objectPath, echoObject());
            await server.registerName(echoAddress.serviceName);
        });

        it('should return the reply of the remote object', async () => {
            expect(await client.call(echoAddress, 'echo', ['a', 'b'])).to.be.equal('echo(a,b)');
        });

        it('should report a missing object', async () => {
            const error = await callFailure(client.call({ ...echoAddress, objectPath: '/missing' }, 'echo', []));

            expect(error.busErrorName).to.be.equal(BusErrorName.UnknownObject);
            expect(error.message).to.be.equal("No object at path '/missing'");
        });

        it('should report a wrong interface', async () => {
            const address = { ...echoAddress, interfaceName: 'org.example.Other' };
            const error = await callFailure(client.call(address, 'x', []));

            expect(error.busErrorName).to.be.equal(BusErrorName.UnknownInterface);
        });

        it('should carry the code of a remote service error', async () => {
            server.registerObject('/org/example/Failing', {
                interfaceName: 'org.example.Echo',
                invoke: () => {
                    throw new DefinitionError('broken');
                },
            });

            const address = { ...echoAddress, objectPath: '/org/example/Failing' };
            const error = await callFailure(client.call(address, 'x', []));

            expect(error.busErrorName).to.be.equal('DEFINITION_ERROR');
            expect(error.message).to.be.equal('broken');
        });

        it('should fail pending calls when the callee leaves', async () => {
            server.registerObject('/org/example/Hanging', {
                interfaceName: 'org.example.Echo',
                invoke: () => new Promise<string>(() => undefined),
            });

            const pending = callFailure(client.call({ ...echoAddress, objectPath: '/org/example/Hanging' }, 'x', []));
            await flushPromises();
            await server.close();

            const error = await pending;
            expect(error.busErrorName).to.be.equal(BusErrorName.NoReply);
        });

        it('should fail pending calls when the caller closes', async () => {
            server.registerObject('/org/example/Hanging', {
                interfaceName: 'org.example.Echo',
                invoke: () => new Promise<string>(() => undefined),
            });

            const pending = callFailure(client.call({ ...echoAddress, objectPath: '/org/example/Hanging' }, 'x', []));
            await client.close();

            const error = await pending;
            expect(error.busErrorName).to.be.equal(BusErrorName.Disconnected);
            expect(error.message).to.be.equal("Connection 'client' was closed");
        });

        it('should refuse calls once closed', async () => {
            await client.close();

            const error = await callFailure(client.call(echoAddress, 'echo', []));
            expect(error.busErrorName).to.be.equal(BusErrorName.NotConnected);
        });
    });

    describe('signals', () => {
        beforeEach(async () => {
            await server.registerName(echoAddress.serviceName);
        });

        it('should deliver signals of the subscribed service', () => {
            const listener = sinon.spy();
            client.subscribe(echoAddress, 'ping', listener);

            server.emit(echoAddress.objectPath, echoAddress.interfaceName, 'ping', ['1']);
            server.emit(echoAddress.objectPath, echoAddress.interfaceName, 'pong', ['2']);
            server.emit('/org/example/Other', echoAddress.interfaceName, 'ping', ['3']);

            sinon.assert.calledOnceWithExactly(listener, ['1']);
        });

        it('should ignore the same signal sent by a peer not owning the service', () => {
            const listener = sinon.spy();
            server.subscribe(echoAddress, 'ping', listener);

            client.emit(echoAddress.objectPath, echoAddress.interfaceName, 'ping', ['1']);

            sinon.assert.notCalled(listener);
        });

        it('should keep delivering to other subscribers when a listener throws', () => {
            const failing = sinon.stub().throws(new RangeError('bad argument'));
            const listener = sinon.spy();
            client.subscribe(echoAddress, 'ping', failing);
            client.subscribe(echoAddress, 'ping', listener);

            expect(() => server.emit(echoAddress.objectPath, echoAddress.interfaceName, 'ping', ['x'])).to.not.throw();

            sinon.assert.calledOnceWithExactly(failing, ['x']);
            sinon.assert.calledOnceWithExactly(listener, ['x']);
        });

        it('should stop delivering once the subscription is cancelled', () => {
            const listener = sinon.spy();
            client.subscribe(echoAddress, 'ping', listener).cancel();

            server.emit(echoAddress.objectPath, echoAddress.interfaceName, 'ping', ['1']);

            sinon.assert.notCalled(listener);
        });
    });

    describe('logging', () => {
        let logger: StubbedInstance<Logger>;

        beforeEach(() => {
            logger = stubInterface<Logger>();
        });

        it('should log traffic with arguments cut to the configured length', async () => {
            const logged = createLocalBus({
                uuidProvider: () => `id${++counter}`,
                logConfig: { level: ContractLogLevel.Max, argMaxContentLen: 3 },
                logger,
            });
            const connection = await logged.connect('logged');
            logger.info.resetHistory();

            connection.emit('/org/example/Echo', 'org.example.Echo', 'ping', ['abcdef', 'x']);

            sinon.assert.calledWithExactly(
                logger.info,
                '[BusConnection logged] emit /org/example/Echo org.example.Echo.ping [abc..., x]'
            );
            await connection.close();
        });

        it('should log listeners that fail on a signal', async () => {
            const logged = createLocalBus({ uuidProvider: () => `id${++counter}`, logger });
            const sender = await logged.connect('sender');
            const receiver = await logged.connect('receiver');
            await sender.registerName(echoAddress.serviceName);
            receiver.subscribe(echoAddress, 'ping', () => {
                throw new RangeError('bad argument');
            });

            sender.emit(echoAddress.objectPath, echoAddress.interfaceName, 'ping', ['x']);

            sinon.assert.calledOnceWithExactly(
                logger.error,
                '[BusConnection receiver] Listener of org.example.Echo.ping failed: RangeError: bad argument'
            );
            await receiver.close();
            await sender.close();
        });

        it('should warn about signals emitted without a bus', () => {
            const connector = new LocalConnector(bus.broker, () => 'idle', 'idle');
            const logConfig = { level: ContractLogLevel.None, argMaxContentLen: -1 };
            const idle = new BusConnectionImpl(connector, undefined, logConfig, logger);

            idle.emit('/org/example/Echo', 'org.example.Echo', 'ping', []);

            sinon.assert.calledOnceWithExactly(
                logger.warn,
                '[BusConnection idle] Signal org.example.Echo.ping dropped: not connected'
            );
        });
    });
});
