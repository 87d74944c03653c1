import { EventEmitter } from 'events';

import { BusRegistry, Int, Str, defineService, method, notification, registerService } from '@strbus/universal';
import { expect } from 'chai';
import * as sinon from 'sinon';

import { FakeServer, createSocketPair, flushPromises } from '../test-utils/fake-socket';
import { createWebSocketBroker } from '../../src/broker/broker-factory';
import {
    connectBusesFromEnvironment,
    connectWebSocketBus,
    createWebSocketConnection,
} from '../../src/client/connection-factory';

import type { FakeSocket } from '../test-utils/fake-socket';
import type { BrokerImpl } from '@strbus/universal';

function greeterSpec() {
    return {
        serviceName: 'org.example.Greeter',
        objectPath: '/org/example/Greeter',
        interfaceName: 'org.example.Greeter',
        methods: {
            greet: method([Str], Str),
            greetings: method([], Int),
        },
        notifications: {
            greeted: notification([Str]),
        },
    };
}

class GreeterImpl extends EventEmitter {
    private _count = 0;

    greet(name: string): string {
        this._count += 1;
        this.emit('greeted', name);
        return `Hello, ${name}`;
    }

    greetings(): number {
        return this._count;
    }
}

describe('connection-factory', () => {
    let server: FakeServer;
    let broker: BrokerImpl;
    let createSocket: sinon.SinonSpy<[string], FakeSocket>;

    beforeEach(async () => {
        server = new FakeServer();
        broker = createWebSocketBroker({ createServer: () => server });
        const listening = broker.connect(8082);
        await flushPromises();
        server.emit('listening');
        await listening;

        createSocket = sinon.spy((url: string) => {
            const [clientSide, serverSide] = createSocketPair(url);
            setImmediate(() => {
                server.emit('connection', serverSide);
                clientSide.emit('open');
            });
            return clientSide;
        });
    });

    afterEach(async () => {
        await broker.close();
    });

    it('should create an unconnected connection', () => {
        const connection = createWebSocketConnection('idle', { createSocket });

        expect(connection.name).to.be.equal('idle');
        expect(connection.connected).to.be.false;
        sinon.assert.notCalled(createSocket);
    });

    it('should serve calls and notifications over WebSocket', async () => {
        const serverConnection = await connectWebSocketBus('server', 8082, { createSocket });
        const clientConnection = await connectWebSocketBus('client', 'ws://127.0.0.1:8082', { createSocket });
        const serverBuses = new BusRegistry();
        serverBuses.set('session', serverConnection);
        const clientBuses = new BusRegistry();
        clientBuses.set('session', clientConnection);
        expect(broker.peerCount).to.be.equal(2);

        await registerService(defineService(greeterSpec(), { buses: serverBuses }), new GreeterImpl());
        const greeter = await defineService(greeterSpec(), { buses: clientBuses }).createAndConnectService();
        const greeted = sinon.spy();
        greeter.on('greeted', greeted);

        expect(await greeter.greet('Ada')).to.be.equal('Hello, Ada');
        expect(await greeter.greetings()).to.be.equal(1);
        sinon.assert.calledOnceWithExactly(greeted, 'Ada');

        await clientConnection.close();
        await serverConnection.close();
        expect(broker.peerCount).to.be.equal(0);
    });

    it('should drop connections closed by the broker', async () => {
        const connection = await connectWebSocketBus('client', 8082, { createSocket });

        await broker.close();

        expect(connection.connected).to.be.false;
    });

    describe('connectBusesFromEnvironment', () => {
        it('should connect the configured buses', async () => {
            const registry = new BusRegistry();

            const connected = await connectBusesFromEnvironment(
                'client',
                registry,
                { STRBUS_SESSION_BUS_ADDRESS: 'ws://127.0.0.1:8082' },
                { createSocket }
            );

            expect(connected).to.be.deep.equal(['session']);
            expect(registry.has('session')).to.be.true;
            expect(registry.has('system')).to.be.false;
            sinon.assert.calledOnceWithExactly(createSocket, 'ws://127.0.0.1:8082');
        });

        it('should connect nothing without configuration', async () => {
            const registry = new BusRegistry();

            expect(await connectBusesFromEnvironment('client', registry, {}, { createSocket })).to.be.deep.equal([]);
            sinon.assert.notCalled(createSocket);
        });
    });
});
