import { expect } from 'chai';
import * as sinon from 'sinon';
import { stubInterface } from 'ts-sinon';

import { calculatorSpec, createTestCodecs, flushPromises } from '../test-utils/calculator';
import { createAccessFacade } from '../../src/service/access-facade';
import { ImportStub } from '../../src/service/import-stub';
import { createServiceDescriptor } from '../../src/service/service-descriptor';
import {
    connectService,
    isServiceRegistered,
    waitAndConnectService,
    waitForServiceRegistration,
} from '../../src/service/service-directory';

import type { StubbedInstance } from 'ts-sinon';
import type { BusConnection, BusWatch } from '../../src/bus/bus-connection';
import type { Logger } from '../../src/log/logger';
import type { ConnectableService } from '../../src/service/service-directory';

describe('service-directory', () => {
    const codecs = createTestCodecs();
    const descriptor = createServiceDescriptor(calculatorSpec(), codecs);
    let connection: StubbedInstance<BusConnection>;
    let logger: StubbedInstance<Logger>;
    let createImportStub: sinon.SinonSpy<[], ImportStub>;
    let service: ConnectableService;

    beforeEach(() => {
        connection = stubInterface<BusConnection>();
        logger = stubInterface<Logger>();
        createImportStub = sinon.spy(() => new ImportStub(descriptor, connection, codecs));
        service = { descriptor, connection, logger, createImportStub };
    });

    describe('isServiceRegistered', () => {
        it('should ask the connection', async () => {
            connection.isRegistered.resolves(true);

            expect(await isServiceRegistered('org.example.Calculator', connection)).to.be.true;
            sinon.assert.calledOnceWithExactly(connection.isRegistered, 'org.example.Calculator');
        });
    });

    describe('waitForServiceRegistration', () => {
        it('should resolve at once when the service is registered', async () => {
            connection.isRegistered.resolves(true);

            await waitForServiceRegistration('org.example.Calculator', connection);
            sinon.assert.notCalled(connection.watchRegistration);
        });

        it('should resolve when the registration is announced', async () => {
            const cancel = sinon.spy();
            const watch: BusWatch = { cancel };
            connection.isRegistered.resolves(false);
            connection.watchRegistration.returns(watch);
            let resolved = false;

            const waiting = waitForServiceRegistration('org.example.Calculator', connection).then(() => {
                resolved = true;
            });
            await flushPromises();

            expect(resolved).to.be.false;
            sinon.assert.calledOnceWithExactly(
                connection.watchRegistration,
                'org.example.Calculator',
                sinon.match.func
            );

            connection.watchRegistration.firstCall.args[1]();
            await waiting;
            sinon.assert.calledOnce(cancel);
        });

        it('should resolve when the service registered while the watch was set up', async () => {
            const watch: BusWatch = { cancel: sinon.spy() };
            connection.isRegistered.onFirstCall().resolves(false);
            connection.isRegistered.resolves(true);
            connection.watchRegistration.returns(watch);

            await waitForServiceRegistration('org.example.Calculator', connection);
            sinon.assert.calledTwice(connection.isRegistered);
        });

        it('should reject when the connection fails', async () => {
            const watch: BusWatch = { cancel: sinon.spy() };
            const failure = new Error('connection closed');
            connection.isRegistered.onFirstCall().resolves(false);
            connection.isRegistered.rejects(failure);
            connection.watchRegistration.returns(watch);

            await expect(waitForServiceRegistration('org.example.Calculator', connection)).to.be.rejectedWith(failure);
        });
    });

    describe('connectService', () => {
        it('should attach an import stub to the facade', async () => {
            connection.isRegistered.resolves(true);
            const facade = createAccessFacade(descriptor);

            expect(await connectService(service, facade)).to.be.deep.equal({ connected: true });
            expect(facade.isConnected).to.be.true;
            sinon.assert.calledOnce(createImportStub);
        });

        it('should report a service that is not registered', async () => {
            connection.isRegistered.resolves(false);
            const facade = createAccessFacade(descriptor);

            expect(await connectService(service, facade)).to.be.deep.equal({
                connected: false,
                failure: 'not-registered',
                message: 'Service org.example.Calculator is not registered',
            });
            expect(facade.isConnected).to.be.false;
            sinon.assert.calledOnceWithExactly(
                logger.warn,
                '[ServiceDirectory] Service org.example.Calculator is not registered'
            );
            sinon.assert.notCalled(createImportStub);
        });

        it('should report a facade of another definition', async () => {
            connection.isRegistered.resolves(true);
            const otherDescriptor = createServiceDescriptor(calculatorSpec(), codecs);
            const expected = {
                connected: false,
                failure: 'wrong-instance',
                message: 'Wrong instance to connect to org.example.Calculator',
            };

            expect(await connectService(service, createAccessFacade(otherDescriptor))).to.be.deep.equal(expected);
            expect(await connectService(service, {})).to.be.deep.equal(expected);
            sinon.assert.notCalled(createImportStub);
        });

        it('should refuse to reconnect and keep the first stub working', async () => {
            connection.isRegistered.resolves(true);
            const facade = createAccessFacade(descriptor);
            await connectService(service, facade);

            expect(await connectService(service, facade)).to.be.deep.equal({
                connected: false,
                failure: 'already-connected',
                message: "Can't reconnect previously connected service org.example.Calculator",
            });
            sinon.assert.calledOnce(createImportStub);

            connection.call.resolves('3');
            expect(await facade.add(1, 2)).to.be.equal(3);
        });
    });

    describe('waitAndConnectService', () => {
        it('should connect once the service shows up', async () => {
            const watch: BusWatch = { cancel: sinon.spy() };
            connection.isRegistered.onFirstCall().resolves(false);
            connection.isRegistered.resolves(true);
            connection.watchRegistration.returns(watch);
            const facade = createAccessFacade(descriptor);

            expect(await waitAndConnectService(service, facade)).to.be.deep.equal({ connected: true });
            expect(facade.isConnected).to.be.true;
        });
    });
});
