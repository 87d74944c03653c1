import { expect } from 'chai';
import * as sinon from 'sinon';
import { stubInterface } from 'ts-sinon';

import { calculatorSpec, createTestCodecs } from '../test-utils/calculator';
import { BusErrorName } from '../../src/contract/bus-command';
import { ArgumentCountError, CallError, ConversionError, UnknownMethodError } from '../../src/errors';
import { ImportStub } from '../../src/service/import-stub';
import { createServiceDescriptor } from '../../src/service/service-descriptor';

import type { StubbedInstance } from 'ts-sinon';
import type { BusConnection } from '../../src/bus/bus-connection';

describe('import-stub', () => {
    const codecs = createTestCodecs();
    const descriptor = createServiceDescriptor(calculatorSpec(), codecs);
    let connection: StubbedInstance<BusConnection>;
    let stub: ImportStub;

    beforeEach(() => {
        connection = stubInterface<BusConnection>();
        stub = new ImportStub(descriptor, connection, codecs);
    });

    it('should subscribe to every notification of the service', () => {
        sinon.assert.calledOnceWithExactly(connection.subscribe, descriptor, 'changed', sinon.match.func);
    });

    it('should emit decoded signals as local events', () => {
        const listener = sinon.spy();
        stub.on('changed', listener);

        const onSignal = connection.subscribe.firstCall.args[2];
        onSignal(['1', 'x']);

        sinon.assert.calledOnceWithExactly(listener, 1, 'x');
    });

    it('should send encoded arguments and decode the reply', async () => {
        connection.call.resolves('5');

        expect(await stub.invoke('add', [2, 3])).to.be.equal(5);
        sinon.assert.calledOnceWithExactly(connection.call, descriptor, 'add', ['2', '3']);
    });

    it('should encode custom kinds', async () => {
        connection.call.resolves('7');

        expect(await stub.invoke('norm', [{ x: -3, y: 4 }])).to.be.equal(7);
        sinon.assert.calledOnceWithExactly(connection.call, descriptor, 'norm', ['{"x":-3,"y":4}']);
    });

    it('should resolve void methods with undefined', async () => {
        connection.call.resolves('');

        expect(await stub.invoke('reset', [])).to.be.undefined;
    });

    it('should let bus errors through', async () => {
        const failure = new CallError(BusErrorName.ServiceUnknown, 'not owned');
        connection.call.rejects(failure);

        await expect(stub.invoke('add', [1, 2])).to.be.rejectedWith(failure);
    });

    it('should turn other call failures into call errors', async () => {
        connection.call.rejects(new Error('socket closed'));

        const error = await stub.invoke('add', [1, 2]).then(
            () => undefined,
            (err: unknown) => err
        );
        expect(error).to.be.instanceOf(CallError);
        if (error instanceof CallError) {
            expect(error.busErrorName).to.be.equal(BusErrorName.Failed);
            expect(error.message).to.be.equal("Call to 'add' failed: Error: socket closed");
        }
    });

    it('should reject a reply it cannot decode', async () => {
        connection.call.resolves('five');

        await expect(stub.invoke('add', [2, 3])).to.be.rejectedWith(ConversionError, "Cannot convert 'five' to int");
    });

    it('should check the member and argument count before calling', async () => {
        await expect(stub.invoke('multiply', [1, 2])).to.be.rejectedWith(UnknownMethodError);
        await expect(stub.invoke('add', [1])).to.be.rejectedWith(ArgumentCountError);
        sinon.assert.notCalled(connection.call);
    });
});
