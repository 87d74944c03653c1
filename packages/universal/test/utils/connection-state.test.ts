import { expect } from 'chai';
import * as sinon from 'sinon';

import { ConnectionState } from '../../src/utils/connection-state';

describe('ConnectionState', () => {
    it('should run connect once while connecting or connected', async () => {
        const state = new ConnectionState<string>();
        const connect = sinon.stub().resolves('peer');

        const [first, second] = await Promise.all([state.connect(connect), state.connect(connect)]);

        expect(first).to.be.equal('peer');
        expect(second).to.be.equal('peer');
        expect(state.connected).to.be.true;
        sinon.assert.calledOnce(connect);
    });

    it('should close only what was connected', async () => {
        const state = new ConnectionState();
        const close = sinon.stub().resolves();

        await state.close(close);
        sinon.assert.notCalled(close);

        await state.connect(() => Promise.resolve());
        await state.close(close);
        sinon.assert.calledOnce(close);
        expect(state.connected).to.be.false;
    });

    it('should allow a new connect after a failed one', async () => {
        const state = new ConnectionState();
        const failure = new Error('refused');

        await expect(state.connect(() => Promise.reject(failure))).to.be.rejectedWith(failure);
        expect(state.connected).to.be.false;

        await state.connect(() => Promise.resolve());
        expect(state.connected).to.be.true;
    });

    it('should forget the connection on shutdown', async () => {
        const state = new ConnectionState();
        await state.connect(() => Promise.resolve());

        state.shutdown();

        expect(state.connected).to.be.false;
    });
});
