import { expect } from 'chai';
import * as sinon from 'sinon';

import { executeInTimeout } from '../../src/utils/execute-in-timeout';

describe('executeInTimeout', () => {
    let clock: sinon.SinonFakeTimers;

    beforeEach(() => {
        clock = sinon.useFakeTimers();
    });

    afterEach(() => {
        clock.restore();
    });

    it('should resolve with the executor value and cancel the timer', async () => {
        const timeout = sinon.spy();

        const value = await executeInTimeout<number>(100, (resolve) => resolve(42), timeout);
        clock.tick(200);

        expect(value).to.be.equal(42);
        sinon.assert.notCalled(timeout);
    });

    it('should call the timeout when the executor does not settle in time', async () => {
        const pending = executeInTimeout<void>(
            100,
            () => undefined,
            (reject) => reject(new Error('too late'))
        );

        clock.tick(100);

        await expect(pending).to.be.rejectedWith(Error, 'too late');
    });

    it('should not start a timer for a negative delay', async () => {
        const timeout = sinon.spy();
        let resolveLater: (value: string) => void = () => undefined;
        const pending = executeInTimeout<string>(-1, (resolve) => (resolveLater = resolve), timeout);

        clock.tick(60000);
        resolveLater('done');

        expect(await pending).to.be.equal('done');
        sinon.assert.notCalled(timeout);
    });
});
