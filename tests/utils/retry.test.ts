import { expect } from 'chai';

import { retryWithBackoff, sleep } from '../../src/utils/retry';
import { rejectionOf } from '../helpers';

describe('utils/retry', () => {
    it('retries until the call succeeds', async () => {
        const attempts: number[] = [];

        const value = await retryWithBackoff(async (attempt) => {
            attempts.push(attempt);
            if (attempt < 3) throw new Error(`fail ${attempt}`);
            return 'done';
        }, { maxAttempts: 3, baseDelayMs: 1 });

        expect(value).to.equal('done');
        expect(attempts).to.deep.equal([1, 2, 3]);
    });

    it('rethrows the last error once attempts run out', async () => {
        const error = await rejectionOf(retryWithBackoff(async (attempt) => {
            throw new Error(`fail ${attempt}`);
        }, { maxAttempts: 2, baseDelayMs: 1 }));

        expect(error).to.be.instanceOf(Error);
        expect(error).to.have.property('message', 'fail 2');
    });

    it('stops at once when shouldRetry declines', async () => {
        let calls = 0;
        await rejectionOf(retryWithBackoff(async () => {
            calls += 1;
            throw new Error('permanent');
        }, { maxAttempts: 5, baseDelayMs: 1, shouldRetry: () => false }));

        expect(calls).to.equal(1);
    });

    it('does not retry after the signal fires', async () => {
        const controller = new AbortController();
        let calls = 0;
        await rejectionOf(retryWithBackoff(async () => {
            calls += 1;
            controller.abort();
            throw new Error('aborted');
        }, { maxAttempts: 5, baseDelayMs: 1, signal: controller.signal }));

        expect(calls).to.equal(1);
    });

    it('cuts a sleep short when aborted', async () => {
        const controller = new AbortController();
        const startTime = Date.now();
        setTimeout(() => controller.abort('stop'), 5);

        const reason = await rejectionOf(sleep(1000, controller.signal));

        expect(reason).to.equal('stop');
        expect(Date.now() - startTime).to.be.lessThan(500);
    });
});
