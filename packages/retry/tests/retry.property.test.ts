import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { TransportError } from '@chainrest/core';
import { type AttemptOutcome, RetryExecutor } from '../src/index.js';

type Outcome = AttemptOutcome<{ statusCode: number }, Error>;

const failure: Outcome = { response: undefined, error: new TransportError() };

describe('RetryExecutor Property-Based Tests', () => {
  it('should make exactly attempts + 1 calls when the decider always approves', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 0, max: 8 }), async (attempts) => {
        let calls = 0;
        let retries = 0;
        const executor = new RetryExecutor<{ statusCode: number }>({
          attempts,
          shouldRetry: () => true,
          onRetry: () => {
            retries++;
          },
        });

        await executor.execute(() => {
          calls++;
          return Promise.resolve(failure);
        });

        expect(calls).toBe(attempts + 1);
        expect(retries).toBe(attempts);
      }),
      { numRuns: 20 }
    );
  });

  it('should make one call when the decider declines', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 100 }), async (attempts) => {
        let calls = 0;
        const executor = new RetryExecutor<{ statusCode: number }>({
          attempts,
          shouldRetry: () => false,
        });

        await executor.execute(() => {
          calls++;
          return Promise.resolve(failure);
        });

        expect(calls).toBe(1);
      }),
      { numRuns: 20 }
    );
  });

  it('should stop at the first success and return it', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 0, max: 6 }),
        fc.integer({ min: 0, max: 6 }),
        async (attempts, failuresBeforeSuccess) => {
          let calls = 0;
          const executor = new RetryExecutor<{ statusCode: number }>({
            attempts,
            shouldRetry: (_response, error) => error !== undefined,
          });

          const outcome = await executor.execute(() => {
            calls++;
            return Promise.resolve<Outcome>(
              calls > failuresBeforeSuccess
                ? { response: { statusCode: 200 }, error: undefined }
                : failure
            );
          });

          expect(calls).toBe(Math.min(failuresBeforeSuccess, attempts) + 1);
          if (failuresBeforeSuccess <= attempts) {
            expect(outcome.response?.statusCode).toBe(200);
          } else {
            expect(outcome.error).toBe(failure.error);
          }
        }
      ),
      { numRuns: 30 }
    );
  });
});
