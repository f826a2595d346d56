import { RetryPolicy } from '../src/shared/utils/RetryPolicy';
import { HttpError, isRetryableError } from '../src/shared/errors/HttpError';

describe('RetryPolicy', () => {
    let sleeps: number[];
    const sleep = async (ms: number) => {
        sleeps.push(ms);
    };

    beforeEach(() => {
        sleeps = [];
    });

    it('backs off exponentially until an attempt succeeds', async () => {
        const policy = new RetryPolicy({ attempts: 3, baseDelayMs: 500 }, sleep);
        const fn = jest.fn(async (attempt: number) => {
            if (attempt < 3) throw new Error(`attempt ${attempt}`);
            return 'ok';
        });

        await expect(policy.execute(fn)).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(3);
        expect(sleeps).toEqual([500, 1000]);
    });

    it('rethrows the last error once attempts run out', async () => {
        const policy = new RetryPolicy({ attempts: 2, baseDelayMs: 100 }, sleep);
        let calls = 0;

        await expect(policy.execute(async () => {
            calls++;
            throw new Error(`failure ${calls}`);
        })).rejects.toThrow('failure 2');
        expect(sleeps).toEqual([100]);
    });

    it('stops at errors the predicate refuses', async () => {
        const policy = new RetryPolicy({ attempts: 5, baseDelayMs: 100, shouldRetry: isRetryableError }, sleep);
        const fn = jest.fn(async () => {
            throw new HttpError(401, 'https://example.test', 'unauthorized');
        });

        await expect(policy.execute(fn)).rejects.toBeInstanceOf(HttpError);
        expect(fn).toHaveBeenCalledTimes(1);
        expect(sleeps).toEqual([]);
    });

    it('caps the delay', () => {
        const policy = new RetryPolicy({ attempts: 12, baseDelayMs: 500, maxDelayMs: 30_000 }, sleep);

        expect(policy.delayFor(1)).toBe(500);
        expect(policy.delayFor(6)).toBe(16_000);
        expect(policy.delayFor(7)).toBe(30_000);
        expect(policy.maxAttempts).toBe(12);
    });

    it('needs at least one attempt', () => {
        expect(() => new RetryPolicy({ attempts: 0, baseDelayMs: 100 })).toThrow('Retry attempts must be at least 1, got 0');
    });
});

describe('isRetryableError', () => {
    it.each([
        [new HttpError(429, 'u', ''), true],
        [new HttpError(500, 'u', ''), true],
        [new HttpError(503, 'u', ''), true],
        [new HttpError(400, 'u', ''), false],
        [new HttpError(404, 'u', ''), false],
        [new TypeError('fetch failed'), true]
    ])('%p -> %p', (error, expected) => {
        expect(isRetryableError(error)).toBe(expected);
    });

    it('truncates long bodies in the message', () => {
        const error = new HttpError(502, 'https://example.test', 'x'.repeat(500));
        expect(error.message).toBe(`HTTP 502 from https://example.test: ${'x'.repeat(200)}`);
    });
});
