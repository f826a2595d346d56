export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
    attempts: number;
    baseDelayMs: number;
    maxDelayMs?: number;
    shouldRetry?: (error: unknown) => boolean;
}

const defaultSleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Bounded retry with exponential backoff: attempt n waits
 * min(baseDelayMs * 2^(n-1), maxDelayMs) before attempt n+1.
 */
export class RetryPolicy {
    private readonly attempts: number;
    private readonly baseDelayMs: number;
    private readonly maxDelayMs: number;
    private readonly shouldRetry?: (error: unknown) => boolean;

    constructor(options: RetryOptions, private readonly sleep: Sleep = defaultSleep) {
        if (options.attempts < 1) {
            throw new Error(`Retry attempts must be at least 1, got ${options.attempts}`);
        }
        this.attempts = options.attempts;
        this.baseDelayMs = options.baseDelayMs;
        this.maxDelayMs = options.maxDelayMs ?? 30_000;
        this.shouldRetry = options.shouldRetry;
    }

    get maxAttempts(): number {
        return this.attempts;
    }

    delayFor(attempt: number): number {
        return Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs);
    }

    async execute<T>(fn: (attempt: number) => Promise<T>): Promise<T> {
        let lastError: unknown;
        for (let attempt = 1; attempt <= this.attempts; attempt++) {
            try {
                return await fn(attempt);
            } catch (error) {
                lastError = error;
                const allowRetry = attempt < this.attempts && (this.shouldRetry ? this.shouldRetry(error) : true);
                if (!allowRetry) {
                    throw error;
                }
                await this.sleep(this.delayFor(attempt));
            }
        }
        throw lastError;
    }
}
