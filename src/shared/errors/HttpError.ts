/** Non-2xx response from an upstream HTTP API */
export class HttpError extends Error {
    constructor(
        public readonly status: number,
        public readonly url: string,
        body: string
    ) {
        super(`HTTP ${status} from ${url}: ${body.slice(0, 200)}`);
        this.name = 'HttpError';
    }

    /** Rate limits and server errors are worth another attempt, other 4xx are not */
    get retryable(): boolean {
        return this.status === 429 || this.status >= 500;
    }
}

export function isRetryableError(error: unknown): boolean {
    return error instanceof HttpError ? error.retryable : true;
}
