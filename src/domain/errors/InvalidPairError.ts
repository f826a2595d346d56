export class InvalidPairError extends Error {
    constructor(public readonly pairId: string, reason: string) {
        super(`Invalid pair "${pairId}": ${reason}`);
        this.name = 'InvalidPairError';
    }
}
