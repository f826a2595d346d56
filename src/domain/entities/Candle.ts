import { Granularity } from '../enums/Granularity';

export class Candle {
    constructor(
        public readonly timestamp: number,
        public readonly open: number,
        public readonly high: number,
        public readonly low: number,
        public readonly close: number,
        public readonly pair: string,
        public readonly granularity: Granularity,
        // The feed marks the still-forming bar as incomplete
        public readonly complete: boolean = true
    ) {}

    get range(): number {
        return this.high - this.low;
    }
}
