import { TradeDirection } from '../enums/TradeDirection';
import { Granularity } from '../enums/Granularity';
import { BreakoutStrategyName } from '../enums/BreakoutStrategyName';

export class BreakoutEvent {
    constructor(
        public readonly pair: string,
        public readonly level: number,
        public readonly direction: TradeDirection,
        public readonly timeframe: Granularity,
        public readonly strategy: BreakoutStrategyName,
        public readonly timestamp: number,
        public readonly close: number
    ) {}

    get tag(): string {
        return `${this.timeframe}:${this.strategy}`;
    }
}
