import { PullbackState } from '../enums/PullbackState';
import { TradeDirection } from '../enums/TradeDirection';

export interface RsiPoint {
    timestamp: number;
    rsi: number;
    /** false while the bar is still forming */
    complete: boolean;
}

export interface IPullbackStateMachine {
    getState(pair: string): PullbackState;
    /**
     * Commits completed RSI points newer than the last observed one. A trailing
     * forming point is evaluated without being committed. True when the latest
     * point completes a cross-back.
     */
    observe(pair: string, direction: TradeDirection, points: RsiPoint[]): boolean;
    reset(pair: string): void;
}
