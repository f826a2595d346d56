import { Candle } from '../entities/Candle';
import { BreakoutEvent } from '../value-objects/BreakoutEvent';

export interface IRetestValidator {
    isRetestConfirmed(candles: Candle[], breakout: BreakoutEvent, atr: number): boolean;
}
