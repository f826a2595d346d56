import { injectable, inject } from 'inversify';
import { IRetestValidator } from '../../../domain/interfaces/IRetestValidator';
import { Candle } from '../../../domain/entities/Candle';
import { BreakoutEvent } from '../../../domain/value-objects/BreakoutEvent';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { SignalConfigType } from '../../../config/signal.config';
import { TYPES } from '../../../config/types';

/**
 * Execution-timeframe confirmation that price came back to the broken
 * level after the break and was rejected from it.
 */
@injectable()
export class RetestValidator implements IRetestValidator {
    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType
    ) {}

    isRetestConfirmed(candles: Candle[], breakout: BreakoutEvent, atr: number): boolean {
        if (candles.length === 0 || atr <= 0) return false;

        const { lookback, atrTolerance } = this.config.retest;
        const tolerance = atrTolerance * atr;
        const level = breakout.level;
        const start = Math.max(0, candles.length - lookback);
        const last = candles[candles.length - 1];
        const isBuy = breakout.direction === TradeDirection.BUY;

        if (isBuy ? last.close <= level : last.close >= level) return false;

        for (let i = start; i < candles.length; i++) {
            const bar = candles[i];
            const prevClose = i > 0 ? candles[i - 1].close : bar.open;

            // the touch has to come from the broken side; the breakout bar itself does not count
            if (isBuy) {
                const fromAbove = bar.open > level || prevClose > level;
                if (fromAbove && Math.abs(bar.low - level) <= tolerance && bar.close > level) return true;
            } else {
                const fromBelow = bar.open < level || prevClose < level;
                if (fromBelow && Math.abs(bar.high - level) <= tolerance && bar.close < level) return true;
            }
        }
        return false;
    }
}
