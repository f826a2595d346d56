import { injectable, inject } from 'inversify';
import { IBreakoutStrategy } from '../../../../domain/interfaces/IBreakoutStrategy';
import { BreakoutEvent } from '../../../../domain/value-objects/BreakoutEvent';
import { BreakoutContext } from '../../../../domain/types/SignalTypes';
import { BreakoutStrategyName } from '../../../../domain/enums/BreakoutStrategyName';
import { TradeDirection } from '../../../../domain/enums/TradeDirection';
import { SignalConfigType } from '../../../../config/signal.config';
import { TYPES } from '../../../../config/types';

/**
 * Intraday close beyond the last completed daily bar.
 *
 * With `scanBars = 1` only the latest intraday bar counts. Larger values
 * look back over that many bars ("the break happened sometime today"),
 * most recent first.
 */
@injectable()
export class PriorDayBreakout implements IBreakoutStrategy {
    readonly name = BreakoutStrategyName.PRIOR_DAY;
    readonly dailyBarsRequired = 3;

    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType
    ) {}

    detect({ pair, candles, timeframe, dailyCandles }: BreakoutContext): BreakoutEvent | null {
        if (candles.length === 0 || !dailyCandles) return null;

        const completed = dailyCandles.filter(c => c.complete);
        if (completed.length === 0) return null;
        const prevDay = completed[completed.length - 1];

        const scanBars = Math.max(1, this.config.breakout.priorDay.scanBars);
        const window = candles.slice(-scanBars).reverse();

        for (const bar of window) {
            if (bar.timestamp <= prevDay.timestamp) break;

            if (bar.close > prevDay.high) {
                return new BreakoutEvent(pair.id, prevDay.high, TradeDirection.BUY, timeframe, this.name, bar.timestamp, bar.close);
            }
            if (bar.close < prevDay.low) {
                return new BreakoutEvent(pair.id, prevDay.low, TradeDirection.SELL, timeframe, this.name, bar.timestamp, bar.close);
            }
        }
        return null;
    }
}
