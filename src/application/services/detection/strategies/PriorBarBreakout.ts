import { injectable } from 'inversify';
import { IBreakoutStrategy } from '../../../../domain/interfaces/IBreakoutStrategy';
import { BreakoutEvent } from '../../../../domain/value-objects/BreakoutEvent';
import { BreakoutContext } from '../../../../domain/types/SignalTypes';
import { BreakoutStrategyName } from '../../../../domain/enums/BreakoutStrategyName';
import { TradeDirection } from '../../../../domain/enums/TradeDirection';

@injectable()
export class PriorBarBreakout implements IBreakoutStrategy {
    readonly name = BreakoutStrategyName.PRIOR_BAR;
    readonly dailyBarsRequired = 0;

    detect({ pair, candles, timeframe }: BreakoutContext): BreakoutEvent | null {
        if (candles.length < 2) return null;

        const last = candles[candles.length - 1];
        const prev = candles[candles.length - 2];

        if (last.close > prev.high) {
            return new BreakoutEvent(pair.id, prev.high, TradeDirection.BUY, timeframe, this.name, last.timestamp, last.close);
        }
        if (last.close < prev.low) {
            return new BreakoutEvent(pair.id, prev.low, TradeDirection.SELL, timeframe, this.name, last.timestamp, last.close);
        }
        return null;
    }
}
