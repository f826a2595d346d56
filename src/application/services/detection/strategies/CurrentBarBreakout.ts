import { injectable } from 'inversify';
import { IBreakoutStrategy } from '../../../../domain/interfaces/IBreakoutStrategy';
import { BreakoutEvent } from '../../../../domain/value-objects/BreakoutEvent';
import { BreakoutContext } from '../../../../domain/types/SignalTypes';
import { BreakoutStrategyName } from '../../../../domain/enums/BreakoutStrategyName';
import { TradeDirection } from '../../../../domain/enums/TradeDirection';

/**
 * Latest bar closing on its own extreme. Fires on almost every strong
 * bar and reverses just as easily; kept as a selectable whipsaw detector.
 */
@injectable()
export class CurrentBarBreakout implements IBreakoutStrategy {
    readonly name = BreakoutStrategyName.CURRENT_BAR;
    readonly dailyBarsRequired = 0;

    detect({ pair, candles, timeframe }: BreakoutContext): BreakoutEvent | null {
        if (candles.length === 0) return null;

        const last = candles[candles.length - 1];
        if (last.range <= 0) return null;

        if (last.close >= last.high) {
            return new BreakoutEvent(pair.id, last.high, TradeDirection.BUY, timeframe, this.name, last.timestamp, last.close);
        }
        if (last.close <= last.low) {
            return new BreakoutEvent(pair.id, last.low, TradeDirection.SELL, timeframe, this.name, last.timestamp, last.close);
        }
        return null;
    }
}
