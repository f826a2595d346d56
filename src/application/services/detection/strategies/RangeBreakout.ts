import { injectable, inject } from 'inversify';
import { IBreakoutStrategy } from '../../../../domain/interfaces/IBreakoutStrategy';
import { IIndicators } from '../../../../domain/interfaces/IIndicators';
import { BreakoutEvent } from '../../../../domain/value-objects/BreakoutEvent';
import { MarketRange } from '../../../../domain/value-objects/MarketRange';
import { BreakoutContext } from '../../../../domain/types/SignalTypes';
import { BreakoutStrategyName } from '../../../../domain/enums/BreakoutStrategyName';
import { TradeDirection } from '../../../../domain/enums/TradeDirection';
import { Candle } from '../../../../domain/entities/Candle';
import { SignalConfigType } from '../../../../config/signal.config';
import { TYPES } from '../../../../config/types';
import { RangeDetector } from '../RangeDetector';

@injectable()
export class RangeBreakout implements IBreakoutStrategy {
    readonly name = BreakoutStrategyName.RANGE;

    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType,
        @inject(TYPES.IIndicators) private readonly indicators: IIndicators,
        @inject(RangeDetector) private readonly rangeDetector: RangeDetector
    ) {}

    get dailyBarsRequired(): number {
        const { trendFilter } = this.config.breakout.range;
        return trendFilter.enabled ? trendFilter.emaPeriod + 1 : 0;
    }

    detect({ pair, candles, timeframe, dailyCandles }: BreakoutContext): BreakoutEvent | null {
        const { lookback, levelSource } = this.config.breakout.range;
        const range = levelSource === 'swings'
            ? this.rangeDetector.detectSwingRange(candles, lookback)
            : this.rangeDetector.detectRange(candles, lookback);
        if (!range) return null;

        const last = candles[candles.length - 1];
        const event = this.breakOf(range, last, pair.id, timeframe);
        if (!event) return null;

        if (this.config.breakout.range.trendFilter.enabled && !this.alignsWithTrend(event.direction, dailyCandles ?? [])) {
            return null;
        }
        return event;
    }

    private breakOf(range: MarketRange, last: Candle, pairId: string, timeframe: BreakoutContext['timeframe']): BreakoutEvent | null {
        if (last.close > range.high) {
            return new BreakoutEvent(pairId, range.high, TradeDirection.BUY, timeframe, this.name, last.timestamp, last.close);
        }
        if (last.close < range.low) {
            return new BreakoutEvent(pairId, range.low, TradeDirection.SELL, timeframe, this.name, last.timestamp, last.close);
        }
        return null;
    }

    // Latest daily close must sit on the breakout side of the daily EMA
    private alignsWithTrend(direction: TradeDirection, dailyCandles: Candle[]): boolean {
        const closes = dailyCandles.map(c => c.close);
        const ema = this.indicators.ema(closes, this.config.breakout.range.trendFilter.emaPeriod);
        if (ema.length === 0) return false;

        const trend = ema[ema.length - 1];
        const dailyClose = closes[closes.length - 1];
        return direction === TradeDirection.BUY ? dailyClose > trend : dailyClose < trend;
    }
}
