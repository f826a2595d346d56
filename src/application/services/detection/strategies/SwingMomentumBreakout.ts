import { injectable, inject } from 'inversify';
import { IBreakoutStrategy } from '../../../../domain/interfaces/IBreakoutStrategy';
import { IIndicators } from '../../../../domain/interfaces/IIndicators';
import { BreakoutEvent } from '../../../../domain/value-objects/BreakoutEvent';
import { BreakoutContext } from '../../../../domain/types/SignalTypes';
import { BreakoutStrategyName } from '../../../../domain/enums/BreakoutStrategyName';
import { TradeDirection } from '../../../../domain/enums/TradeDirection';
import { SignalConfigType } from '../../../../config/signal.config';
import { TYPES } from '../../../../config/types';

/**
 * Close beyond the extreme swing point of the series, confirmed by
 * EMA side, RSI and a bar-to-bar move of at least atrMultiplier * ATR.
 * Without a swing point on that side the previous close stands in as the level.
 */
@injectable()
export class SwingMomentumBreakout implements IBreakoutStrategy {
    readonly name = BreakoutStrategyName.SWING_MOMENTUM;
    readonly dailyBarsRequired = 0;

    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType,
        @inject(TYPES.IIndicators) private readonly indicators: IIndicators
    ) {}

    detect({ pair, candles, timeframe }: BreakoutContext): BreakoutEvent | null {
        const params = this.config.breakout.swingMomentum;
        if (candles.length < Math.max(params.minBars, 2)) return null;

        const closes = candles.map(c => c.close);
        const ema = this.indicators.ema(closes, params.emaPeriod);
        const rsi = this.indicators.rsi(closes, params.rsiPeriod);
        const atr = this.indicators.atr(candles, params.atrPeriod);
        if (ema.length === 0 || rsi.length === 0 || atr <= 0) return null;

        const { highs, lows } = this.indicators.findSwingPoints(candles);
        const last = candles[candles.length - 1];
        const lastClose = last.close;
        const currentEma = ema[ema.length - 1];
        const currentRsi = rsi[rsi.length - 1];
        const minMove = params.atrMultiplier * atr;

        // a side without swing points leaves only the EMA, RSI and move checks
        const swingHigh = highs.length > 0 ? Math.max(...highs.map(p => p.price)) : Number.NEGATIVE_INFINITY;
        const swingLow = lows.length > 0 ? Math.min(...lows.map(p => p.price)) : Number.POSITIVE_INFINITY;
        const prevClose = closes[closes.length - 2];
        const move = lastClose - prevClose;

        if (lastClose > swingHigh && lastClose > currentEma && currentRsi > params.rsiBuyAbove && move >= minMove) {
            const level = Number.isFinite(swingHigh) ? swingHigh : prevClose;
            return new BreakoutEvent(pair.id, level, TradeDirection.BUY, timeframe, this.name, last.timestamp, lastClose);
        }

        if (lastClose < swingLow && lastClose < currentEma && currentRsi < params.rsiSellBelow && -move >= minMove) {
            const level = Number.isFinite(swingLow) ? swingLow : prevClose;
            return new BreakoutEvent(pair.id, level, TradeDirection.SELL, timeframe, this.name, last.timestamp, lastClose);
        }

        return null;
    }
}
