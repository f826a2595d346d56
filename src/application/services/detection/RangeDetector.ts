import { injectable, inject } from 'inversify';
import { Candle } from '../../../domain/entities/Candle';
import { MarketRange } from '../../../domain/value-objects/MarketRange';
import { IIndicators } from '../../../domain/interfaces/IIndicators';
import { TYPES } from '../../../config/types';

/**
 * Support / resistance from the bars preceding the latest one.
 */
@injectable()
export class RangeDetector {
    constructor(
        @inject(TYPES.IIndicators) private readonly indicators: IIndicators
    ) {}

    detectRange(candles: Candle[], lookback: number): MarketRange | null {
        const window = this.priorWindow(candles, lookback);
        if (!window) return null;
        return MarketRange.create(window);
    }

    /**
     * Highest swing high and lowest swing low inside the window.
     * A side without swings is open (+/-Infinity) and can never be broken.
     */
    detectSwingRange(candles: Candle[], lookback: number): MarketRange | null {
        const window = this.priorWindow(candles, lookback);
        if (!window) return null;

        const { highs, lows } = this.indicators.findSwingPoints(window);
        if (highs.length === 0 && lows.length === 0) return null;

        const high = highs.length > 0 ? Math.max(...highs.map(p => p.price)) : Number.POSITIVE_INFINITY;
        const low = lows.length > 0 ? Math.min(...lows.map(p => p.price)) : Number.NEGATIVE_INFINITY;
        return new MarketRange(high, low, window[window.length - 1].timestamp, high - low);
    }

    private priorWindow(candles: Candle[], lookback: number): Candle[] | null {
        if (lookback < 1 || candles.length < lookback + 1) return null;
        return candles.slice(-(lookback + 1), -1);
    }
}
