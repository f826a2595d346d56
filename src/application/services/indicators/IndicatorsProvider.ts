import { injectable } from 'inversify';
import { IIndicators } from '../../../domain/interfaces/IIndicators';
import { Candle } from '../../../domain/entities/Candle';
import { SwingPoints } from '../../../domain/types/SignalTypes';

/**
 * Stateless indicator math. Insufficient input never throws:
 * series come back empty and scalars come back 0.
 */
@injectable()
export class IndicatorsProvider implements IIndicators {

    /** Simple mean of the trailing `period` true ranges */
    atr(candles: Candle[], period: number = 14): number {
        if (period < 1 || candles.length < period + 1) return 0;

        const trueRanges: number[] = [];
        for (let i = 1; i < candles.length; i++) {
            const high = candles[i].high;
            const low = candles[i].low;
            const prevClose = candles[i - 1].close;
            trueRanges.push(Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose)));
        }

        const window = trueRanges.slice(-period);
        return window.reduce((sum, tr) => sum + tr, 0) / period;
    }

    /**
     * Wilder RSI. Value j belongs to closes[j + period].
     */
    rsi(closes: number[], period: number = 14): number[] {
        if (period < 1 || closes.length < period + 1) return [];

        let gains = 0;
        let losses = 0;
        for (let i = 1; i <= period; i++) {
            const diff = closes[i] - closes[i - 1];
            if (diff >= 0) gains += diff;
            else losses -= diff;
        }

        let avgGain = gains / period;
        let avgLoss = losses / period;
        const results: number[] = [this.toRsi(avgGain, avgLoss)];

        for (let i = period + 1; i < closes.length; i++) {
            const diff = closes[i] - closes[i - 1];
            const gain = diff > 0 ? diff : 0;
            const loss = diff < 0 ? -diff : 0;

            avgGain = (avgGain * (period - 1) + gain) / period;
            avgLoss = (avgLoss * (period - 1) + loss) / period;
            results.push(this.toRsi(avgGain, avgLoss));
        }

        return results;
    }

    /** EMA seeded with the SMA of the first `period` values */
    ema(values: number[], period: number): number[] {
        if (period < 1 || values.length < period) return [];

        const k = 2 / (period + 1);
        let ema = values.slice(0, period).reduce((a, b) => a + b, 0) / period;
        const results: number[] = [ema];

        for (let i = period; i < values.length; i++) {
            ema = (values[i] * k) + (ema * (1 - k));
            results.push(ema);
        }

        return results;
    }

    emaSlope(values: number[], period: number = 10): number {
        const series = this.ema(values, period);
        if (series.length < 2) return 0;
        return series[series.length - 1] - series[series.length - 2];
    }

    findSwingPoints(candles: Candle[]): SwingPoints {
        const swings: SwingPoints = { highs: [], lows: [] };

        for (let i = 1; i < candles.length - 1; i++) {
            const prev = candles[i - 1];
            const curr = candles[i];
            const next = candles[i + 1];

            if (curr.high > prev.high && curr.high > next.high) {
                swings.highs.push({ index: i, timestamp: curr.timestamp, price: curr.high });
            }
            if (curr.low < prev.low && curr.low < next.low) {
                swings.lows.push({ index: i, timestamp: curr.timestamp, price: curr.low });
            }
        }

        return swings;
    }

    private toRsi(avgGain: number, avgLoss: number): number {
        if (avgLoss === 0) return 100;
        return 100 - (100 / (1 + avgGain / avgLoss));
    }
}
