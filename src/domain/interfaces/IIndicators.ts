import { Candle } from '../entities/Candle';
import { SwingPoints } from '../types/SignalTypes';

export interface IIndicators {
    atr(candles: Candle[], period?: number): number;
    rsi(closes: number[], period?: number): number[];
    ema(values: number[], period: number): number[];
    emaSlope(values: number[], period?: number): number;
    findSwingPoints(candles: Candle[]): SwingPoints;
}
