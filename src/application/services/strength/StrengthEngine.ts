import { injectable, inject } from 'inversify';
import { IStrengthEngine } from '../../../domain/interfaces/IStrengthEngine';
import { ICandleSource } from '../../../domain/interfaces/ICandleSource';
import { IIndicators } from '../../../domain/interfaces/IIndicators';
import { Candle } from '../../../domain/entities/Candle';
import { Currency } from '../../../domain/enums/Currency';
import { CurrencyPair } from '../../../domain/value-objects/CurrencyPair';
import { PairUniverse } from '../../../domain/value-objects/PairUniverse';
import { RankMap, StrengthReading } from '../../../domain/types/SignalTypes';
import { SignalConfigType } from '../../../config/signal.config';
import { TYPES } from '../../../config/types';
import { Logger } from '../../../shared/logger/Logger';

const NEUTRAL_RSI = 50;

function roundHalfAwayFromZero(value: number): number {
    return Math.sign(value) * Math.round(Math.abs(value));
}

@injectable()
export class StrengthEngine implements IStrengthEngine {
    private logger = Logger.getInstance();

    constructor(
        @inject(TYPES.ICandleSource) private readonly candleSource: ICandleSource,
        @inject(TYPES.IIndicators) private readonly indicators: IIndicators,
        @inject(TYPES.PairUniverse) private readonly universe: PairUniverse,
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType
    ) {}

    async computeRanks(pairs: readonly CurrencyPair[] = this.universe.list()): Promise<RankMap> {
        const averages = await this.computeScores(pairs);
        const ranks = this.rankScores(averages);

        if (ranks.size === 0) {
            this.logger.info(`Currency strength: not enough data (${averages.size} currencies scored)`);
        }
        return ranks;
    }

    /** Average composite score per currency over every pair that returned data */
    async computeScores(pairs: readonly CurrencyPair[] = this.universe.list()): Promise<Map<Currency, number>> {
        const contributions = new Map<Currency, number[]>();
        const { granularity, window } = this.config.strength;

        for (const pair of pairs) {
            const candles = await this.candleSource.get(pair.id, granularity, window);
            const reading = this.scorePair(pair, candles);
            if (!reading) {
                this.logger.debug(`Currency strength: no ${granularity} data for ${pair.id}, skipped`);
                continue;
            }

            this.push(contributions, pair.base, reading.score);
            this.push(contributions, pair.quote, -reading.score);
        }

        const averages = new Map<Currency, number>();
        for (const [currency, values] of contributions) {
            averages.set(currency, values.reduce((a, b) => a + b, 0) / values.length);
        }
        return averages;
    }

    scorePair(pair: CurrencyPair, candles: Candle[]): StrengthReading | null {
        if (candles.length === 0) return null;

        const { rsiPeriod, emaSlopePeriod, atrPeriod, weights } = this.config.strength;
        const closes = candles.map(c => c.close);

        const last = closes[closes.length - 1];
        const prev = closes[closes.length - 2];
        const priceChange = closes.length >= 2 && prev !== 0 ? ((last - prev) / prev) * 100 : 0;

        const rsiSeries = this.indicators.rsi(closes, rsiPeriod);
        const rsi = rsiSeries.length > 0 ? rsiSeries[rsiSeries.length - 1] : NEUTRAL_RSI;
        const emaSlope = this.indicators.emaSlope(closes, emaSlopePeriod);
        const atr = this.indicators.atr(candles, atrPeriod);

        const normalizedRsi = (rsi - 50) / 50;
        const score =
            weights.price * priceChange +
            weights.rsi * normalizedRsi * 100 +
            weights.ema * emaSlope * 100 +
            weights.atr * atr;

        return { pair: pair.id, priceChange, rsi, emaSlope, atr, score };
    }

    /**
     * Maps averages onto [-max, +max] by sort position, strongest first.
     * A computed 0 is pushed to +1 in the upper half and -1 in the lower half.
     */
    rankScores(averages: ReadonlyMap<Currency, number>): RankMap {
        const sorted = [...averages.entries()].sort((a, b) => b[1] - a[1]);
        const n = sorted.length;
        const ranks = new Map<Currency, number>();
        if (n < 2) return ranks;

        const maxRank = this.config.strength.maxRank;
        const minRank = -maxRank;

        sorted.forEach(([currency], idx) => {
            let rank = roundHalfAwayFromZero(maxRank - (idx * (maxRank - minRank)) / (n - 1));
            if (rank === 0) {
                rank = idx < n / 2 ? 1 : -1;
            }
            ranks.set(currency, rank);
        });

        return ranks;
    }

    private push(target: Map<Currency, number[]>, currency: Currency, value: number): void {
        const bucket = target.get(currency);
        if (bucket) {
            bucket.push(value);
        } else {
            target.set(currency, [value]);
        }
    }
}
