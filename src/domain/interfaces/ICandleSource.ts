import { Candle } from '../entities/Candle';
import { Granularity } from '../enums/Granularity';

export interface ICandleSource {
    /** Oldest first. Short or empty results are normal; implementations never throw. */
    get(pair: string, granularity: Granularity, count: number): Promise<Candle[]>;
}
