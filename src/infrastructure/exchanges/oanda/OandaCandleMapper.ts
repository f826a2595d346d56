import { Candle } from '../../../domain/entities/Candle';
import { Granularity } from '../../../domain/enums/Granularity';
import { OandaCandleData } from './types/OandaTypes';

export class OandaCandleMapper {
    /** Expects `Accept-Datetime-Format: UNIX`, i.e. `time` in fractional seconds */
    static toDomain(data: OandaCandleData, pair: string, granularity: Granularity): Candle {
        return new Candle(
            Math.round(parseFloat(data.time) * 1000),
            parseFloat(data.mid.o),
            parseFloat(data.mid.h),
            parseFloat(data.mid.l),
            parseFloat(data.mid.c),
            pair,
            granularity,
            data.complete
        );
    }

    static toDomainArray(data: OandaCandleData[], pair: string, granularity: Granularity): Candle[] {
        return data
            .map(item => this.toDomain(item, pair, granularity))
            .filter(candle => Number.isFinite(candle.timestamp))
            .sort((a, b) => a.timestamp - b.timestamp);
    }
}
