import { injectable, inject } from 'inversify';
import { ICandleSource } from '../../../domain/interfaces/ICandleSource';
import { Candle } from '../../../domain/entities/Candle';
import { Granularity } from '../../../domain/enums/Granularity';
import { Env } from '../../../config/env';
import { TYPES } from '../../../config/types';
import { RetryPolicy } from '../../../shared/utils/RetryPolicy';
import { HttpError } from '../../../shared/errors/HttpError';
import { Logger } from '../../../shared/logger/Logger';
import { OandaCandleMapper } from './OandaCandleMapper';
import { oandaCandlesResponseSchema } from './types/OandaTypes';

/**
 * Mid-price candles from the OANDA v20 REST API.
 * Every failure, after retries, degrades to an empty result.
 */
@injectable()
export class OandaCandleSource implements ICandleSource {
    private logger = Logger.getInstance();
    private warnedMissingToken = false;

    constructor(
        @inject(TYPES.Env) private readonly env: Env,
        @inject(TYPES.RetryPolicy) private readonly retry: RetryPolicy
    ) {}

    async get(pair: string, granularity: Granularity, count: number): Promise<Candle[]> {
        const token = this.env.OANDA_TOKEN;
        if (!token) {
            if (!this.warnedMissingToken) {
                this.logger.warn('OANDA_TOKEN is not set, no candles will be fetched');
                this.warnedMissingToken = true;
            }
            return [];
        }

        try {
            return await this.retry.execute(attempt => {
                if (attempt > 1) {
                    this.logger.debug(`Retrying ${pair} ${granularity} candles (attempt ${attempt})`);
                }
                return this.fetchCandles(token, pair, granularity, count);
            });
        } catch (error) {
            this.logger.error(`Failed to get recent candles for ${pair} at ${granularity}`, error);
            return [];
        }
    }

    private async fetchCandles(token: string, pair: string, granularity: Granularity, count: number): Promise<Candle[]> {
        const params = new URLSearchParams({
            granularity,
            count: count.toString(),
            price: 'M'
        });
        const url = `${this.env.OANDA_API}/instruments/${pair}/candles?${params}`;

        const response = await fetch(url, {
            headers: {
                'Authorization': `Bearer ${token}`,
                'Content-Type': 'application/json',
                'Accept-Datetime-Format': 'UNIX'
            }
        });

        if (!response.ok) {
            throw new HttpError(response.status, url, await response.text());
        }

        const json: unknown = await response.json();
        const parsed = oandaCandlesResponseSchema.safeParse(json);
        if (!parsed.success) {
            throw new Error(`Unexpected OANDA candle payload for ${pair}: ${parsed.error.issues[0]?.message}`);
        }

        return OandaCandleMapper.toDomainArray(parsed.data.candles, pair, granularity);
    }
}
