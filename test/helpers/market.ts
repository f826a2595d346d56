import { Granularity } from '../../src/domain/enums/Granularity';
import { bar, fromCloses, DAY_MS, HOUR_MS, MINUTE_MS } from './candles';
import { FakeCandleSource } from './fakes';

/** 14:00 UTC, 09:00 in New York: London session */
export const NOW = Date.UTC(2024, 0, 10, 14, 0);
const TODAY = Date.UTC(2024, 0, 10);

/**
 * EUR_USD closes the last H1 bar at 1.105, above yesterday's 1.104 high,
 * while M15 grinds higher.
 */
export function breakoutMarket(source: FakeCandleSource = new FakeCandleSource()): FakeCandleSource {
    const hourly = Array.from({ length: 30 }, (_, i) => (i < 29 ? 1.1 + 0.001 * (i % 2) : 1.105));
    const quarterHours = Array.from({ length: 30 }, (_, i) => 1.1 + 0.0002 * i);

    return source
        .set('EUR_USD', Granularity.H1, fromCloses(hourly, { end: NOW - HOUR_MS, spread: 0.0005 }))
        .set('EUR_USD', Granularity.D, [
            bar(TODAY - 2 * DAY_MS, 1.098, 1.102, 1.096, 1.1, { granularity: Granularity.D }),
            bar(TODAY - DAY_MS, 1.1, 1.104, 1.098, 1.101, { granularity: Granularity.D }),
            bar(TODAY, 1.101, 1.106, 1.1, 1.105, { granularity: Granularity.D, complete: false })
        ])
        .set('EUR_USD', Granularity.M15, fromCloses(quarterHours, {
            granularity: Granularity.M15,
            end: NOW - 15 * MINUTE_MS,
            stepMs: 15 * MINUTE_MS
        }));
}

/**
 * H4 history ranking EUR +7, GBP +2, CHF -2, USD -7:
 * EUR_USD trends up, GBP_CHF chops and ends on an up bar.
 */
export function strengthMarket(source: FakeCandleSource = new FakeCandleSource()): FakeCandleSource {
    const h4 = { granularity: Granularity.H4, end: NOW - 4 * HOUR_MS, stepMs: 4 * HOUR_MS, spread: 0.0005 };
    return source
        .set('EUR_USD', Granularity.H4, fromCloses(
            Array.from({ length: 20 }, (_, i) => 1.08 + 0.001 * i),
            { ...h4, pair: 'EUR_USD' }
        ))
        .set('GBP_CHF', Granularity.H4, fromCloses(
            Array.from({ length: 20 }, (_, i) => 1.1 + 0.001 * (i % 2)),
            { ...h4, pair: 'GBP_CHF' }
        ));
}
