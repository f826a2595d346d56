import { CurrentBarBreakout } from '../src/application/services/detection/strategies/CurrentBarBreakout';
import { PriorBarBreakout } from '../src/application/services/detection/strategies/PriorBarBreakout';
import { PriorDayBreakout } from '../src/application/services/detection/strategies/PriorDayBreakout';
import { RangeBreakout } from '../src/application/services/detection/strategies/RangeBreakout';
import { SwingMomentumBreakout } from '../src/application/services/detection/strategies/SwingMomentumBreakout';
import { BreakoutDetector } from '../src/application/services/detection/BreakoutDetector';
import { RangeDetector } from '../src/application/services/detection/RangeDetector';
import { IndicatorsProvider } from '../src/application/services/indicators/IndicatorsProvider';
import { SignalConfigType } from '../src/config/signal.config';
import { CurrencyPair } from '../src/domain/value-objects/CurrencyPair';
import { BreakoutContext } from '../src/domain/types/SignalTypes';
import { Candle } from '../src/domain/entities/Candle';
import { Granularity } from '../src/domain/enums/Granularity';
import { TradeDirection } from '../src/domain/enums/TradeDirection';
import { BreakoutStrategyName } from '../src/domain/enums/BreakoutStrategyName';
import { bar, fromCloses, DAY_MS, HOUR_MS } from './helpers/candles';
import { testConfig } from './helpers/fakes';

const pair = CurrencyPair.parse('EUR_USD');
const indicators = new IndicatorsProvider();

function context(candles: Candle[], dailyCandles?: Candle[]): BreakoutContext {
    return { pair, candles, timeframe: Granularity.H1, dailyCandles };
}

function rangeBreakout(mutate: (config: SignalConfigType) => void = () => undefined): RangeBreakout {
    return new RangeBreakout(testConfig(mutate), indicators, new RangeDetector(indicators));
}

describe('CurrentBarBreakout', () => {
    const strategy = new CurrentBarBreakout();

    it('fires when the bar closes on its high', () => {
        const event = strategy.detect(context([bar(100, 1, 2, 0.5, 2)]));
        expect(event?.direction).toBe(TradeDirection.BUY);
        expect(event?.level).toBe(2);
        expect(event?.tag).toBe('H1:current-bar');
    });

    it('fires SELL when the bar closes on its low', () => {
        const event = strategy.detect(context([bar(100, 1, 2, 0.5, 0.5)]));
        expect(event?.direction).toBe(TradeDirection.SELL);
        expect(event?.level).toBe(0.5);
    });

    it('ignores closes inside the bar and zero-range bars', () => {
        expect(strategy.detect(context([bar(100, 1, 2, 0.5, 1.5)]))).toBeNull();
        expect(strategy.detect(context([bar(100, 1, 1, 1, 1)]))).toBeNull();
        expect(strategy.detect(context([]))).toBeNull();
    });
});

describe('PriorBarBreakout', () => {
    const strategy = new PriorBarBreakout();
    const prev = bar(100, 1.1, 1.2, 1.0, 1.1);

    it('breaks the previous high', () => {
        const event = strategy.detect(context([prev, bar(200, 1.1, 1.26, 1.1, 1.25)]));
        expect(event?.direction).toBe(TradeDirection.BUY);
        expect(event?.level).toBe(1.2);
        expect(event?.timestamp).toBe(200);
        expect(event?.close).toBe(1.25);
    });

    it('breaks the previous low', () => {
        const event = strategy.detect(context([prev, bar(200, 1.1, 1.1, 0.94, 0.95)]));
        expect(event?.direction).toBe(TradeDirection.SELL);
        expect(event?.level).toBe(1.0);
    });

    it('needs two bars and a close outside', () => {
        expect(strategy.detect(context([prev]))).toBeNull();
        expect(strategy.detect(context([prev, bar(200, 1.1, 1.19, 1.01, 1.15)]))).toBeNull();
    });
});

describe('PriorDayBreakout', () => {
    const yesterday = Date.UTC(2024, 0, 9);
    const today = yesterday + DAY_MS;
    const daily = [
        bar(yesterday - DAY_MS, 1.10, 1.12, 1.08, 1.11, { granularity: Granularity.D }),
        bar(yesterday, 1.11, 1.20, 1.10, 1.15, { granularity: Granularity.D }),
        bar(today, 1.15, 1.30, 1.14, 1.21, { granularity: Granularity.D, complete: false })
    ];
    const h1 = (closes: number[]) => fromCloses(closes, { end: today + 10 * HOUR_MS });

    it('compares against the last completed daily bar', () => {
        const strategy = new PriorDayBreakout(testConfig());
        const event = strategy.detect(context(h1([1.17, 1.19, 1.21]), daily));

        expect(event?.direction).toBe(TradeDirection.BUY);
        expect(event?.level).toBe(1.20);
        expect(event?.tag).toBe('H1:prior-day');
    });

    it('breaks below the prior day low', () => {
        const strategy = new PriorDayBreakout(testConfig());
        const event = strategy.detect(context(h1([1.12, 1.11, 1.09]), daily));

        expect(event?.direction).toBe(TradeDirection.SELL);
        expect(event?.level).toBe(1.10);
    });

    it('only looks at the latest bar by default', () => {
        const strategy = new PriorDayBreakout(testConfig());
        expect(strategy.detect(context(h1([1.17, 1.21, 1.19]), daily))).toBeNull();
    });

    it('scans further back when scanBars allows it', () => {
        const strategy = new PriorDayBreakout(testConfig(c => { c.breakout.priorDay.scanBars = 3; }));
        const candles = h1([1.17, 1.21, 1.19]);
        const event = strategy.detect(context(candles, daily));

        expect(event?.direction).toBe(TradeDirection.BUY);
        expect(event?.timestamp).toBe(candles[1].timestamp);
        expect(event?.close).toBe(1.21);
    });

    it('returns null without completed daily bars', () => {
        const strategy = new PriorDayBreakout(testConfig());
        expect(strategy.detect(context(h1([1.21])))).toBeNull();
        expect(strategy.detect(context(h1([1.21]), [daily[2]]))).toBeNull();
    });
});

describe('RangeBreakout', () => {
    const boxed = [
        bar(1, 1.05, 1.10, 1.00, 1.05),
        bar(2, 1.05, 1.20, 1.05, 1.10),
        bar(3, 1.10, 1.15, 1.02, 1.12)
    ];

    it('breaks the extremes of the previous bars', () => {
        const strategy = rangeBreakout(c => { c.breakout.range.lookback = 3; });

        const up = strategy.detect(context([...boxed, bar(4, 1.12, 1.26, 1.12, 1.25)]));
        expect(up?.direction).toBe(TradeDirection.BUY);
        expect(up?.level).toBe(1.20);

        const down = strategy.detect(context([...boxed, bar(4, 1.12, 1.12, 0.98, 0.99)]));
        expect(down?.direction).toBe(TradeDirection.SELL);
        expect(down?.level).toBe(1.00);
    });

    it('needs lookback + 1 bars', () => {
        const strategy = rangeBreakout(c => { c.breakout.range.lookback = 3; });
        expect(strategy.detect(context(boxed))).toBeNull();
    });

    describe('swing levels', () => {
        const window = [
            bar(1, 1, 1.00, 0.90, 1),
            bar(2, 1, 1.20, 0.95, 1),
            bar(3, 1, 1.10, 0.97, 1),
            bar(4, 1, 1.05, 0.99, 1),
            bar(5, 1, 1.40, 1.00, 1)
        ];
        const last = bar(6, 1, 1.31, 1.2, 1.30);

        it('uses the swing high inside the window', () => {
            const strategy = rangeBreakout(c => {
                c.breakout.range.lookback = 5;
                c.breakout.range.levelSource = 'swings';
            });
            const event = strategy.detect(context([...window, last]));
            expect(event?.direction).toBe(TradeDirection.BUY);
            expect(event?.level).toBe(1.20);
        });

        it('does not fire on the same bars with extreme levels', () => {
            const strategy = rangeBreakout(c => { c.breakout.range.lookback = 5; });
            expect(strategy.detect(context([...window, last]))).toBeNull();
        });
    });

    describe('trend filter', () => {
        const strategy = rangeBreakout(c => {
            c.breakout.range.lookback = 3;
            c.breakout.range.trendFilter = { enabled: true, emaPeriod: 3 };
        });
        const candles = [...boxed, bar(4, 1.12, 1.26, 1.12, 1.25)];
        const dailyFrom = (closes: number[]) => fromCloses(closes, { granularity: Granularity.D, stepMs: DAY_MS });

        it('asks for emaPeriod + 1 daily bars', () => {
            expect(strategy.dailyBarsRequired).toBe(4);
        });

        it('keeps a breakout in the direction of the daily trend', () => {
            expect(strategy.detect(context(candles, dailyFrom([1, 2, 3, 4])))?.direction).toBe(TradeDirection.BUY);
        });

        it('drops a breakout against the daily trend', () => {
            expect(strategy.detect(context(candles, dailyFrom([4, 3, 2, 1])))).toBeNull();
        });

        it('drops the breakout when the daily EMA cannot be computed', () => {
            expect(strategy.detect(context(candles, dailyFrom([1, 2])))).toBeNull();
        });
    });
});

describe('SwingMomentumBreakout', () => {
    const strategy = new SwingMomentumBreakout(
        testConfig(c => {
            c.breakout.swingMomentum = {
                minBars: 5,
                emaPeriod: 3,
                rsiPeriod: 3,
                rsiBuyAbove: 55,
                rsiSellBelow: 45,
                atrPeriod: 3,
                atrMultiplier: 0.5
            };
        }),
        indicators
    );

    it('confirms a close above the swing high with momentum', () => {
        const event = strategy.detect(context(fromCloses([100, 102, 101, 103, 102, 110], { spread: 1 })));
        expect(event?.direction).toBe(TradeDirection.BUY);
        expect(event?.level).toBe(104);
        expect(event?.close).toBe(110);
    });

    it('confirms the mirrored SELL', () => {
        const event = strategy.detect(context(fromCloses([110, 108, 109, 107, 108, 100], { spread: 1 })));
        expect(event?.direction).toBe(TradeDirection.SELL);
        expect(event?.level).toBe(106);
    });

    it('confirms a momentum bar when the series has no swing high', () => {
        const event = strategy.detect(context(fromCloses([100, 101, 102, 103, 104, 110], { spread: 1 })));
        expect(event?.direction).toBe(TradeDirection.BUY);
        expect(event?.level).toBe(104);
        expect(event?.close).toBe(110);
    });

    it('rejects a close that only reaches the swing high', () => {
        expect(strategy.detect(context(fromCloses([100, 102, 101, 103, 102, 104], { spread: 1 })))).toBeNull();
    });

    it('rejects short series', () => {
        expect(strategy.detect(context(fromCloses([100, 102, 101, 110], { spread: 1 })))).toBeNull();
    });
});

describe('BreakoutDetector', () => {
    const detector = new BreakoutDetector([
        new PriorBarBreakout(),
        new CurrentBarBreakout(),
        new PriorDayBreakout(testConfig())
    ]);
    // Closes on its high and above the previous high
    const candles = [bar(1, 1.0, 1.1, 0.9, 1.0), bar(2, 1.0, 1.2, 1.0, 1.2)];

    it('returns the first confirming strategy in the given order', () => {
        expect(detector.detectFirst([BreakoutStrategyName.CURRENT_BAR, BreakoutStrategyName.PRIOR_BAR], context(candles))?.strategy)
            .toBe(BreakoutStrategyName.CURRENT_BAR);
        expect(detector.detectFirst([BreakoutStrategyName.PRIOR_BAR, BreakoutStrategyName.CURRENT_BAR], context(candles))?.strategy)
            .toBe(BreakoutStrategyName.PRIOR_BAR);
    });

    it('skips strategies that do not fire', () => {
        const event = detector.detectFirst([BreakoutStrategyName.PRIOR_DAY, BreakoutStrategyName.PRIOR_BAR], context(candles));
        expect(event?.strategy).toBe(BreakoutStrategyName.PRIOR_BAR);
    });

    it('treats an unregistered strategy as no breakout', () => {
        expect(detector.detect(BreakoutStrategyName.RANGE, context(candles))).toBeNull();
    });

    it('reports the daily bars the selected strategies need', () => {
        expect(detector.dailyBarsRequired([BreakoutStrategyName.PRIOR_BAR])).toBe(0);
        expect(detector.dailyBarsRequired([BreakoutStrategyName.PRIOR_BAR, BreakoutStrategyName.PRIOR_DAY])).toBe(3);
    });
});
