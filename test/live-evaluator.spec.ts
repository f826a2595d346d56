import { Container } from 'inversify';
import { createContainer, TYPES } from '../src/config/inversify.config';
import { RunLiveEvaluator, HEARTBEAT_KEY } from '../src/application/use-cases/RunLiveEvaluator';
import { ICooldownStore } from '../src/domain/interfaces/ICooldownStore';
import { IActiveTrades } from '../src/domain/interfaces/IActiveTrades';
import { CooldownKey } from '../src/domain/value-objects/CooldownKey';
import { CurrencyPair } from '../src/domain/value-objects/CurrencyPair';
import { TradeSignal } from '../src/domain/value-objects/TradeSignal';
import { TradeDirection } from '../src/domain/enums/TradeDirection';
import { TradingSession } from '../src/domain/enums/TradingSession';
import { openDatabase, SqliteDatabase } from '../src/infrastructure/database/SqliteDatabase';
import { DAY_MS, HOUR_MS, MINUTE_MS } from './helpers/candles';
import { NOW } from './helpers/market';
import { FakeCandleSource, RecordingNotificationSink, StaticCalendar, testEnv } from './helpers/fakes';

const HEARTBEAT = '💓 Heartbeat: FX signal engine is running';

function openTrade(pair: string): TradeSignal {
    return TradeSignal.create({
        pair: CurrencyPair.parse(pair),
        direction: TradeDirection.BUY,
        entry: 1.1,
        stopLoss: 1.099,
        takeProfits: [1.102],
        strengthDifferential: 14,
        strongRank: 7,
        weakRank: -7,
        atr: 0.001,
        diagnostics: { decisionRsi: 60, entryRsi: 55, breakoutTag: 'H1:prior-day', scenario: 'prior-day' },
        createdAt: NOW - HOUR_MS
    });
}

describe('RunLiveEvaluator', () => {
    let db: SqliteDatabase;
    let notifier: RecordingNotificationSink;
    let calendar: StaticCalendar;
    let container: Container;

    beforeEach(() => {
        db = openDatabase(':memory:');
        notifier = new RecordingNotificationSink();
        calendar = new StaticCalendar();
        container = createContainer(testEnv({ PAIRS: 'EUR_USD' }), {
            database: db,
            candleSource: new FakeCandleSource(),
            notifier,
            calendar
        });
    });

    afterEach(() => {
        db.close();
    });

    it('sends the heartbeat once per day', async () => {
        const evaluator = container.get(RunLiveEvaluator);

        await evaluator.runTick(NOW);
        await evaluator.runTick(NOW + HOUR_MS);
        expect(notifier.messages).toEqual([HEARTBEAT]);

        await evaluator.runTick(NOW + DAY_MS);
        expect(notifier.messages).toEqual([HEARTBEAT, HEARTBEAT]);
        expect(container.get<ICooldownStore>(TYPES.ICooldownStore).lastFired(HEARTBEAT_KEY)).toBe(NOW + DAY_MS);
    });

    it('drops session cooldowns left over from another session', async () => {
        const cooldowns = container.get<ICooldownStore>(TYPES.ICooldownStore);
        const asian = CooldownKey.forSession('EUR_USD', TradingSession.ASIAN);
        const london = CooldownKey.forSession('EUR_USD', TradingSession.LONDON);
        cooldowns.record(asian, NOW - 8 * HOUR_MS);
        cooldowns.record(london, NOW - MINUTE_MS);

        await container.get(RunLiveEvaluator).runTick(NOW);

        expect(cooldowns.lastFired(asian)).toBeUndefined();
        expect(cooldowns.lastFired(london)).toBe(NOW - MINUTE_MS);
    });

    it('warns about upcoming news for currencies in open trades', async () => {
        container.get<IActiveTrades>(TYPES.IActiveTrades).add(openTrade('EUR_USD'));
        calendar.events = [
            { id: 'usd-cpi', time: NOW + 30 * MINUTE_MS, currency: 'USD', impact: 'High', title: 'CPI m/m' },
            { id: 'jpy-boj', time: NOW + 10 * MINUTE_MS, currency: 'JPY', impact: 'High', title: 'BoJ Rate' },
            { id: 'eur-pmi', time: NOW + 20 * MINUTE_MS, currency: 'EUR', impact: 'Low', title: 'PMI' }
        ];
        const evaluator = container.get(RunLiveEvaluator);

        await evaluator.runTick(NOW);
        await evaluator.runTick(NOW + 5 * MINUTE_MS);

        expect(notifier.messages).toEqual([
            HEARTBEAT,
            '⚠️ News Alert for EUR_USD trade!\nUSD - CPI m/m (High)\nTime: 2024-01-10 14:30 UTC'
        ]);
    });

    it('skips the news check without open trades', async () => {
        calendar.events = [
            { id: 'usd-cpi', time: NOW + 30 * MINUTE_MS, currency: 'USD', impact: 'High', title: 'CPI m/m' }
        ];
        const upcoming = jest.spyOn(calendar, 'upcoming');

        await container.get(RunLiveEvaluator).runTick(NOW);

        expect(upcoming).not.toHaveBeenCalled();
    });

    it('wakes from the interval sleep when stopped', async () => {
        const evaluator = container.get(RunLiveEvaluator);
        const tick = jest.spyOn(evaluator, 'runTick');

        const running = evaluator.start({ intervalMs: 60_000 });
        await new Promise(resolve => setTimeout(resolve, 50));
        evaluator.stop();
        await running;

        expect(tick).toHaveBeenCalledTimes(1);
        expect(notifier.messages).toEqual([HEARTBEAT]);
    });

    it('flushes both stores on the way out', () => {
        const evaluator = container.get(RunLiveEvaluator);
        const cooldownFlush = jest.spyOn(container.get<ICooldownStore>(TYPES.ICooldownStore), 'flush');
        const tradesFlush = jest.spyOn(container.get<IActiveTrades>(TYPES.IActiveTrades), 'flush');

        expect(evaluator.persistState()).toBe(true);
        expect(cooldownFlush).toHaveBeenCalledTimes(1);
        expect(tradesFlush).toHaveBeenCalledTimes(1);
    });
});
