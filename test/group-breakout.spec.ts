import { Container } from 'inversify';
import { createContainer, TYPES } from '../src/config/inversify.config';
import { RunGroupBreakoutAlert } from '../src/application/use-cases/RunGroupBreakoutAlert';
import { ICooldownStore } from '../src/domain/interfaces/ICooldownStore';
import { CooldownKey } from '../src/domain/value-objects/CooldownKey';
import { BreakoutStrategyName } from '../src/domain/enums/BreakoutStrategyName';
import { Granularity } from '../src/domain/enums/Granularity';
import { openDatabase, SqliteDatabase } from '../src/infrastructure/database/SqliteDatabase';
import { bar, HOUR_MS, MINUTE_MS } from './helpers/candles';
import { NOW } from './helpers/market';
import { FakeCandleSource, RecordingNotificationSink, testConfig, testEnv } from './helpers/fakes';

const LAST_BAR = NOW - HOUR_MS;

describe('RunGroupBreakoutAlert', () => {
    let db: SqliteDatabase;
    let notifier: RecordingNotificationSink;
    let container: Container;

    beforeEach(() => {
        db = openDatabase(':memory:');
        notifier = new RecordingNotificationSink();

        const source = new FakeCandleSource()
            // closes on its high
            .set('EUR_USD', Granularity.H1, [bar(LAST_BAR, 1.1, 1.102, 1.099, 1.102)])
            // closes on its low
            .set('GBP_USD', Granularity.H1, [bar(LAST_BAR, 1.27, 1.271, 1.268, 1.268, { pair: 'GBP_USD' })])
            .set('USD_JPY', Granularity.H1, [bar(LAST_BAR, 145, 145.5, 144.5, 145.1, { pair: 'USD_JPY' })]);

        container = createContainer(testEnv({ PAIRS: 'EUR_USD,GBP_USD,USD_JPY' }), {
            config: testConfig(c => {
                c.alerts.groupBreakout.strategy = BreakoutStrategyName.CURRENT_BAR;
                c.alerts.groupBreakout.minPairs = 2;
            }),
            database: db,
            candleSource: source,
            notifier
        });
    });

    afterEach(() => {
        db.close();
    });

    it('sends one combined alert for every pair that broke out', async () => {
        const alerted = await container.get(RunGroupBreakoutAlert).execute(NOW);

        expect(alerted).toEqual(['EUR_USD', 'GBP_USD']);
        expect(notifier.messages).toEqual([
            '📢 Breakout Alert! (2 pairs) - 2024-01-10 14:00 UTC\n\nEUR_USD\nGBP_USD'
        ]);
        const cooldowns = container.get<ICooldownStore>(TYPES.ICooldownStore);
        expect(cooldowns.lastFired(new CooldownKey('EUR_USD', 'group_breakout'))).toBe(NOW);
        expect(cooldowns.lastFired(new CooldownKey('USD_JPY', 'group_breakout'))).toBeUndefined();
    });

    it('holds back pairs still cooling down', async () => {
        const alert = container.get(RunGroupBreakoutAlert);

        await alert.execute(NOW);
        const repeat = await alert.execute(NOW + 30 * MINUTE_MS);

        expect(repeat).toEqual([]);
        expect(notifier.messages).toHaveLength(1);
    });

    it('stays silent below the minimum group size', async () => {
        container.get<ICooldownStore>(TYPES.ICooldownStore).record(new CooldownKey('GBP_USD', 'group_breakout'), NOW - MINUTE_MS);

        expect(await container.get(RunGroupBreakoutAlert).execute(NOW)).toEqual([]);
        expect(notifier.messages).toEqual([]);
    });

    it('records nothing when delivery fails', async () => {
        notifier.deliver = false;

        expect(await container.get(RunGroupBreakoutAlert).execute(NOW)).toEqual([]);
        expect(container.get<ICooldownStore>(TYPES.ICooldownStore).lastFired(new CooldownKey('EUR_USD', 'group_breakout'))).toBeUndefined();
    });
});
