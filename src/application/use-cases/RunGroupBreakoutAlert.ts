import { injectable, inject } from 'inversify';
import { ICandleSource } from '../../domain/interfaces/ICandleSource';
import { IBreakoutDetector } from '../../domain/interfaces/IBreakoutDetector';
import { ICooldownStore } from '../../domain/interfaces/ICooldownStore';
import { INotificationSink } from '../../domain/interfaces/INotificationSink';
import { PairUniverse } from '../../domain/value-objects/PairUniverse';
import { CooldownKey, CooldownCategory } from '../../domain/value-objects/CooldownKey';
import { Granularity } from '../../domain/enums/Granularity';
import { SignalConfigType } from '../../config/signal.config';
import { TYPES } from '../../config/types';
import { SignalFormatter } from '../services/alerts/SignalFormatter';
import { Logger } from '../../shared/logger/Logger';

/**
 * Scans every tradable pair with the group strategy and sends one combined
 * alert once enough pairs broke out outside their cooldown.
 */
@injectable()
export class RunGroupBreakoutAlert {
    private logger = Logger.getInstance();

    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType,
        @inject(TYPES.PairUniverse) private readonly universe: PairUniverse,
        @inject(TYPES.ICandleSource) private readonly candles: ICandleSource,
        @inject(TYPES.IBreakoutDetector) private readonly breakoutDetector: IBreakoutDetector,
        @inject(TYPES.ICooldownStore) private readonly cooldowns: ICooldownStore,
        @inject(TYPES.INotificationSink) private readonly notifier: INotificationSink,
        @inject(TYPES.SignalFormatter) private readonly formatter: SignalFormatter
    ) {}

    /** Pair ids included in a delivered alert; empty when nothing was sent */
    async execute(now: number = Date.now()): Promise<string[]> {
        const { strategy, timeframe, bars, minPairs, cooldownMs } = this.config.alerts.groupBreakout;
        const dailyBars = this.breakoutDetector.dailyBarsRequired([strategy]);
        const broken: string[] = [];

        for (const pair of this.universe.list()) {
            const candles = await this.candles.get(pair.id, timeframe, bars);
            if (candles.length === 0) continue;

            const dailyCandles = dailyBars > 0
                ? await this.candles.get(pair.id, Granularity.D, dailyBars)
                : undefined;

            const event = this.breakoutDetector.detect(strategy, { pair, candles, timeframe, dailyCandles });
            if (!event) continue;

            const key = this.keyFor(pair.id);
            if (this.cooldowns.isAllowed(key, now, cooldownMs)) {
                this.logger.info(`Breakout detected for ${pair.id} (will alert)`);
                broken.push(pair.id);
            } else {
                this.logger.info(`Breakout detected for ${pair.id} but cooldown active`);
            }
        }

        if (broken.length < minPairs) {
            this.logger.debug(`Group breakout: ${broken.length}/${minPairs} pairs`);
            return [];
        }

        if (!(await this.notifier.send(this.formatter.groupBreakout(broken, now)))) {
            return [];
        }
        for (const id of broken) {
            this.cooldowns.record(this.keyFor(id), now);
        }
        this.logger.info(`Sent breakout alert for pairs: ${broken.join(', ')}`);
        return broken;
    }

    private keyFor(pairId: string): CooldownKey {
        return new CooldownKey(pairId, CooldownCategory.GROUP_BREAKOUT);
    }
}
