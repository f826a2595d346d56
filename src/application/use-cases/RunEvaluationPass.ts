import { injectable, inject } from 'inversify';
import { IStrengthEngine } from '../../domain/interfaces/IStrengthEngine';
import { ISignalBuilder } from '../../domain/interfaces/ISignalBuilder';
import { ICooldownStore } from '../../domain/interfaces/ICooldownStore';
import { INotificationSink } from '../../domain/interfaces/INotificationSink';
import { PairUniverse } from '../../domain/value-objects/PairUniverse';
import { CooldownKey, CooldownCategory } from '../../domain/value-objects/CooldownKey';
import { TradeSignal } from '../../domain/value-objects/TradeSignal';
import { PairCandidate, RankMap } from '../../domain/types/SignalTypes';
import { SignalConfigType } from '../../config/signal.config';
import { TYPES } from '../../config/types';
import { SignalFormatter } from '../services/alerts/SignalFormatter';
import { Logger } from '../../shared/logger/Logger';

export interface EvaluationResult {
    ranks: RankMap;
    strengthAlertSent: boolean;
    candidates: PairCandidate[];
    signals: TradeSignal[];
}

export const STRENGTH_ALERT_KEY = new CooldownKey('ALL', CooldownCategory.CURRENCY_STRENGTH);

/**
 * One evaluation tick: rank currencies, publish the ranking when its
 * cooldown allows, then run the strongest candidates through the builder.
 */
@injectable()
export class RunEvaluationPass {
    private logger = Logger.getInstance();

    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType,
        @inject(TYPES.PairUniverse) private readonly universe: PairUniverse,
        @inject(TYPES.IStrengthEngine) private readonly strengthEngine: IStrengthEngine,
        @inject(TYPES.ISignalBuilder) private readonly signalBuilder: ISignalBuilder,
        @inject(TYPES.ICooldownStore) private readonly cooldowns: ICooldownStore,
        @inject(TYPES.INotificationSink) private readonly notifier: INotificationSink,
        @inject(TYPES.SignalFormatter) private readonly formatter: SignalFormatter
    ) {}

    async execute(now: number = Date.now()): Promise<EvaluationResult> {
        const ranks = await this.strengthEngine.computeRanks();
        if (ranks.size === 0) {
            this.logger.warn('No currency ranks this tick (no candle data)');
            return { ranks, strengthAlertSent: false, candidates: [], signals: [] };
        }

        const strengthAlertSent = await this.sendStrengthAlert(ranks, now);
        const candidates = this.selectCandidates(ranks);
        const signals: TradeSignal[] = [];

        for (const candidate of candidates.slice(0, this.config.signal.maxCandidatesPerTick)) {
            this.logger.debug(
                `Candidate ${candidate.pair.id}: ${candidate.baseRank}/${candidate.quoteRank} (diff ${candidate.differential})`
            );
            const signal = await this.signalBuilder.build(candidate.pair.id, ranks, now);
            if (signal) signals.push(signal);
        }

        return { ranks, strengthAlertSent, candidates, signals };
    }

    /** Tradable pairs with both ranks known, widest rank differential first */
    selectCandidates(ranks: RankMap): PairCandidate[] {
        const candidates: PairCandidate[] = [];
        for (const pair of this.universe.list()) {
            const baseRank = ranks.get(pair.base);
            const quoteRank = ranks.get(pair.quote);
            if (baseRank === undefined || quoteRank === undefined) continue;
            candidates.push({ pair, baseRank, quoteRank, differential: Math.abs(baseRank - quoteRank) });
        }
        return candidates.sort((a, b) => b.differential - a.differential);
    }

    private async sendStrengthAlert(ranks: RankMap, now: number): Promise<boolean> {
        const windowMs = this.config.alerts.strengthCooldownMs;
        if (!this.cooldowns.isAllowed(STRENGTH_ALERT_KEY, now, windowMs)) {
            const last = this.cooldowns.lastFired(STRENGTH_ALERT_KEY) ?? now;
            const remaining = (windowMs - (now - last)) / 60_000;
            this.logger.info(`Skipping currency strength alert. Cooldown remaining: ${remaining.toFixed(1)} minutes`);
            return false;
        }

        if (!(await this.notifier.send(this.formatter.strengthAlert(ranks)))) {
            return false;
        }
        this.cooldowns.record(STRENGTH_ALERT_KEY, now);
        this.logger.info('Sent currency strength alert');
        return true;
    }
}
