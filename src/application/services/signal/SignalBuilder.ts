import { injectable, inject } from 'inversify';
import { ISignalBuilder } from '../../../domain/interfaces/ISignalBuilder';
import { ICandleSource } from '../../../domain/interfaces/ICandleSource';
import { IIndicators } from '../../../domain/interfaces/IIndicators';
import { IBreakoutDetector } from '../../../domain/interfaces/IBreakoutDetector';
import { IStrengthPolicy } from '../../../domain/interfaces/IStrengthPolicy';
import { IRetestValidator } from '../../../domain/interfaces/IRetestValidator';
import { IPullbackStateMachine } from '../../../domain/interfaces/IPullbackStateMachine';
import { IRiskEngine } from '../../../domain/interfaces/IRiskEngine';
import { ICooldownStore } from '../../../domain/interfaces/ICooldownStore';
import { IActiveTrades } from '../../../domain/interfaces/IActiveTrades';
import { INotificationSink } from '../../../domain/interfaces/INotificationSink';
import { Candle } from '../../../domain/entities/Candle';
import { CurrencyPair } from '../../../domain/value-objects/CurrencyPair';
import { PairUniverse } from '../../../domain/value-objects/PairUniverse';
import { CooldownKey, CooldownCategory } from '../../../domain/value-objects/CooldownKey';
import { BreakoutEvent } from '../../../domain/value-objects/BreakoutEvent';
import { TradeSignal } from '../../../domain/value-objects/TradeSignal';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { Granularity } from '../../../domain/enums/Granularity';
import { DirectionalRanks, RankMap, SignalDecision, SignalGate } from '../../../domain/types/SignalTypes';
import { SignalConfigType } from '../../../config/signal.config';
import { TYPES } from '../../../config/types';
import { Logger } from '../../../shared/logger/Logger';
import { SignalFormatter } from '../alerts/SignalFormatter';
import { TradingSessionClock } from '../session/TradingSessionClock';

type Rejection = { ok: false; gate: SignalGate; reason: string };

function reject(gate: SignalGate, reason: string): Rejection {
    return { ok: false, gate, reason };
}

/**
 * Runs one pair through the gate chain:
 * cooldown → breakout → direction/strength → trend/momentum → retest → risk.
 *
 * `evaluate` only decides. `build` also emits: notify, record the cooldown,
 * register the trade and reset the pair's pullback state.
 */
@injectable()
export class SignalBuilder implements ISignalBuilder {
    private logger = Logger.getInstance();

    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType,
        @inject(TYPES.PairUniverse) private readonly universe: PairUniverse,
        @inject(TYPES.ICandleSource) private readonly candles: ICandleSource,
        @inject(TYPES.IIndicators) private readonly indicators: IIndicators,
        @inject(TYPES.IBreakoutDetector) private readonly breakoutDetector: IBreakoutDetector,
        @inject(TYPES.IStrengthPolicy) private readonly strengthPolicy: IStrengthPolicy,
        @inject(TYPES.IRetestValidator) private readonly retestValidator: IRetestValidator,
        @inject(TYPES.IPullbackStateMachine) private readonly pullback: IPullbackStateMachine,
        @inject(TYPES.IRiskEngine) private readonly riskEngine: IRiskEngine,
        @inject(TYPES.ICooldownStore) private readonly cooldowns: ICooldownStore,
        @inject(TYPES.IActiveTrades) private readonly activeTrades: IActiveTrades,
        @inject(TYPES.INotificationSink) private readonly notifier: INotificationSink,
        @inject(TYPES.SignalFormatter) private readonly formatter: SignalFormatter,
        @inject(TYPES.TradingSessionClock) private readonly sessionClock: TradingSessionClock
    ) {}

    async build(pair: string, rankMap: RankMap, now: number = Date.now()): Promise<TradeSignal | null> {
        const decision = await this.evaluate(pair, rankMap, now);
        if (!decision.ok) {
            if (this.config.debug) {
                this.logger.debug(`${pair}: no signal [${decision.gate}] ${decision.reason}`);
            }
            return null;
        }

        const signal = decision.signal;
        const delivered = await this.notifier.send(this.formatter.tradeSignal(signal));
        if (!delivered) {
            this.logger.warn(`${signal.pair.id}: trade signal notification was not delivered`);
        }

        this.cooldowns.record(this.cooldownKey(signal.pair, now), now);
        this.activeTrades.add(signal);
        this.pullback.reset(signal.pair.id);

        this.logger.info(
            `Trade triggered: ${signal.pair.id} | Direction: ${signal.direction} | ` +
            `Strength Diff: ${signal.strengthDifferential.toFixed(1)} | ` +
            `Decision RSI: ${signal.diagnostics.decisionRsi.toFixed(1)} | Entry RSI: ${signal.diagnostics.entryRsi.toFixed(1)}`
        );
        return signal;
    }

    async evaluate(pairId: string, rankMap: RankMap, now: number = Date.now()): Promise<SignalDecision> {
        const pair = this.universe.resolve(pairId);
        if (!pair) return reject('universe', `${pairId} is not an allow-listed pair`);

        // Cooldown
        const key = this.cooldownKey(pair, now);
        if (!this.cooldowns.isAllowed(key, now, this.config.signal.cooldownMs)) {
            return reject('cooldown', `${key.toString()} fired at ${this.cooldowns.lastFired(key)}`);
        }

        // Breakout
        const { strategies, decisionTimeframe, decisionBars } = this.config.breakout;
        const decisionCandles = await this.candles.get(pair.id, decisionTimeframe, decisionBars);
        if (decisionCandles.length === 0) return reject('breakout', `no ${decisionTimeframe} candles`);

        const dailyBars = this.breakoutDetector.dailyBarsRequired(strategies);
        const dailyCandles = dailyBars > 0
            ? await this.candles.get(pair.id, Granularity.D, dailyBars)
            : undefined;

        const breakout = this.breakoutDetector.detectFirst(strategies, {
            pair,
            candles: decisionCandles,
            timeframe: decisionTimeframe,
            dailyCandles
        });
        if (!breakout) return reject('breakout', `no breakout on ${decisionTimeframe} (${strategies.join(', ')})`);

        // Direction & strength
        const ranks = this.directionalRanks(pair, rankMap);
        if (!ranks) return reject('direction', `no usable ranks for ${pair.base}/${pair.quote}`);
        if (ranks.direction !== breakout.direction) {
            return reject('direction', `${breakout.direction} breakout against ${ranks.direction} strength`);
        }
        if (!this.strengthPolicy.accepts(ranks.strongRank, ranks.weakRank)) {
            return reject('strength', `${ranks.strongRank}/${ranks.weakRank} rejected by ${this.strengthPolicy.description}`);
        }

        // Trend
        const { rsiPeriod, midpoint } = this.config.momentum;
        const decisionRsiSeries = this.indicators.rsi(decisionCandles.map(c => c.close), rsiPeriod);
        if (decisionRsiSeries.length === 0) return reject('trend', `not enough ${decisionTimeframe} bars for RSI`);
        const decisionRsi = decisionRsiSeries[decisionRsiSeries.length - 1];
        const trendOk = ranks.direction === TradeDirection.BUY ? decisionRsi >= midpoint : decisionRsi <= midpoint;
        if (!trendOk) return reject('trend', `${decisionTimeframe} RSI ${decisionRsi.toFixed(1)} against ${ranks.direction}`);

        // Momentum
        const { executionTimeframe, executionBars } = this.config.momentum;
        const executionCandles = await this.candles.get(pair.id, executionTimeframe, executionBars);
        const entryRsiSeries = this.indicators.rsi(executionCandles.map(c => c.close), rsiPeriod);
        if (entryRsiSeries.length === 0) return reject('momentum', `not enough ${executionTimeframe} bars for RSI`);
        const entryRsi = entryRsiSeries[entryRsiSeries.length - 1];
        const momentumFailure = this.checkMomentum(pair, ranks.direction, executionCandles, entryRsiSeries);
        if (momentumFailure) return reject('momentum', momentumFailure);

        // Retest
        if (this.config.retest.enabled && !this.isRetested(executionCandles, breakout)) {
            return reject('retest', `no retest of ${breakout.level} on ${executionTimeframe}`);
        }

        // Risk
        const atr = this.indicators.atr(decisionCandles, this.config.risk.atrPeriod);
        const entry = executionCandles[executionCandles.length - 1].close;
        const levels = this.riskEngine.computeLevels(ranks.direction, entry, atr);
        if (!levels) return reject('risk', `cannot size risk (ATR ${atr})`);

        const signal = TradeSignal.create({
            pair,
            direction: ranks.direction,
            entry: levels.entry,
            stopLoss: levels.stopLoss,
            takeProfits: levels.takeProfits,
            strengthDifferential: Math.abs(ranks.strongRank - ranks.weakRank),
            strongRank: ranks.strongRank,
            weakRank: ranks.weakRank,
            atr: levels.atr,
            diagnostics: {
                decisionRsi,
                entryRsi,
                breakoutTag: breakout.tag,
                scenario: breakout.strategy
            },
            createdAt: now
        });
        return { ok: true, signal };
    }

    cooldownKey(pair: CurrencyPair, now: number): CooldownKey {
        return this.config.signal.cooldownScope === 'session'
            ? CooldownKey.forSession(pair.id, this.sessionClock.sessionAt(now))
            : new CooldownKey(pair.id, CooldownCategory.STRENGTH_ALERT);
    }

    private directionalRanks(pair: CurrencyPair, rankMap: RankMap): DirectionalRanks | null {
        const baseRank = rankMap.get(pair.base);
        const quoteRank = rankMap.get(pair.quote);
        if (baseRank === undefined || quoteRank === undefined || baseRank === quoteRank) return null;

        return baseRank > quoteRank
            ? { direction: TradeDirection.BUY, strongRank: baseRank, weakRank: quoteRank }
            : { direction: TradeDirection.SELL, strongRank: quoteRank, weakRank: baseRank };
    }

    /** Reason the entry timing fails, or null */
    private checkMomentum(pair: CurrencyPair, direction: TradeDirection, candles: Candle[], rsiSeries: number[]): string | null {
        const { entryTiming, buyAbove, sellBelow, rsiPeriod } = this.config.momentum;
        const latest = rsiSeries[rsiSeries.length - 1];

        if (entryTiming === 'threshold') {
            const ok = direction === TradeDirection.BUY ? latest > buyAbove : latest < sellBelow;
            return ok ? null : `entry RSI ${latest.toFixed(1)} not past ${direction === TradeDirection.BUY ? buyAbove : sellBelow}`;
        }

        const points = rsiSeries.map((rsi, j) => {
            const { timestamp, complete } = candles[j + rsiPeriod];
            return { timestamp, rsi, complete };
        });
        return this.pullback.observe(pair.id, direction, points)
            ? null
            : `no pullback cross-back (${this.pullback.getState(pair.id)})`;
    }

    private isRetested(candles: Candle[], breakout: BreakoutEvent): boolean {
        const atr = this.indicators.atr(candles, this.config.retest.atrPeriod);
        return this.retestValidator.isRetestConfirmed(candles, breakout, atr);
    }
}
