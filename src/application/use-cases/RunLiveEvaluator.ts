import { injectable, inject, optional } from 'inversify';
import { ICooldownStore } from '../../domain/interfaces/ICooldownStore';
import { IActiveTrades } from '../../domain/interfaces/IActiveTrades';
import { INotificationSink } from '../../domain/interfaces/INotificationSink';
import { IEconomicCalendar } from '../../domain/interfaces/IEconomicCalendar';
import { CooldownKey, CooldownCategory } from '../../domain/value-objects/CooldownKey';
import { TradingSession } from '../../domain/enums/TradingSession';
import { SignalConfigType } from '../../config/signal.config';
import { TYPES } from '../../config/types';
import { SignalFormatter } from '../services/alerts/SignalFormatter';
import { TradingSessionClock } from '../services/session/TradingSessionClock';
import { NewsRelevanceFilter } from '../services/news/NewsRelevanceFilter';
import { RunEvaluationPass } from './RunEvaluationPass';
import { RunGroupBreakoutAlert } from './RunGroupBreakoutAlert';
import { Logger } from '../../shared/logger/Logger';

export const HEARTBEAT_KEY = new CooldownKey('ALL', CooldownCategory.HEARTBEAT);

export interface LiveEvaluatorConfig {
    intervalMs: number;
}

@injectable()
export class RunLiveEvaluator {
    private logger = Logger.getInstance();
    private isRunning = false;
    private currentSession: TradingSession | null = null;
    private wake: (() => void) | null = null;

    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType,
        @inject(RunEvaluationPass) private readonly evaluationPass: RunEvaluationPass,
        @inject(RunGroupBreakoutAlert) private readonly groupBreakout: RunGroupBreakoutAlert,
        @inject(TYPES.ICooldownStore) private readonly cooldowns: ICooldownStore,
        @inject(TYPES.IActiveTrades) private readonly activeTrades: IActiveTrades,
        @inject(TYPES.INotificationSink) private readonly notifier: INotificationSink,
        @inject(TYPES.SignalFormatter) private readonly formatter: SignalFormatter,
        @inject(TYPES.TradingSessionClock) private readonly sessionClock: TradingSessionClock,
        @inject(TYPES.NewsRelevanceFilter) private readonly newsFilter: NewsRelevanceFilter,
        @inject(TYPES.IEconomicCalendar) @optional() private readonly calendar?: IEconomicCalendar
    ) {}

    /** Runs until `stop()`; state is flushed before the promise resolves */
    async start(config: LiveEvaluatorConfig): Promise<void> {
        this.logger.info('Starting live evaluator', config);
        this.isRunning = true;

        await this.sendHeartbeat(Date.now(), true);

        while (this.isRunning) {
            try {
                await this.runTick(Date.now());
            } catch (error) {
                this.logger.error('Error in evaluation loop', error);
            }
            if (this.isRunning) {
                await this.sleep(config.intervalMs);
            }
        }

        this.persistState();
        this.logger.info('Live evaluator stopped');
    }

    stop(): void {
        if (!this.isRunning) return;
        this.logger.info('Stopping live evaluator after the current pass');
        this.isRunning = false;
        this.wake?.();
    }

    async runTick(now: number): Promise<void> {
        this.rollSession(now);
        await this.sendHeartbeat(now, false);

        const result = await this.evaluationPass.execute(now);
        if (result.signals.length > 0) {
            this.logger.info(`Emitted ${result.signals.length} trade signal(s)`);
        }

        await this.groupBreakout.execute(now);
        await this.checkNews(now);
    }

    persistState(): boolean {
        const cooldownsSaved = this.cooldowns.flush();
        const tradesSaved = this.activeTrades.flush();
        if (!cooldownsSaved || !tradesSaved) {
            this.logger.error('Some state could not be persisted');
        }
        return cooldownsSaved && tradesSaved;
    }

    private rollSession(now: number): void {
        const session = this.sessionClock.sessionAt(now);
        if (session === this.currentSession) return;

        const pruned = this.cooldowns.pruneStaleSessions(session);
        this.logger.info(`Session ${session} started, pruned ${pruned} stale cooldown key(s)`);
        this.currentSession = session;
    }

    private async sendHeartbeat(now: number, force: boolean): Promise<void> {
        if (!force && !this.cooldowns.isAllowed(HEARTBEAT_KEY, now, this.config.alerts.heartbeatCooldownMs)) {
            return;
        }
        if (await this.notifier.send(this.formatter.heartbeat())) {
            this.cooldowns.record(HEARTBEAT_KEY, now);
            this.logger.info('Heartbeat sent');
        }
    }

    private async checkNews(now: number): Promise<void> {
        if (!this.calendar) return;

        const currencies = this.activeTrades.currencies();
        if (currencies.size === 0) return;

        const events = await this.calendar.upcoming();
        for (const event of this.newsFilter.select(events, currencies, now)) {
            const key = new CooldownKey(event.id, CooldownCategory.NEWS);
            if (!this.cooldowns.isAllowed(key, now, this.config.alerts.news.cooldownMs)) continue;

            const pairIds = this.activeTrades
                .list()
                .filter(trade => trade.currencies.some(c => c === event.currency))
                .map(trade => trade.pair.id);

            if (await this.notifier.send(this.formatter.news(event, pairIds))) {
                this.cooldowns.record(key, now);
                this.logger.info(`[News] Alert sent for ${event.currency} - ${event.title}`);
            }
        }
    }

    private sleep(ms: number): Promise<void> {
        return new Promise(resolve => {
            const timer = setTimeout(() => {
                this.wake = null;
                resolve();
            }, ms);
            this.wake = () => {
                clearTimeout(timer);
                this.wake = null;
                resolve();
            };
        });
    }
}
