import 'reflect-metadata';
import { Container, interfaces } from 'inversify';
import { TYPES } from './types';
import { Env } from './env';
import { SignalConfig, SignalConfigType } from './signal.config';

// Interfaces
import { ICandleSource } from '../domain/interfaces/ICandleSource';
import { IIndicators } from '../domain/interfaces/IIndicators';
import { IStrengthEngine } from '../domain/interfaces/IStrengthEngine';
import { IStrengthPolicy } from '../domain/interfaces/IStrengthPolicy';
import { IBreakoutStrategy } from '../domain/interfaces/IBreakoutStrategy';
import { IBreakoutDetector } from '../domain/interfaces/IBreakoutDetector';
import { IRetestValidator } from '../domain/interfaces/IRetestValidator';
import { IPullbackStateMachine } from '../domain/interfaces/IPullbackStateMachine';
import { IRiskEngine } from '../domain/interfaces/IRiskEngine';
import { ISignalBuilder } from '../domain/interfaces/ISignalBuilder';
import { ICooldownStore } from '../domain/interfaces/ICooldownStore';
import { IActiveTrades } from '../domain/interfaces/IActiveTrades';
import { INotificationSink } from '../domain/interfaces/INotificationSink';
import { IEconomicCalendar } from '../domain/interfaces/IEconomicCalendar';
import { PairUniverse } from '../domain/value-objects/PairUniverse';

// Implementations
import { IndicatorsProvider } from '../application/services/indicators/IndicatorsProvider';
import { StrengthEngine } from '../application/services/strength/StrengthEngine';
import { createStrengthPolicy } from '../application/services/strength/StrengthPolicy';
import { CurrentBarBreakout } from '../application/services/detection/strategies/CurrentBarBreakout';
import { PriorBarBreakout } from '../application/services/detection/strategies/PriorBarBreakout';
import { PriorDayBreakout } from '../application/services/detection/strategies/PriorDayBreakout';
import { RangeBreakout } from '../application/services/detection/strategies/RangeBreakout';
import { SwingMomentumBreakout } from '../application/services/detection/strategies/SwingMomentumBreakout';
import { RangeDetector } from '../application/services/detection/RangeDetector';
import { BreakoutDetector } from '../application/services/detection/BreakoutDetector';
import { RetestValidator } from '../application/services/validation/RetestValidator';
import { PullbackStateMachine } from '../application/services/state/PullbackStateMachine';
import { RiskEngine } from '../application/services/risk/RiskEngine';
import { SignalBuilder } from '../application/services/signal/SignalBuilder';
import { SignalFormatter } from '../application/services/alerts/SignalFormatter';
import { TradingSessionClock } from '../application/services/session/TradingSessionClock';
import { NewsRelevanceFilter } from '../application/services/news/NewsRelevanceFilter';
import { OandaCandleSource } from '../infrastructure/exchanges/oanda/OandaCandleSource';
import { TelegramNotificationSink } from '../infrastructure/notifications/TelegramNotificationSink';
import { LogNotificationSink } from '../infrastructure/notifications/LogNotificationSink';
import { openDatabase, SqliteDatabase } from '../infrastructure/database/SqliteDatabase';
import { CooldownRepository } from '../infrastructure/database/repositories/CooldownRepository';
import { ActiveTradeRepository } from '../infrastructure/database/repositories/ActiveTradeRepository';
import { PersistentCooldownStore } from '../infrastructure/state/PersistentCooldownStore';
import { ActiveTradesRegistry } from '../infrastructure/state/ActiveTradesRegistry';
import { RetryPolicy } from '../shared/utils/RetryPolicy';
import { isRetryableError } from '../shared/errors/HttpError';
import { Logger } from '../shared/logger/Logger';

// Use cases
import { RunEvaluationPass } from '../application/use-cases/RunEvaluationPass';
import { RunGroupBreakoutAlert } from '../application/use-cases/RunGroupBreakoutAlert';
import { RunLiveEvaluator } from '../application/use-cases/RunLiveEvaluator';

export { TYPES };

/** Replacements for the outside world, mainly for tests */
export interface ContainerOverrides {
    config?: SignalConfigType;
    database?: SqliteDatabase;
    candleSource?: ICandleSource;
    notifier?: INotificationSink;
    calendar?: IEconomicCalendar;
    retryPolicy?: RetryPolicy;
}

export function createContainer(env: Env, overrides: ContainerOverrides = {}): Container {
    const logger = Logger.getInstance();
    const container = new Container({ defaultScope: 'Singleton' });

    // --- Configuration ---
    const config: SignalConfigType = overrides.config ?? { ...SignalConfig, debug: SignalConfig.debug || env.DEBUG_MODE };
    container.bind<Env>(TYPES.Env).toConstantValue(env);
    container.bind<SignalConfigType>(TYPES.SignalConfig).toConstantValue(config);
    container.bind<PairUniverse>(TYPES.PairUniverse).toConstantValue(
        PairUniverse.fromIds(env.PAIRS, (id, reason) => logger.warn(`Invalid pair format skipped: ${id} (${reason})`))
    );
    container.bind<RetryPolicy>(TYPES.RetryPolicy).toConstantValue(
        overrides.retryPolicy ?? new RetryPolicy({ ...config.retry, shouldRetry: isRetryableError })
    );

    // --- Persistence ---
    container.bind<SqliteDatabase>(TYPES.Database).toDynamicValue(() => overrides.database ?? openDatabase(env.DATABASE_PATH));
    container.bind<CooldownRepository>(CooldownRepository).toSelf();
    container.bind<ActiveTradeRepository>(ActiveTradeRepository).toSelf();
    container.bind<ICooldownStore>(TYPES.ICooldownStore).to(PersistentCooldownStore);
    container.bind<IActiveTrades>(TYPES.IActiveTrades).to(ActiveTradesRegistry);

    // --- Core Services ---
    container.bind<IIndicators>(TYPES.IIndicators).to(IndicatorsProvider);
    container.bind<IStrengthEngine>(TYPES.IStrengthEngine).to(StrengthEngine);
    container.bind<IStrengthPolicy>(TYPES.IStrengthPolicy).toDynamicValue((context: interfaces.Context) =>
        createStrengthPolicy(context.container.get<SignalConfigType>(TYPES.SignalConfig).signal.strengthPolicy)
    );
    container.bind<RangeDetector>(RangeDetector).toSelf();
    container.bind<IBreakoutStrategy>(TYPES.IBreakoutStrategy).to(CurrentBarBreakout);
    container.bind<IBreakoutStrategy>(TYPES.IBreakoutStrategy).to(PriorBarBreakout);
    container.bind<IBreakoutStrategy>(TYPES.IBreakoutStrategy).to(PriorDayBreakout);
    container.bind<IBreakoutStrategy>(TYPES.IBreakoutStrategy).to(RangeBreakout);
    container.bind<IBreakoutStrategy>(TYPES.IBreakoutStrategy).to(SwingMomentumBreakout);
    container.bind<IBreakoutDetector>(TYPES.IBreakoutDetector).to(BreakoutDetector);
    container.bind<IRetestValidator>(TYPES.IRetestValidator).to(RetestValidator);
    container.bind<IPullbackStateMachine>(TYPES.IPullbackStateMachine).to(PullbackStateMachine);
    container.bind<IRiskEngine>(TYPES.IRiskEngine).to(RiskEngine);
    container.bind<ISignalBuilder>(TYPES.ISignalBuilder).to(SignalBuilder);
    container.bind<SignalFormatter>(TYPES.SignalFormatter).to(SignalFormatter);
    container.bind<TradingSessionClock>(TYPES.TradingSessionClock).to(TradingSessionClock);
    container.bind<NewsRelevanceFilter>(TYPES.NewsRelevanceFilter).to(NewsRelevanceFilter);

    // --- Outside world ---
    if (overrides.candleSource) {
        container.bind<ICandleSource>(TYPES.ICandleSource).toConstantValue(overrides.candleSource);
    } else {
        container.bind<ICandleSource>(TYPES.ICandleSource).to(OandaCandleSource);
    }

    if (overrides.notifier) {
        container.bind<INotificationSink>(TYPES.INotificationSink).toConstantValue(overrides.notifier);
    } else if (env.TELEGRAM_TOKEN && env.TELEGRAM_CHAT_ID) {
        container.bind<INotificationSink>(TYPES.INotificationSink).to(TelegramNotificationSink);
    } else {
        logger.warn('TELEGRAM_TOKEN / TELEGRAM_CHAT_ID not set, notifications go to the log');
        container.bind<INotificationSink>(TYPES.INotificationSink).to(LogNotificationSink);
    }

    if (overrides.calendar) {
        container.bind<IEconomicCalendar>(TYPES.IEconomicCalendar).toConstantValue(overrides.calendar);
    }

    // --- Use cases ---
    container.bind<RunEvaluationPass>(RunEvaluationPass).toSelf();
    container.bind<RunGroupBreakoutAlert>(RunGroupBreakoutAlert).toSelf();
    container.bind<RunLiveEvaluator>(RunLiveEvaluator).toSelf();

    return container;
}
