// src/config/types.ts
export const TYPES = {
    Env: Symbol.for('Env'),
    SignalConfig: Symbol.for('SignalConfig'),
    PairUniverse: Symbol.for('PairUniverse'),
    Database: Symbol.for('Database'),
    RetryPolicy: Symbol.for('RetryPolicy'),
    ICandleSource: Symbol.for('ICandleSource'),
    IIndicators: Symbol.for('IIndicators'),
    IStrengthEngine: Symbol.for('IStrengthEngine'),
    IStrengthPolicy: Symbol.for('IStrengthPolicy'),
    IBreakoutDetector: Symbol.for('IBreakoutDetector'),
    IBreakoutStrategy: Symbol.for('IBreakoutStrategy'),
    IRetestValidator: Symbol.for('IRetestValidator'),
    IPullbackStateMachine: Symbol.for('IPullbackStateMachine'),
    IRiskEngine: Symbol.for('IRiskEngine'),
    ISignalBuilder: Symbol.for('ISignalBuilder'),
    ICooldownStore: Symbol.for('ICooldownStore'),
    IActiveTrades: Symbol.for('IActiveTrades'),
    INotificationSink: Symbol.for('INotificationSink'),
    IEconomicCalendar: Symbol.for('IEconomicCalendar'),
    TradingSessionClock: Symbol.for('TradingSessionClock'),
    NewsRelevanceFilter: Symbol.for('NewsRelevanceFilter'),
    SignalFormatter: Symbol.for('SignalFormatter')
};
