/**
 * Signal pipeline configuration.
 *
 * Every threshold the gates use lives here. Values mirror the last
 * production tuning; the strength policy in particular is a judgement call
 * and is expected to change (see DESIGN.md).
 */
import { Granularity } from '../domain/enums/Granularity';
import { BreakoutStrategyName } from '../domain/enums/BreakoutStrategyName';
import { EventImpact } from '../domain/types/SignalTypes';

const HOUR_MS = 60 * 60 * 1000;

export type StrengthPolicyConfig =
    | { kind: 'min-abs-rank'; minAbsRank: number }
    | { kind: 'min-differential'; minDifferential: number }
    | { kind: 'accepted-differentials'; differentials: number[] }
    | { kind: 'paired-extremes'; pairs: Array<[number, number]> };

export interface SignalConfigType {
    debug: boolean;
    strength: {
        granularity: Granularity;
        window: number;
        rsiPeriod: number;
        emaSlopePeriod: number;
        atrPeriod: number;
        weights: { price: number; rsi: number; ema: number; atr: number };
        maxRank: number;
    };
    breakout: {
        strategies: BreakoutStrategyName[];
        decisionTimeframe: Granularity;
        decisionBars: number;
        priorDay: { scanBars: number };
        range: {
            lookback: number;
            levelSource: 'extremes' | 'swings';
            trendFilter: { enabled: boolean; emaPeriod: number };
        };
        swingMomentum: {
            minBars: number;
            emaPeriod: number;
            rsiPeriod: number;
            rsiBuyAbove: number;
            rsiSellBelow: number;
            atrPeriod: number;
            atrMultiplier: number;
        };
    };
    signal: {
        cooldownMs: number;
        cooldownScope: 'strength_alert' | 'session';
        maxCandidatesPerTick: number;
        strengthPolicy: StrengthPolicyConfig;
    };
    momentum: {
        rsiPeriod: number;
        midpoint: number;
        executionTimeframe: Granularity;
        executionBars: number;
        entryTiming: 'threshold' | 'pullback-cross';
        buyAbove: number;
        sellBelow: number;
        pullback: { armBuyBelow: number; armSellAbove: number };
    };
    retest: {
        enabled: boolean;
        lookback: number;
        atrTolerance: number;
        atrPeriod: number;
    };
    risk: {
        atrPeriod: number;
        stopAtr: number;
        targetAtr: number[];
        minRewardRisk: number;
    };
    alerts: {
        strengthCooldownMs: number;
        groupBreakout: {
            strategy: BreakoutStrategyName;
            timeframe: Granularity;
            bars: number;
            minPairs: number;
            cooldownMs: number;
        };
        heartbeatCooldownMs: number;
        news: { impacts: EventImpact[]; horizonMs: number; cooldownMs: number };
    };
    retry: {
        attempts: number;
        baseDelayMs: number;
        maxDelayMs: number;
    };
}

export const SignalConfig: SignalConfigType = {
    debug: false,

    // Currency strength from H4 bars
    strength: {
        granularity: Granularity.H4,
        window: 20,
        rsiPeriod: 14,
        emaSlopePeriod: 10,
        atrPeriod: 14,
        weights: { price: 0.4, rsi: 0.3, ema: 0.2, atr: 0.1 },
        maxRank: 7
    },

    // Evaluated in order, first confirmation wins
    breakout: {
        strategies: [BreakoutStrategyName.SWING_MOMENTUM, BreakoutStrategyName.PRIOR_DAY],
        decisionTimeframe: Granularity.H1,
        decisionBars: 50,
        priorDay: { scanBars: 1 },
        range: {
            lookback: 20,
            levelSource: 'extremes',
            trendFilter: { enabled: false, emaPeriod: 200 }
        },
        swingMomentum: {
            minBars: 20,
            emaPeriod: 50,
            rsiPeriod: 14,
            rsiBuyAbove: 55,
            rsiSellBelow: 45,
            atrPeriod: 14,
            atrMultiplier: 0.5
        }
    },

    signal: {
        cooldownMs: 1 * HOUR_MS,
        cooldownScope: 'strength_alert',
        maxCandidatesPerTick: 1,
        strengthPolicy: { kind: 'min-abs-rank', minAbsRank: 5 }
    },

    momentum: {
        rsiPeriod: 14,
        midpoint: 50,
        executionTimeframe: Granularity.M15,
        executionBars: 50,
        entryTiming: 'threshold',
        buyAbove: 45,
        sellBelow: 55,
        pullback: { armBuyBelow: 40, armSellAbove: 60 }
    },

    retest: {
        enabled: false,
        lookback: 6,
        atrTolerance: 0.25,
        atrPeriod: 14
    },

    risk: {
        atrPeriod: 14,
        stopAtr: 1,
        targetAtr: [2, 4, 6],
        minRewardRisk: 2.0
    },

    alerts: {
        strengthCooldownMs: 4 * HOUR_MS,
        groupBreakout: {
            strategy: BreakoutStrategyName.SWING_MOMENTUM,
            timeframe: Granularity.H1,
            bars: 100,
            minPairs: 4,
            cooldownMs: 1 * HOUR_MS
        },
        heartbeatCooldownMs: 24 * HOUR_MS,
        news: { impacts: ['High', 'Medium'], horizonMs: 1 * HOUR_MS, cooldownMs: 24 * HOUR_MS }
    },

    retry: {
        attempts: 3,
        baseDelayMs: 500,
        maxDelayMs: 30_000
    }
};
