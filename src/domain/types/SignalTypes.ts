import { Currency } from '../enums/Currency';
import { Granularity } from '../enums/Granularity';
import { TradeDirection } from '../enums/TradeDirection';
import { Candle } from '../entities/Candle';
import { CurrencyPair } from '../value-objects/CurrencyPair';
import { TradeSignal } from '../value-objects/TradeSignal';

export type RankMap = ReadonlyMap<Currency, number>;

export interface SwingPoint {
    index: number;
    timestamp: number;
    price: number;
}

export interface SwingPoints {
    highs: SwingPoint[];
    lows: SwingPoint[];
}

export interface BreakoutContext {
    pair: CurrencyPair;
    candles: Candle[];
    timeframe: Granularity;
    dailyCandles?: Candle[];
}

export interface RiskLevels {
    entry: number;
    stopLoss: number;
    takeProfits: number[];
    atr: number;
    riskReward: number;
}

export type SignalGate =
    | 'universe'
    | 'cooldown'
    | 'breakout'
    | 'direction'
    | 'strength'
    | 'trend'
    | 'momentum'
    | 'retest'
    | 'risk';

export type SignalDecision =
    | { ok: true; signal: TradeSignal }
    | { ok: false; gate: SignalGate; reason: string };

export interface StrengthReading {
    pair: string;
    priceChange: number;
    rsi: number;
    emaSlope: number;
    atr: number;
    score: number;
}

export interface PairCandidate {
    pair: CurrencyPair;
    baseRank: number;
    quoteRank: number;
    differential: number;
}

export type EventImpact = 'High' | 'Medium' | 'Low';

export interface EconomicEvent {
    id: string;
    time: number;
    currency: string;
    impact: EventImpact;
    title: string;
    actual?: string;
}

export interface DirectionalRanks {
    direction: TradeDirection;
    strongRank: number;
    weakRank: number;
}
