import { TradeSignal } from '../value-objects/TradeSignal';
import { RankMap, SignalDecision } from '../types/SignalTypes';

export interface ISignalBuilder {
    build(pair: string, rankMap: RankMap, now?: number): Promise<TradeSignal | null>;
    evaluate(pair: string, rankMap: RankMap, now?: number): Promise<SignalDecision>;
}
