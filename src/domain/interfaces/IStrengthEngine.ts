import { CurrencyPair } from '../value-objects/CurrencyPair';
import { RankMap } from '../types/SignalTypes';

export interface IStrengthEngine {
    computeRanks(pairs?: readonly CurrencyPair[]): Promise<RankMap>;
}
