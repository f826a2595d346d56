import { TradeDirection } from '../enums/TradeDirection';
import { RiskLevels } from '../types/SignalTypes';

export interface IRiskEngine {
    computeLevels(direction: TradeDirection, entry: number, atr: number): RiskLevels | null;
}
