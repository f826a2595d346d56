import { injectable, inject } from 'inversify';
import { IRiskEngine } from '../../../domain/interfaces/IRiskEngine';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { RiskLevels } from '../../../domain/types/SignalTypes';
import { SignalConfigType } from '../../../config/signal.config';
import { TYPES } from '../../../config/types';

@injectable()
export class RiskEngine implements IRiskEngine {
    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType
    ) {}

    /**
     * ATR-multiple stop and targets around `entry`. Null when risk cannot be
     * sized (non-positive ATR) or the nearest target pays less than minRewardRisk.
     */
    computeLevels(direction: TradeDirection, entry: number, atr: number): RiskLevels | null {
        const { stopAtr, targetAtr, minRewardRisk } = this.config.risk;
        if (!Number.isFinite(entry) || !Number.isFinite(atr) || atr <= 0) return null;
        if (stopAtr <= 0 || targetAtr.length === 0) return null;

        const multiples = [...targetAtr].sort((a, b) => a - b);
        // Ratio from the multiples: entry +/- k*atr arithmetic would drift below the limit
        const riskReward = multiples[0] / stopAtr;
        if (riskReward < minRewardRisk) return null;

        const sign = direction === TradeDirection.BUY ? 1 : -1;
        return {
            entry,
            stopLoss: entry - sign * stopAtr * atr,
            takeProfits: multiples.map(m => entry + sign * m * atr),
            atr,
            riskReward
        };
    }
}
