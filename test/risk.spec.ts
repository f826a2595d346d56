import { RiskEngine } from '../src/application/services/risk/RiskEngine';
import { TradeDirection } from '../src/domain/enums/TradeDirection';
import { testConfig } from './helpers/fakes';

describe('RiskEngine', () => {
    const engine = new RiskEngine(testConfig());

    it('places the stop one ATR away and targets at 2/4/6 ATR for BUY', () => {
        const levels = engine.computeLevels(TradeDirection.BUY, 1.1, 0.001);

        expect(levels).not.toBeNull();
        expect(levels?.entry).toBe(1.1);
        expect(levels?.stopLoss).toBeCloseTo(1.099, 10);
        expect(levels?.takeProfits).toHaveLength(3);
        expect(levels?.takeProfits[0]).toBeCloseTo(1.102, 10);
        expect(levels?.takeProfits[1]).toBeCloseTo(1.104, 10);
        expect(levels?.takeProfits[2]).toBeCloseTo(1.106, 10);
        expect(levels?.riskReward).toBe(2);
    });

    it('mirrors the levels for SELL', () => {
        const levels = engine.computeLevels(TradeDirection.SELL, 150, 0.5);

        expect(levels?.stopLoss).toBe(150.5);
        expect(levels?.takeProfits).toEqual([149, 148, 147]);
    });

    it('cannot size risk without a positive ATR', () => {
        expect(engine.computeLevels(TradeDirection.BUY, 1.1, 0)).toBeNull();
        expect(engine.computeLevels(TradeDirection.BUY, 1.1, -0.001)).toBeNull();
        expect(engine.computeLevels(TradeDirection.BUY, Number.NaN, 0.001)).toBeNull();
    });

    it('rejects a nearest target below the minimum reward:risk', () => {
        const strict = new RiskEngine(testConfig(c => { c.risk.minRewardRisk = 3; }));
        expect(strict.computeLevels(TradeDirection.BUY, 1.1, 0.001)).toBeNull();
    });

    it('orders targets from nearest to farthest', () => {
        const unordered = new RiskEngine(testConfig(c => { c.risk.targetAtr = [6, 2, 4]; }));
        expect(unordered.computeLevels(TradeDirection.SELL, 150, 0.5)?.takeProfits).toEqual([149, 148, 147]);
    });
});
