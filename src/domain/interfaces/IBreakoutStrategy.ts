import { BreakoutEvent } from '../value-objects/BreakoutEvent';
import { BreakoutContext } from '../types/SignalTypes';
import { BreakoutStrategyName } from '../enums/BreakoutStrategyName';

export interface IBreakoutStrategy {
    readonly name: BreakoutStrategyName;
    /** Daily bars are fetched only when a configured strategy asks for them */
    readonly dailyBarsRequired: number;
    detect(context: BreakoutContext): BreakoutEvent | null;
}
