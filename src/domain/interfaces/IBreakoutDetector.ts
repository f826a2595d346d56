import { BreakoutEvent } from '../value-objects/BreakoutEvent';
import { BreakoutContext } from '../types/SignalTypes';
import { BreakoutStrategyName } from '../enums/BreakoutStrategyName';

export interface IBreakoutDetector {
    detect(strategy: BreakoutStrategyName, context: BreakoutContext): BreakoutEvent | null;
    detectFirst(strategies: readonly BreakoutStrategyName[], context: BreakoutContext): BreakoutEvent | null;
    dailyBarsRequired(strategies: readonly BreakoutStrategyName[]): number;
    registered(): BreakoutStrategyName[];
}
