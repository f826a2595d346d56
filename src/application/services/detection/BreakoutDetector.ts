import { injectable, multiInject } from 'inversify';
import { IBreakoutDetector } from '../../../domain/interfaces/IBreakoutDetector';
import { IBreakoutStrategy } from '../../../domain/interfaces/IBreakoutStrategy';
import { BreakoutEvent } from '../../../domain/value-objects/BreakoutEvent';
import { BreakoutContext } from '../../../domain/types/SignalTypes';
import { BreakoutStrategyName } from '../../../domain/enums/BreakoutStrategyName';
import { TYPES } from '../../../config/types';
import { Logger } from '../../../shared/logger/Logger';

@injectable()
export class BreakoutDetector implements IBreakoutDetector {
    private logger = Logger.getInstance();
    private readonly strategies = new Map<BreakoutStrategyName, IBreakoutStrategy>();

    constructor(
        @multiInject(TYPES.IBreakoutStrategy) strategies: IBreakoutStrategy[]
    ) {
        for (const strategy of strategies) {
            this.strategies.set(strategy.name, strategy);
        }
    }

    detect(strategy: BreakoutStrategyName, context: BreakoutContext): BreakoutEvent | null {
        const impl = this.strategies.get(strategy);
        if (!impl) {
            this.logger.warn(`Breakout strategy "${strategy}" is not registered`);
            return null;
        }
        return impl.detect(context);
    }

    detectFirst(strategies: readonly BreakoutStrategyName[], context: BreakoutContext): BreakoutEvent | null {
        for (const name of strategies) {
            const event = this.detect(name, context);
            if (event) return event;
        }
        return null;
    }

    dailyBarsRequired(strategies: readonly BreakoutStrategyName[]): number {
        return strategies.reduce((max, name) => {
            const impl = this.strategies.get(name);
            return impl ? Math.max(max, impl.dailyBarsRequired) : max;
        }, 0);
    }

    registered(): BreakoutStrategyName[] {
        return [...this.strategies.keys()];
    }
}
