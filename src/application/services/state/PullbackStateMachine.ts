import { injectable, inject } from 'inversify';
import { IPullbackStateMachine, RsiPoint } from '../../../domain/interfaces/IPullbackStateMachine';
import { PullbackState } from '../../../domain/enums/PullbackState';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { SignalConfigType } from '../../../config/signal.config';
import { TYPES } from '../../../config/types';
import { Logger } from '../../../shared/logger/Logger';

interface PairState {
    state: PullbackState;
    direction: TradeDirection;
    lastTimestamp: number;
}

const VALID_TRANSITIONS: Record<PullbackState, PullbackState[]> = {
    [PullbackState.IDLE]: [PullbackState.ARMED],
    [PullbackState.ARMED]: [PullbackState.TRIGGERED, PullbackState.IDLE],
    [PullbackState.TRIGGERED]: [PullbackState.IDLE]
};

/**
 * Per-pair RSI pullback tracker.
 *
 * IDLE -> ARMED when RSI dips below armBuyBelow (BUY) / rises above
 * armSellAbove (SELL); ARMED -> TRIGGERED when it crosses back through the
 * midpoint. A TRIGGERED pair drops back to IDLE on the next new bar.
 * Only completed bars move the stored state; the forming bar is re-read on
 * every call.
 */
@injectable()
export class PullbackStateMachine implements IPullbackStateMachine {
    private logger = Logger.getInstance();
    private readonly pairs = new Map<string, PairState>();

    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType
    ) {}

    getState(pair: string): PullbackState {
        return this.pairs.get(pair)?.state ?? PullbackState.IDLE;
    }

    observe(pair: string, direction: TradeDirection, points: RsiPoint[]): boolean {
        let entry = this.pairs.get(pair);
        if (!entry || entry.direction !== direction) {
            entry = { state: PullbackState.IDLE, direction, lastTimestamp: Number.NEGATIVE_INFINITY };
            this.pairs.set(pair, entry);
        }

        for (const point of points) {
            if (!point.complete || point.timestamp <= entry.lastTimestamp) continue;
            this.advance(pair, entry, point);
        }

        const forming = points[points.length - 1];
        if (forming && !forming.complete && forming.timestamp > entry.lastTimestamp) {
            const draft = { ...entry };
            this.advance(pair, draft, forming);
            return draft.state === PullbackState.TRIGGERED;
        }

        return entry.state === PullbackState.TRIGGERED;
    }

    reset(pair: string): void {
        this.pairs.delete(pair);
    }

    private advance(pair: string, entry: PairState, point: RsiPoint): void {
        entry.lastTimestamp = point.timestamp;
        if (entry.state === PullbackState.TRIGGERED) {
            this.transition(pair, entry, PullbackState.IDLE, 'new bar after trigger');
        }
        this.step(pair, entry, point.rsi);
    }

    private step(pair: string, entry: PairState, rsi: number): void {
        const { midpoint, pullback } = this.config.momentum;
        const isBuy = entry.direction === TradeDirection.BUY;

        if (entry.state === PullbackState.IDLE) {
            const armed = isBuy ? rsi < pullback.armBuyBelow : rsi > pullback.armSellAbove;
            if (armed) this.transition(pair, entry, PullbackState.ARMED, `RSI ${rsi.toFixed(1)}`);
            return;
        }

        if (entry.state === PullbackState.ARMED) {
            const crossed = isBuy ? rsi > midpoint : rsi < midpoint;
            if (crossed) this.transition(pair, entry, PullbackState.TRIGGERED, `RSI ${rsi.toFixed(1)} crossed ${midpoint}`);
        }
    }

    private transition(pair: string, entry: PairState, next: PullbackState, reason: string): void {
        if (!VALID_TRANSITIONS[entry.state].includes(next)) {
            this.logger.warn(`${pair}: invalid pullback transition ${entry.state} → ${next}`);
            return;
        }
        this.logger.debug(`${pair}: pullback ${entry.state} → ${next} (${reason})`);
        entry.state = next;
    }
}
