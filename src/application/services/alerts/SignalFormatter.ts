import { injectable, inject } from 'inversify';
import { DateTime } from 'luxon';
import { TradeSignal } from '../../../domain/value-objects/TradeSignal';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { RankMap, EconomicEvent } from '../../../domain/types/SignalTypes';
import { SignalConfigType } from '../../../config/signal.config';
import { TYPES } from '../../../config/types';

function signed(value: number, digits = 0): string {
    const text = value.toFixed(digits);
    return value > 0 ? `+${text}` : text;
}

function utcMinute(ms: number): string {
    return DateTime.fromMillis(ms, { zone: 'utc' }).toFormat('yyyy-MM-dd HH:mm');
}

/** Plain-text notification bodies */
@injectable()
export class SignalFormatter {
    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType
    ) {}

    tradeSignal(signal: TradeSignal): string {
        const digits = signal.pair.quote === 'JPY' ? 3 : 5;
        const price = (value: number) => value.toFixed(digits);
        const symbol = signal.direction === TradeDirection.BUY ? '🟢 BUY' : '🔴 SELL';
        const { decisionTimeframe } = this.config.breakout;
        const { executionTimeframe } = this.config.momentum;
        const tps = signal.takeProfits.map((tp, i) => `TP${i + 1}:${price(tp)}`).join(', ');

        return [
            `${symbol} ${signal.pair.id} [${signal.diagnostics.breakoutTag}]`,
            `Strength Diff: ${signal.strengthDifferential.toFixed(1)}`,
            `Strengths: ${signed(signal.strongRank, 1)}, ${signed(signal.weakRank, 1)}`,
            `${decisionTimeframe} RSI: ${signal.diagnostics.decisionRsi.toFixed(1)} | ${executionTimeframe} RSI: ${signal.diagnostics.entryRsi.toFixed(1)}`,
            `Entry: ${price(signal.entry)} | SL: ${price(signal.stopLoss)} | ATR: ${price(signal.atr)}`,
            `TPs: ${tps} | Min RRR:1:${this.config.risk.minRewardRisk}`
        ].join('\n');
    }

    strengthAlert(ranks: RankMap): string {
        const { maxRank } = this.config.strength;
        const lines = [...ranks.entries()]
            .sort((a, b) => b[1] - a[1])
            .map(([currency, rank]) => `${currency}: ${signed(rank)}`);

        return [
            '📊 Currency Strength Alert 📊',
            `Currency Strength Rankings (+${maxRank} strongest → -${maxRank} weakest):`,
            ...lines
        ].join('\n');
    }

    groupBreakout(pairs: readonly string[], now: number): string {
        const sorted = [...pairs].sort();
        return `📢 Breakout Alert! (${sorted.length} pairs) - ${utcMinute(now)} UTC\n\n${sorted.join('\n')}`;
    }

    news(event: EconomicEvent, pairIds: readonly string[]): string {
        return [
            `⚠️ News Alert for ${pairIds.join(', ')} trade!`,
            `${event.currency} - ${event.title} (${event.impact})`,
            `Time: ${utcMinute(event.time)} UTC`
        ].join('\n');
    }

    heartbeat(): string {
        return '💓 Heartbeat: FX signal engine is running';
    }
}
