import { TradeDirection } from '../enums/TradeDirection';
import { Currency } from '../enums/Currency';
import { CurrencyPair } from './CurrencyPair';

export interface TradeSignalDiagnostics {
    decisionRsi: number;
    entryRsi: number;
    breakoutTag: string;
    scenario: string;
}

export interface TradeSignalRecord {
    id: string;
    pair: string;
    direction: TradeDirection;
    entry: number;
    stopLoss: number;
    takeProfits: number[];
    strengthDifferential: number;
    strongRank: number;
    weakRank: number;
    atr: number;
    diagnostics: TradeSignalDiagnostics;
    createdAt: number;
}

export class TradeSignal {
    public readonly takeProfits: readonly number[];
    public readonly diagnostics: Readonly<TradeSignalDiagnostics>;

    private constructor(
        public readonly id: string,
        public readonly pair: CurrencyPair,
        public readonly direction: TradeDirection,
        public readonly entry: number,
        public readonly stopLoss: number,
        takeProfits: readonly number[],
        public readonly strengthDifferential: number,
        public readonly strongRank: number,
        public readonly weakRank: number,
        public readonly atr: number,
        diagnostics: TradeSignalDiagnostics,
        public readonly createdAt: number
    ) {
        if (takeProfits.length === 0) {
            throw new Error(`Trade signal for ${pair.id} needs at least one take-profit level`);
        }
        this.takeProfits = Object.freeze([...takeProfits]);
        this.diagnostics = Object.freeze({ ...diagnostics });
        Object.freeze(this);
    }

    static create(params: Omit<TradeSignalRecord, 'id' | 'pair'> & { pair: CurrencyPair }): TradeSignal {
        return new TradeSignal(
            `${params.pair.id}-${params.direction}-${params.createdAt}`,
            params.pair,
            params.direction,
            params.entry,
            params.stopLoss,
            params.takeProfits,
            params.strengthDifferential,
            params.strongRank,
            params.weakRank,
            params.atr,
            params.diagnostics,
            params.createdAt
        );
    }

    static fromRecord(record: TradeSignalRecord): TradeSignal {
        return new TradeSignal(
            record.id,
            CurrencyPair.parse(record.pair),
            record.direction,
            record.entry,
            record.stopLoss,
            record.takeProfits,
            record.strengthDifferential,
            record.strongRank,
            record.weakRank,
            record.atr,
            record.diagnostics,
            record.createdAt
        );
    }

    get currencies(): [Currency, Currency] {
        return [this.pair.base, this.pair.quote];
    }

    get stopDistance(): number {
        return Math.abs(this.entry - this.stopLoss);
    }

    /** Reward:risk measured to the nearest take-profit */
    get riskRewardRatio(): number {
        const reward = Math.abs(this.takeProfits[0] - this.entry);
        const risk = this.stopDistance;
        return risk > 0 ? reward / risk : 0;
    }

    toRecord(): TradeSignalRecord {
        return {
            id: this.id,
            pair: this.pair.id,
            direction: this.direction,
            entry: this.entry,
            stopLoss: this.stopLoss,
            takeProfits: [...this.takeProfits],
            strengthDifferential: this.strengthDifferential,
            strongRank: this.strongRank,
            weakRank: this.weakRank,
            atr: this.atr,
            diagnostics: { ...this.diagnostics },
            createdAt: this.createdAt
        };
    }
}
