import { CurrencyPair } from './CurrencyPair';
import { Currency } from '../enums/Currency';

export type PairRejectionHandler = (id: string, reason: string) => void;

/**
 * Allow-list of tradable pairs. A pair and its inverse are one market:
 * only the first orientation listed is kept.
 */
export class PairUniverse {
    private readonly byId = new Map<string, CurrencyPair>();

    private constructor(private readonly pairs: readonly CurrencyPair[]) {
        for (const pair of pairs) {
            this.byId.set(pair.id, pair);
            this.byId.set(pair.inverse().id, pair);
        }
    }

    static fromIds(ids: readonly string[], onRejected?: PairRejectionHandler): PairUniverse {
        const accepted: CurrencyPair[] = [];

        for (const raw of ids) {
            let pair: CurrencyPair;
            try {
                pair = CurrencyPair.parse(raw);
            } catch (error) {
                onRejected?.(raw, error instanceof Error ? error.message : String(error));
                continue;
            }

            const clash = accepted.find(p => p.isSameMarket(pair));
            if (clash) {
                const reason = clash.equals(pair)
                    ? 'duplicate entry'
                    : `inverse of ${clash.id}, which is already tradable`;
                onRejected?.(raw, reason);
                continue;
            }

            accepted.push(pair);
        }

        return new PairUniverse(accepted);
    }

    list(): readonly CurrencyPair[] {
        return this.pairs;
    }

    /** Tradable orientation of `id` in either direction, or null if not allow-listed */
    resolve(id: string): CurrencyPair | null {
        return this.byId.get(id.trim().toUpperCase()) ?? null;
    }

    has(id: string): boolean {
        return this.resolve(id) !== null;
    }

    pairsContaining(currency: Currency): CurrencyPair[] {
        return this.pairs.filter(p => p.contains(currency));
    }

    get size(): number {
        return this.pairs.length;
    }
}
