import { Currency, isCurrency } from '../enums/Currency';
import { InvalidPairError } from '../errors/InvalidPairError';

export class CurrencyPair {
    private constructor(
        public readonly base: Currency,
        public readonly quote: Currency
    ) {}

    /**
     * Parses an identifier of the form `EUR_USD`.
     * Throws InvalidPairError for malformed ids and untracked currencies.
     */
    static parse(id: string): CurrencyPair {
        const parts = id.trim().toUpperCase().split('_');
        if (parts.length !== 2 || parts[0].length !== 3 || parts[1].length !== 3) {
            throw new InvalidPairError(id, 'expected BASE_QUOTE');
        }

        const [base, quote] = parts;
        if (!isCurrency(base) || !isCurrency(quote)) {
            throw new InvalidPairError(id, 'currency outside the tracked set');
        }
        if (base === quote) {
            throw new InvalidPairError(id, 'base and quote are the same currency');
        }

        return new CurrencyPair(base, quote);
    }

    get id(): string {
        return `${this.base}_${this.quote}`;
    }

    inverse(): CurrencyPair {
        return new CurrencyPair(this.quote, this.base);
    }

    equals(other: CurrencyPair): boolean {
        return this.base === other.base && this.quote === other.quote;
    }

    /** Same two currencies in either orientation */
    isSameMarket(other: CurrencyPair): boolean {
        return this.equals(other) || this.equals(other.inverse());
    }

    contains(currency: Currency): boolean {
        return this.base === currency || this.quote === currency;
    }

    toString(): string {
        return this.id;
    }
}
