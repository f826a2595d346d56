import { IStrengthPolicy } from '../../../domain/interfaces/IStrengthPolicy';
import { StrengthPolicyConfig } from '../../../config/signal.config';

/** Both sides extreme enough and on opposite sides of zero */
export class MinAbsoluteRankPolicy implements IStrengthPolicy {
    constructor(private readonly minAbsRank: number) {}

    get description(): string {
        return `|rank| >= ${this.minAbsRank} on opposite sides`;
    }

    accepts(strongRank: number, weakRank: number): boolean {
        return strongRank >= this.minAbsRank && weakRank <= -this.minAbsRank;
    }
}

export class MinDifferentialPolicy implements IStrengthPolicy {
    constructor(private readonly minDifferential: number) {}

    get description(): string {
        return `differential >= ${this.minDifferential}`;
    }

    accepts(strongRank: number, weakRank: number): boolean {
        return strongRank - weakRank >= this.minDifferential;
    }
}

export class AcceptedDifferentialsPolicy implements IStrengthPolicy {
    private readonly accepted: Set<number>;

    constructor(differentials: number[]) {
        this.accepted = new Set(differentials);
    }

    get description(): string {
        return `differential in {${[...this.accepted].join(', ')}}`;
    }

    accepts(strongRank: number, weakRank: number): boolean {
        return this.accepted.has(strongRank - weakRank);
    }
}

export class PairedExtremesPolicy implements IStrengthPolicy {
    constructor(private readonly pairs: Array<[number, number]>) {}

    get description(): string {
        return `rank pair in {${this.pairs.map(([s, w]) => `${s}/${w}`).join(', ')}}`;
    }

    accepts(strongRank: number, weakRank: number): boolean {
        return this.pairs.some(([strong, weak]) => strong === strongRank && weak === weakRank);
    }
}

export function createStrengthPolicy(config: StrengthPolicyConfig): IStrengthPolicy {
    switch (config.kind) {
        case 'min-abs-rank':
            return new MinAbsoluteRankPolicy(config.minAbsRank);
        case 'min-differential':
            return new MinDifferentialPolicy(config.minDifferential);
        case 'accepted-differentials':
            return new AcceptedDifferentialsPolicy(config.differentials);
        case 'paired-extremes':
            return new PairedExtremesPolicy(config.pairs);
    }
}
