export interface IStrengthPolicy {
    readonly description: string;
    accepts(strongRank: number, weakRank: number): boolean;
}
