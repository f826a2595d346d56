export enum Granularity {
    M15 = 'M15',
    H1 = 'H1',
    H4 = 'H4',
    D = 'D'
}
