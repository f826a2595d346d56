export enum TradingSession {
    ASIAN = 'Asian',
    LONDON = 'London',
    NEW_YORK = 'NewYork'
}
