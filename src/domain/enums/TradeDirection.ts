export enum TradeDirection {
    BUY = 'BUY',
    SELL = 'SELL'
}
