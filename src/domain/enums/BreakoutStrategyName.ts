export enum BreakoutStrategyName {
    CURRENT_BAR = 'current-bar',
    PRIOR_BAR = 'prior-bar',
    PRIOR_DAY = 'prior-day',
    RANGE = 'range',
    SWING_MOMENTUM = 'swing-momentum'
}
