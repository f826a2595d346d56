export enum PullbackState {
    IDLE = 'IDLE',
    ARMED = 'ARMED',
    TRIGGERED = 'TRIGGERED'
}
