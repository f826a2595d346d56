import { EconomicEvent } from '../types/SignalTypes';

export interface IEconomicCalendar {
    upcoming(): Promise<EconomicEvent[]>;
}
