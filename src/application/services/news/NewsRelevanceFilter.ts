import { injectable, inject } from 'inversify';
import { Currency } from '../../../domain/enums/Currency';
import { EconomicEvent } from '../../../domain/types/SignalTypes';
import { SignalConfigType } from '../../../config/signal.config';
import { TYPES } from '../../../config/types';

@injectable()
export class NewsRelevanceFilter {
    constructor(
        @inject(TYPES.SignalConfig) private readonly config: SignalConfigType
    ) {}

    /** Watched-impact events for `currencies` starting within the horizon, soonest first */
    select(events: readonly EconomicEvent[], currencies: ReadonlySet<Currency>, now: number): EconomicEvent[] {
        const { impacts, horizonMs } = this.config.alerts.news;
        const watched = new Set<string>(currencies);

        return events
            .filter(ev => watched.has(ev.currency))
            .filter(ev => impacts.includes(ev.impact))
            .filter(ev => {
                const until = ev.time - now;
                return until >= 0 && until <= horizonMs;
            })
            .sort((a, b) => a.time - b.time);
    }
}
