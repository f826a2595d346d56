import { injectable } from 'inversify';
import { DateTime } from 'luxon';
import { TradingSession } from '../../../domain/enums/TradingSession';

const SESSION_ZONE = 'America/New_York';

/**
 * Trading session by New York wall-clock hour:
 * Asian [00, 08), London [08, 16), NewYork [16, 24).
 */
@injectable()
export class TradingSessionClock {
    sessionAt(now: number): TradingSession {
        const hour = DateTime.fromMillis(now, { zone: SESSION_ZONE }).hour;
        if (hour < 8) return TradingSession.ASIAN;
        if (hour < 16) return TradingSession.LONDON;
        return TradingSession.NEW_YORK;
    }
}
