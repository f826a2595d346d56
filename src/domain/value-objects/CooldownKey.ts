import { TradingSession } from '../enums/TradingSession';

export const CooldownCategory = {
    STRENGTH_ALERT: 'strength_alert',
    GROUP_BREAKOUT: 'group_breakout',
    CURRENCY_STRENGTH: 'currency_strength',
    NEWS: 'news',
    HEARTBEAT: 'heartbeat',
    SESSION_PREFIX: 'session:'
} as const;

export class CooldownKey {
    private static readonly SEPARATOR = '|';

    constructor(
        public readonly subject: string,
        public readonly category: string
    ) {}

    static forSession(subject: string, session: TradingSession): CooldownKey {
        return new CooldownKey(subject, `${CooldownCategory.SESSION_PREFIX}${session}`);
    }

    static parse(serialized: string): CooldownKey {
        const index = serialized.indexOf(CooldownKey.SEPARATOR);
        if (index <= 0) {
            throw new Error(`Malformed cooldown key: ${serialized}`);
        }
        return new CooldownKey(serialized.slice(0, index), serialized.slice(index + 1));
    }

    get isSessionScoped(): boolean {
        return this.category.startsWith(CooldownCategory.SESSION_PREFIX);
    }

    toString(): string {
        return `${this.subject}${CooldownKey.SEPARATOR}${this.category}`;
    }
}
