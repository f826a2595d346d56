import { CooldownKey } from '../value-objects/CooldownKey';
import { TradingSession } from '../enums/TradingSession';

export interface ICooldownStore {
    isAllowed(key: CooldownKey, now: number, windowMs: number): boolean;
    record(key: CooldownKey, now: number): void;
    lastFired(key: CooldownKey): number | undefined;
    prune(predicate: (key: CooldownKey) => boolean): number;
    pruneCategory(category: string): number;
    pruneStaleSessions(current: TradingSession): number;
    /** Writes every entry that could not be persisted earlier; false if some remain unsaved */
    flush(): boolean;
}
