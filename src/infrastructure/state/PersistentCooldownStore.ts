import { injectable, inject } from 'inversify';
import { ICooldownStore } from '../../domain/interfaces/ICooldownStore';
import { CooldownKey, CooldownCategory } from '../../domain/value-objects/CooldownKey';
import { TradingSession } from '../../domain/enums/TradingSession';
import { CooldownRepository, CooldownEntry } from '../database/repositories/CooldownRepository';
import { Logger } from '../../shared/logger/Logger';

/**
 * In-memory cooldown map written through to SQLite.
 *
 * A failed write leaves the entry marked dirty; `flush()` retries dirty
 * writes and pending deletes. Reads never touch the database after startup.
 */
@injectable()
export class PersistentCooldownStore implements ICooldownStore {
    private logger = Logger.getInstance();
    private readonly entries = new Map<string, CooldownEntry>();
    private readonly dirty = new Set<string>();
    private readonly pendingDeletes = new Set<string>();

    constructor(
        @inject(CooldownRepository) private readonly repository: CooldownRepository
    ) {
        try {
            for (const entry of this.repository.loadAll()) {
                this.entries.set(entry.key.toString(), entry);
            }
            this.logger.debug(`Loaded ${this.entries.size} cooldown keys`);
        } catch (error) {
            this.logger.error('Failed to load cooldown state, starting empty', error);
        }
    }

    isAllowed(key: CooldownKey, now: number, windowMs: number): boolean {
        const last = this.lastFired(key);
        return last === undefined || now - last >= windowMs;
    }

    record(key: CooldownKey, now: number): void {
        const id = key.toString();
        const entry = { key, firedAt: now };
        this.entries.set(id, entry);
        this.pendingDeletes.delete(id);

        try {
            this.repository.upsert([entry]);
            this.dirty.delete(id);
        } catch (error) {
            this.dirty.add(id);
            this.logger.error(`Failed to persist cooldown ${id}`, error);
        }
    }

    lastFired(key: CooldownKey): number | undefined {
        return this.entries.get(key.toString())?.firedAt;
    }

    prune(predicate: (key: CooldownKey) => boolean): number {
        const removed: string[] = [];
        for (const [id, entry] of this.entries) {
            if (predicate(entry.key)) removed.push(id);
        }
        if (removed.length === 0) return 0;

        for (const id of removed) {
            this.entries.delete(id);
            this.dirty.delete(id);
        }

        try {
            this.repository.deleteKeys(removed);
        } catch (error) {
            removed.forEach(id => this.pendingDeletes.add(id));
            this.logger.error(`Failed to delete ${removed.length} cooldown keys`, error);
        }
        return removed.length;
    }

    pruneCategory(category: string): number {
        return this.prune(key => key.category === category);
    }

    pruneStaleSessions(current: TradingSession): number {
        const keep = `${CooldownCategory.SESSION_PREFIX}${current}`;
        return this.prune(key => key.isSessionScoped && key.category !== keep);
    }

    flush(): boolean {
        if (this.dirty.size === 0 && this.pendingDeletes.size === 0) return true;

        try {
            const pending = [...this.dirty]
                .map(id => this.entries.get(id))
                .filter((entry): entry is CooldownEntry => entry !== undefined);
            this.repository.upsert(pending);
            this.repository.deleteKeys([...this.pendingDeletes]);
            this.dirty.clear();
            this.pendingDeletes.clear();
            return true;
        } catch (error) {
            this.logger.error('Failed to flush cooldown state', error);
            return false;
        }
    }

    get size(): number {
        return this.entries.size;
    }
}
