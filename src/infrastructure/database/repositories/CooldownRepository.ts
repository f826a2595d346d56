import { injectable, inject } from 'inversify';
import { CooldownKey } from '../../../domain/value-objects/CooldownKey';
import { TYPES } from '../../../config/types';
import { SqliteDatabase } from '../SqliteDatabase';
import { Logger } from '../../../shared/logger/Logger';

interface CooldownRow {
    key: string;
    fired_at: number;
}

export interface CooldownEntry {
    key: CooldownKey;
    firedAt: number;
}

@injectable()
export class CooldownRepository {
    private logger = Logger.getInstance();

    constructor(
        @inject(TYPES.Database) private readonly db: SqliteDatabase
    ) {}

    loadAll(): CooldownEntry[] {
        const rows = this.db
            .prepare<[], CooldownRow>('SELECT key, fired_at FROM cooldowns')
            .all();
        const entries: CooldownEntry[] = [];
        for (const row of rows) {
            try {
                entries.push({ key: CooldownKey.parse(row.key), firedAt: row.fired_at });
            } catch (error) {
                this.logger.warn(`Skipping stored cooldown "${row.key}"`, error);
            }
        }
        return entries;
    }

    upsert(entries: readonly CooldownEntry[]): void {
        const stmt = this.db.prepare<[string, string, string, number]>(
            `INSERT INTO cooldowns (key, subject, category, fired_at) VALUES (?, ?, ?, ?)
             ON CONFLICT(key) DO UPDATE SET fired_at = excluded.fired_at`
        );
        const write = this.db.transaction((batch: readonly CooldownEntry[]) => {
            for (const { key, firedAt } of batch) {
                stmt.run(key.toString(), key.subject, key.category, firedAt);
            }
        });
        write(entries);
    }

    deleteKeys(keys: readonly string[]): void {
        const stmt = this.db.prepare<[string]>('DELETE FROM cooldowns WHERE key = ?');
        const remove = this.db.transaction((batch: readonly string[]) => {
            for (const key of batch) stmt.run(key);
        });
        remove(keys);
    }
}
