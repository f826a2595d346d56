import { injectable, inject } from 'inversify';
import { z } from 'zod';
import { TradeSignalRecord } from '../../../domain/value-objects/TradeSignal';
import { TradeDirection } from '../../../domain/enums/TradeDirection';
import { TYPES } from '../../../config/types';
import { SqliteDatabase } from '../SqliteDatabase';
import { Logger } from '../../../shared/logger/Logger';

interface ActiveTradeRow {
    id: string;
    payload: string;
}

const tradeSignalRecordSchema = z.object({
    id: z.string(),
    pair: z.string(),
    direction: z.nativeEnum(TradeDirection),
    entry: z.number(),
    stopLoss: z.number(),
    takeProfits: z.array(z.number()).min(1),
    strengthDifferential: z.number(),
    strongRank: z.number(),
    weakRank: z.number(),
    atr: z.number(),
    diagnostics: z.object({
        decisionRsi: z.number(),
        entryRsi: z.number(),
        breakoutTag: z.string(),
        scenario: z.string()
    }),
    createdAt: z.number()
});

@injectable()
export class ActiveTradeRepository {
    private logger = Logger.getInstance();

    constructor(
        @inject(TYPES.Database) private readonly db: SqliteDatabase
    ) {}

    /** Rows that no longer parse are skipped with a warning */
    loadAll(): TradeSignalRecord[] {
        const rows = this.db
            .prepare<[], ActiveTradeRow>('SELECT id, payload FROM active_trades ORDER BY created_at, id')
            .all();

        const records: TradeSignalRecord[] = [];
        for (const row of rows) {
            const parsed = tradeSignalRecordSchema.safeParse(this.parseJson(row.payload));
            if (parsed.success) {
                records.push(parsed.data);
            } else {
                this.logger.warn(`Skipping unreadable active trade ${row.id}: ${parsed.error.issues[0]?.message}`);
            }
        }
        return records;
    }

    save(record: TradeSignalRecord): void {
        this.db
            .prepare<[string, string, string, number]>(
                `INSERT INTO active_trades (id, pair, payload, created_at) VALUES (?, ?, ?, ?)
                 ON CONFLICT(id) DO UPDATE SET payload = excluded.payload`
            )
            .run(record.id, record.pair, JSON.stringify(record), record.createdAt);
    }

    delete(id: string): void {
        this.db.prepare<[string]>('DELETE FROM active_trades WHERE id = ?').run(id);
    }

    private parseJson(payload: string): unknown {
        try {
            return JSON.parse(payload);
        } catch {
            return undefined;
        }
    }
}
