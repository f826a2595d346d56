import { injectable, inject } from 'inversify';
import { IActiveTrades } from '../../domain/interfaces/IActiveTrades';
import { TradeSignal, TradeSignalRecord } from '../../domain/value-objects/TradeSignal';
import { Currency } from '../../domain/enums/Currency';
import { ActiveTradeRepository } from '../database/repositories/ActiveTradeRepository';
import { Logger } from '../../shared/logger/Logger';

/**
 * Emitted signals still considered live. Same write-through and
 * dirty-flush behaviour as the cooldown store.
 */
@injectable()
export class ActiveTradesRegistry implements IActiveTrades {
    private logger = Logger.getInstance();
    private readonly trades = new Map<string, TradeSignal>();
    private readonly dirty = new Set<string>();
    private readonly pendingDeletes = new Set<string>();

    constructor(
        @inject(ActiveTradeRepository) private readonly repository: ActiveTradeRepository
    ) {
        let records: TradeSignalRecord[] = [];
        try {
            records = this.repository.loadAll();
        } catch (error) {
            this.logger.error('Failed to load active trades, starting empty', error);
        }

        for (const record of records) {
            try {
                const signal = TradeSignal.fromRecord(record);
                this.trades.set(signal.id, signal);
            } catch (error) {
                this.logger.warn(`Skipping stored active trade ${record.id}`, error);
            }
        }
    }

    add(signal: TradeSignal): void {
        this.trades.set(signal.id, signal);
        this.pendingDeletes.delete(signal.id);

        try {
            this.repository.save(signal.toRecord());
            this.dirty.delete(signal.id);
        } catch (error) {
            this.dirty.add(signal.id);
            this.logger.error(`Failed to persist active trade ${signal.id}`, error);
        }
    }

    list(): readonly TradeSignal[] {
        return [...this.trades.values()];
    }

    remove(id: string): boolean {
        if (!this.trades.delete(id)) return false;
        this.dirty.delete(id);

        try {
            this.repository.delete(id);
        } catch (error) {
            this.pendingDeletes.add(id);
            this.logger.error(`Failed to delete active trade ${id}`, error);
        }
        return true;
    }

    currencies(): Set<Currency> {
        const result = new Set<Currency>();
        for (const trade of this.trades.values()) {
            result.add(trade.pair.base);
            result.add(trade.pair.quote);
        }
        return result;
    }

    flush(): boolean {
        if (this.dirty.size === 0 && this.pendingDeletes.size === 0) return true;

        try {
            for (const id of this.dirty) {
                const trade = this.trades.get(id);
                if (trade) this.repository.save(trade.toRecord());
            }
            for (const id of this.pendingDeletes) {
                this.repository.delete(id);
            }
            this.dirty.clear();
            this.pendingDeletes.clear();
            return true;
        } catch (error) {
            this.logger.error('Failed to flush active trades', error);
            return false;
        }
    }
}
