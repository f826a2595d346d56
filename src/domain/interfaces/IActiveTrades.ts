import { TradeSignal } from '../value-objects/TradeSignal';
import { Currency } from '../enums/Currency';

export interface IActiveTrades {
    add(signal: TradeSignal): void;
    list(): readonly TradeSignal[];
    remove(id: string): boolean;
    currencies(): Set<Currency>;
    flush(): boolean;
}
