import { IStrengthEngine } from '../../domain/interfaces/IStrengthEngine';
import { TYPES } from '../../config/types';
import { Logger } from '../../shared/logger/Logger';
import { bootstrap, closeDatabase } from './bootstrap';

export async function runRanksCommand(): Promise<void> {
    const logger = Logger.getInstance();
    const container = bootstrap();

    try {
        const ranks = await container.get<IStrengthEngine>(TYPES.IStrengthEngine).computeRanks();
        if (ranks.size === 0) {
            logger.warn('No ranks available');
            return;
        }

        logger.info(`Currency ranks (${ranks.size})`);
        const ordered = [...ranks.entries()].sort((a, b) => b[1] - a[1]);
        for (const [currency, rank] of ordered) {
            logger.info(`${currency}: ${rank > 0 ? '+' : ''}${rank}`);
        }
    } finally {
        closeDatabase(container);
    }
}
