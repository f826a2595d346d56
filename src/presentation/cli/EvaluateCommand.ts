import { RunEvaluationPass } from '../../application/use-cases/RunEvaluationPass';
import { RunGroupBreakoutAlert } from '../../application/use-cases/RunGroupBreakoutAlert';
import { ICooldownStore } from '../../domain/interfaces/ICooldownStore';
import { IActiveTrades } from '../../domain/interfaces/IActiveTrades';
import { TYPES } from '../../config/types';
import { Logger } from '../../shared/logger/Logger';
import { bootstrap, closeDatabase } from './bootstrap';

/** One evaluation pass, then exit */
export async function runEvaluateCommand(): Promise<void> {
    const logger = Logger.getInstance();
    const container = bootstrap();

    try {
        const pass = container.get<RunEvaluationPass>(RunEvaluationPass);
        const result = await pass.execute();
        await container.get<RunGroupBreakoutAlert>(RunGroupBreakoutAlert).execute();

        logger.info(`Ranked ${result.ranks.size} currencies, ${result.candidates.length} candidates, ${result.signals.length} signal(s)`);
        for (const signal of result.signals) {
            logger.info(`${signal.direction} ${signal.pair.id} @ ${signal.entry} (SL ${signal.stopLoss})`);
        }
    } finally {
        container.get<ICooldownStore>(TYPES.ICooldownStore).flush();
        container.get<IActiveTrades>(TYPES.IActiveTrades).flush();
        closeDatabase(container);
    }
}
