import { RunLiveEvaluator } from '../../application/use-cases/RunLiveEvaluator';
import { Env } from '../../config/env';
import { TYPES } from '../../config/types';
import { Logger } from '../../shared/logger/Logger';
import { bootstrap, closeDatabase } from './bootstrap';

export async function runLiveCommand(): Promise<void> {
    const logger = Logger.getInstance();
    const container = bootstrap();
    const env = container.get<Env>(TYPES.Env);
    const evaluator = container.get<RunLiveEvaluator>(RunLiveEvaluator);

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}`);
        evaluator.stop();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    logger.info(`Tick interval: ${env.LOOP_INTERVAL_SECONDS}s, pairs: ${env.PAIRS.length}`);

    try {
        await evaluator.start({ intervalMs: env.LOOP_INTERVAL_SECONDS * 1000 });
    } finally {
        closeDatabase(container);
    }
}
