import 'reflect-metadata';
import { runEvaluateCommand } from './presentation/cli/EvaluateCommand';
import { runLiveCommand } from './presentation/cli/LiveCommand';
import { runRanksCommand } from './presentation/cli/RanksCommand';
import { Logger } from './shared/logger/Logger';

const USAGE = 'Usage: fx-signals [live | evaluate | ranks]';

async function main() {
    const logger = Logger.getInstance();
    const mode = process.argv[2] ?? 'live';

    try {
        switch (mode) {
            case 'live':
                await runLiveCommand();
                break;
            case 'evaluate':
                await runEvaluateCommand();
                break;
            case 'ranks':
                await runRanksCommand();
                break;
            default:
                logger.error(`Unknown mode "${mode}". ${USAGE}`);
                process.exit(1);
        }
    } catch (error) {
        logger.error('Application crashed', error);
        process.exit(1);
    }
}

main().catch(err => {
    console.error('Fatal error:', err);
    process.exit(1);
});
