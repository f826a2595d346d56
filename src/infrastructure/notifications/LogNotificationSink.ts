import { injectable } from 'inversify';
import { INotificationSink } from '../../domain/interfaces/INotificationSink';
import { Logger } from '../../shared/logger/Logger';

/** Used when no Telegram credentials are configured */
@injectable()
export class LogNotificationSink implements INotificationSink {
    private logger = Logger.getInstance();

    async send(text: string): Promise<boolean> {
        this.logger.info(`[notification]\n${text}`);
        return true;
    }
}
