import { injectable, inject } from 'inversify';
import { Telegraf } from 'telegraf';
import { INotificationSink } from '../../domain/interfaces/INotificationSink';
import { Env } from '../../config/env';
import { TYPES } from '../../config/types';
import { Logger } from '../../shared/logger/Logger';

@injectable()
export class TelegramNotificationSink implements INotificationSink {
    private logger = Logger.getInstance();
    private readonly bot: Telegraf | null;
    private readonly chatId: string;

    constructor(
        @inject(TYPES.Env) env: Env
    ) {
        this.chatId = env.TELEGRAM_CHAT_ID ?? '';
        this.bot = env.TELEGRAM_TOKEN ? new Telegraf(env.TELEGRAM_TOKEN) : null;
    }

    async send(text: string): Promise<boolean> {
        if (!this.bot || !this.chatId) {
            this.logger.warn('Telegram is not configured, message dropped');
            return false;
        }

        try {
            await this.bot.telegram.sendMessage(this.chatId, text);
            return true;
        } catch (error) {
            this.logger.error('Failed to send telegram message', error);
            return false;
        }
    }
}
