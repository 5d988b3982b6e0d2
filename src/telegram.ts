/**
 * Telegram Notifier
 * Best-effort delivery to a single chat; failures are logged, never thrown
 */

import { Api, GrammyError, HttpError } from 'grammy';
import { errorMessage, type DeliveryError } from './errors.js';
import type { Logger } from './logger.js';

export interface MessageSender {
    sendMessage(chatId: string, text: string): Promise<unknown>;
}

export interface MessageNotifier {
    send(text: string): Promise<boolean>;
}

export function describeDeliveryError(error: unknown): DeliveryError {
    if (error instanceof GrammyError) {
        return { kind: 'delivery', message: `${error.error_code} ${error.description}` };
    }
    if (error instanceof HttpError) {
        return { kind: 'delivery', message: `сетевая ошибка: ${errorMessage(error.error)}` };
    }
    return { kind: 'delivery', message: errorMessage(error) };
}

export class TelegramNotifier implements MessageNotifier {
    private sender: MessageSender;
    private chatId: string;
    private logger: Logger;

    constructor(sender: MessageSender, chatId: string, logger: Logger) {
        this.sender = sender;
        this.chatId = chatId;
        this.logger = logger;
    }

    static fromToken(token: string, chatId: string, logger: Logger): TelegramNotifier {
        return new TelegramNotifier(new Api(token), chatId, logger);
    }

    async send(text: string): Promise<boolean> {
        try {
            await this.sender.sendMessage(this.chatId, text);
            this.logger.debug(`Бот отправил сообщение: ${text}`);
            return true;
        } catch (error) {
            const failure = describeDeliveryError(error);
            this.logger.error(`Не удалось отправить сообщение: ${failure.message}`);
            return false;
        }
    }
}
