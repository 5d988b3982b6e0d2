/**
 * Poller — Orchestrates the token check → fetch → validate → parse → notify cycle
 */

import { checkTokens, type Config, type Credentials } from './config.js';
import {
    errorMessage,
    fail,
    ok,
    type ConfigurationError,
    type RecoverableError,
    type Result,
} from './errors.js';
import { checkResponse, formatStatusMessage } from './homework.js';
import type { Logger } from './logger.js';
import { PracticumClient, type HomeworkSource } from './practicum-client.js';
import { TelegramNotifier, type MessageNotifier } from './telegram.js';

export type CycleOutcome =
    | { state: 'halted'; error: ConfigurationError }
    | { state: 'idle'; cursor: number }
    | { state: 'notified'; cursor: number; message: string; delivered: boolean }
    | { state: 'failed'; error: RecoverableError; notified: boolean };

/**
 * Collaborators the poller reaches the outside world through.
 * Production defaults are used when not provided by tests.
 */
export interface PollerDeps {
    createSource: (credentials: Credentials, config: Config) => HomeworkSource;
    createNotifier: (credentials: Credentials, logger: Logger) => MessageNotifier;
    sleep: (ms: number) => Promise<void>;
    now: () => number;
    exit: (code: number) => void;
}

const defaultDeps: PollerDeps = {
    createSource: (credentials, config) => new PracticumClient(credentials.practicumToken, {
        endpoint: config.endpoint,
        timeoutMs: config.requestTimeoutMs,
    }),
    createNotifier: (credentials, logger) => TelegramNotifier.fromToken(
        credentials.telegramToken, credentials.telegramChatId, logger,
    ),
    sleep: (ms) => new Promise(r => setTimeout(r, ms)),
    now: () => Date.now(),
    exit: (code) => {
        process.exit(code);
    },
};

interface Clients {
    source: HomeworkSource;
    notifier: MessageNotifier;
}

type Extracted =
    | { hasStatus: false; cursor: number }
    | { hasStatus: true; cursor: number; message: string };

export class Poller {
    private config: Config;
    private logger: Logger;
    private deps: PollerDeps;
    private clients?: Clients;
    private running = false;

    /** `from_date` watermark in Unix seconds. */
    private cursor: number;
    /** Text of the last failure sent to the chat; empty after a successful cycle. */
    private lastErrorMessage = '';

    constructor(config: Config, logger: Logger, deps: Partial<PollerDeps> = {}) {
        this.config = config;
        this.logger = logger;
        this.deps = { ...defaultDeps, ...deps };
        this.cursor = Math.floor(this.deps.now() / 1000);
    }

    get timestamp(): number {
        return this.cursor;
    }

    get lastError(): string {
        return this.lastErrorMessage;
    }

    /**
     * Run a single cycle. Only a missing credential halts; every other
     * failure is reported (once per distinct message) and left for the next cycle.
     */
    async pollOnce(): Promise<CycleOutcome> {
        const tokens = checkTokens(this.config);
        if (!tokens.success) {
            this.logger.critical(tokens.error.message);
            this.deps.exit(1);
            return { state: 'halted', error: tokens.error };
        }

        const { source, notifier } = this.connect(tokens.data);

        let extracted: Result<Extracted, RecoverableError>;
        try {
            extracted = await this.fetchStatus(source);
        } catch (error) {
            extracted = fail<RecoverableError>({ kind: 'internal', message: errorMessage(error) });
        }

        if (!extracted.success) {
            const notified = await this.reportFailure(notifier, extracted.error);
            return { state: 'failed', error: extracted.error, notified };
        }

        const result = extracted.data;
        let outcome: CycleOutcome;
        if (result.hasStatus) {
            const delivered = await notifier.send(result.message);
            outcome = { state: 'notified', cursor: result.cursor, message: result.message, delivered };
        } else {
            outcome = { state: 'idle', cursor: result.cursor };
        }

        this.cursor = result.cursor;
        this.lastErrorMessage = '';
        return outcome;
    }

    private connect(credentials: Credentials): Clients {
        if (!this.clients) {
            this.clients = {
                source: this.deps.createSource(credentials, this.config),
                notifier: this.deps.createNotifier(credentials, this.logger),
            };
        }
        return this.clients;
    }

    private async fetchStatus(source: HomeworkSource): Promise<Result<Extracted, RecoverableError>> {
        const fetched = await source.getHomeworkStatuses(this.cursor);
        if (!fetched.success) return fetched;

        const checked = checkResponse(fetched.data);
        if (!checked.success) return checked;

        const { current_date: cursor, homework } = checked.data;
        if (!homework) {
            this.logger.debug('Новый статус отсутствует');
            return ok<Extracted>({ hasStatus: false, cursor });
        }

        return ok<Extracted>({ hasStatus: true, cursor, message: formatStatusMessage(homework) });
    }

    private async reportFailure(notifier: MessageNotifier, error: RecoverableError): Promise<boolean> {
        const message = `Сбой в работе программы: ${error.message}`;
        this.logger.error(message);

        if (message === this.lastErrorMessage) return false;

        await notifier.send(message);
        this.lastErrorMessage = message;
        return true;
    }

    /**
     * Poll, sleep, repeat until stopped or halted
     */
    async start(): Promise<void> {
        const interval = this.config.retryPeriodSeconds;
        this.running = true;
        this.logger.info(`🚀 Homework status bot started — polling every ${interval} seconds`);

        while (this.running) {
            const outcome = await this.pollOnce();
            if (outcome.state === 'halted') {
                this.running = false;
                return;
            }
            if (!this.running) break;
            await this.deps.sleep(interval * 1000);
        }
    }

    /**
     * Stop polling after the current cycle or sleep
     */
    stop(): void {
        if (!this.running) return;
        this.running = false;
        this.logger.info('🛑 Homework status bot stopped');
    }
}
