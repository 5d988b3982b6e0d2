import 'dotenv/config';
import { fail, ok, type ConfigurationError, type Result } from './errors.js';

export const DEFAULT_ENDPOINT = 'https://practicum.yandex.ru/api/user_api/homework_statuses/';
export const DEFAULT_RETRY_PERIOD_SECONDS = 600;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface Config {
    practicumToken?: string;
    telegramToken?: string;
    telegramChatId?: string;
    endpoint: string;
    retryPeriodSeconds: number;
    requestTimeoutMs: number;
    logging: {
        level: string;
        pretty: boolean;
    };
}

export interface Credentials {
    practicumToken: string;
    telegramToken: string;
    telegramChatId: string;
}

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, key: string): string | undefined {
    const val = env[key]?.trim();
    return val ? val : undefined;
}

function positiveInt(raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function flag(raw: string | undefined, fallback: boolean): boolean {
    if (!raw) return fallback;
    return !['false', '0', 'no', 'off'].includes(raw.trim().toLowerCase());
}

export function loadConfig(env: Env = process.env): Config {
    return {
        practicumToken: optionalEnv(env, 'PRACTICUM_TOKEN'),
        telegramToken: optionalEnv(env, 'TELEGRAM_TOKEN'),
        telegramChatId: optionalEnv(env, 'TELEGRAM_CHAT_ID'),
        endpoint: optionalEnv(env, 'PRACTICUM_ENDPOINT') ?? DEFAULT_ENDPOINT,
        retryPeriodSeconds: positiveInt(env.RETRY_PERIOD_SECONDS, DEFAULT_RETRY_PERIOD_SECONDS),
        requestTimeoutMs: positiveInt(env.REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS),
        logging: {
            level: optionalEnv(env, 'LOG_LEVEL') ?? 'debug',
            pretty: flag(env.LOG_PRETTY, true),
        },
    };
}

function missingVariable(variable: string): ConfigurationError {
    return {
        kind: 'configuration',
        variable,
        message: `Отсутствует обязательная переменная окружения: ${variable}. `
            + 'Программа принудительно остановлена.',
    };
}

/**
 * Verifies the three required credentials, reporting the first one missing.
 */
export function checkTokens(config: Config): Result<Credentials, ConfigurationError> {
    const { practicumToken, telegramToken, telegramChatId } = config;
    if (!practicumToken) return fail(missingVariable('PRACTICUM_TOKEN'));
    if (!telegramToken) return fail(missingVariable('TELEGRAM_TOKEN'));
    if (!telegramChatId) return fail(missingVariable('TELEGRAM_CHAT_ID'));
    return ok({ practicumToken, telegramToken, telegramChatId });
}
