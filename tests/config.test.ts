import { describe, it, expect } from 'vitest';
import {
    checkTokens,
    loadConfig,
    DEFAULT_ENDPOINT,
    DEFAULT_RETRY_PERIOD_SECONDS,
    DEFAULT_REQUEST_TIMEOUT_MS,
} from '../src/config.js';

const FULL_ENV = {
    PRACTICUM_TOKEN: 'test-practicum-token',
    TELEGRAM_TOKEN: 'test-telegram-token',
    TELEGRAM_CHAT_ID: '12345',
};

describe('Config', () => {
    describe('loadConfig', () => {
        it('should read credentials and apply defaults', () => {
            const config = loadConfig(FULL_ENV);

            expect(config).toEqual({
                practicumToken: 'test-practicum-token',
                telegramToken: 'test-telegram-token',
                telegramChatId: '12345',
                endpoint: DEFAULT_ENDPOINT,
                retryPeriodSeconds: DEFAULT_RETRY_PERIOD_SECONDS,
                requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
                logging: { level: 'debug', pretty: true },
            });
        });

        it('should read optional overrides', () => {
            const config = loadConfig({
                ...FULL_ENV,
                PRACTICUM_ENDPOINT: 'http://localhost:8080/statuses/',
                RETRY_PERIOD_SECONDS: '60',
                REQUEST_TIMEOUT_MS: '2500',
                LOG_LEVEL: 'info',
                LOG_PRETTY: 'off',
            });

            expect(config.endpoint).toBe('http://localhost:8080/statuses/');
            expect(config.retryPeriodSeconds).toBe(60);
            expect(config.requestTimeoutMs).toBe(2500);
            expect(config.logging).toEqual({ level: 'info', pretty: false });
        });

        it('should fall back to defaults for invalid numbers', () => {
            const config = loadConfig({ ...FULL_ENV, RETRY_PERIOD_SECONDS: 'soon', REQUEST_TIMEOUT_MS: '-5' });

            expect(config.retryPeriodSeconds).toBe(600);
            expect(config.requestTimeoutMs).toBe(30_000);
        });

        it('should leave missing credentials undefined', () => {
            const config = loadConfig({ TELEGRAM_TOKEN: '  ' });

            expect(config.practicumToken).toBeUndefined();
            expect(config.telegramToken).toBeUndefined();
            expect(config.telegramChatId).toBeUndefined();
        });
    });

    describe('checkTokens', () => {
        it('should return the credentials when all are present', () => {
            expect(checkTokens(loadConfig(FULL_ENV))).toEqual({
                success: true,
                data: {
                    practicumToken: 'test-practicum-token',
                    telegramToken: 'test-telegram-token',
                    telegramChatId: '12345',
                },
            });
        });

        it.each(['PRACTICUM_TOKEN', 'TELEGRAM_TOKEN', 'TELEGRAM_CHAT_ID'])(
            'should report a missing %s',
            (variable) => {
                const env: Record<string, string | undefined> = { ...FULL_ENV, [variable]: undefined };
                const result = checkTokens(loadConfig(env));

                expect(result).toEqual({
                    success: false,
                    error: {
                        kind: 'configuration',
                        variable,
                        message: `Отсутствует обязательная переменная окружения: ${variable}. `
                            + 'Программа принудительно остановлена.',
                    },
                });
            },
        );

        it('should treat an empty value as missing', () => {
            const result = checkTokens(loadConfig({ ...FULL_ENV, TELEGRAM_CHAT_ID: '' }));

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.variable).toBe('TELEGRAM_CHAT_ID');
            }
        });

        it('should report the first missing variable', () => {
            const result = checkTokens(loadConfig({}));

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.variable).toBe('PRACTICUM_TOKEN');
            }
        });
    });
});
