/**
 * Shared test helpers
 */

import { vi } from 'vitest';
import type { Config } from '../src/config.js';
import type { Logger } from '../src/logger.js';

export function makeConfig(overrides: Partial<Config> = {}): Config {
    return {
        practicumToken: 'test-practicum-token',
        telegramToken: 'test-telegram-token',
        telegramChatId: '12345',
        endpoint: 'https://practicum.example.test/api/user_api/homework_statuses/',
        retryPeriodSeconds: 600,
        requestTimeoutMs: 30_000,
        logging: { level: 'debug', pretty: false },
        ...overrides,
    };
}

export function makeLogger() {
    return {
        debug: vi.fn<(message: string) => void>(),
        info: vi.fn<(message: string) => void>(),
        warn: vi.fn<(message: string) => void>(),
        error: vi.fn<(message: string) => void>(),
        critical: vi.fn<(message: string) => void>(),
    } satisfies Logger;
}

export const NOW_MS = 1_700_000_000_000;
export const NOW_SECONDS = 1_700_000_000;
