/**
 * Homework Response Validation
 * Turns the untrusted API body into typed records, or a typed error
 */

import {
    describeType,
    fail,
    missingKey,
    ok,
    typeMismatch,
    type ContractError,
    type DomainError,
    type Result,
} from './errors.js';

export const HOMEWORK_VERDICTS = {
    approved: 'Работа проверена: ревьюеру всё понравилось. Ура!',
    reviewing: 'Работа взята на проверку ревьюером.',
    rejected: 'Работа проверена: у ревьюера есть замечания.',
} as const;

export type HomeworkStatus = keyof typeof HOMEWORK_VERDICTS;

export interface Homework {
    homework_name: string;
    status: HomeworkStatus;
}

export interface HomeworkStatusesResponse {
    current_date: number;
    /** Most recent record; null when the list was empty. */
    homework: Homework | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissing(value: unknown): value is null | undefined {
    return value === undefined || value === null;
}

export function isHomeworkStatus(value: string): value is HomeworkStatus {
    return Object.prototype.hasOwnProperty.call(HOMEWORK_VERDICTS, value);
}

/**
 * Decodes the whole body once: shape first, then the most recent record.
 */
export function checkResponse(
    raw: unknown,
): Result<HomeworkStatusesResponse, ContractError | DomainError> {
    if (!isRecord(raw)) {
        return fail(typeMismatch('response', 'object', describeType(raw)));
    }

    const currentDate = raw['current_date'];
    const homeworks = raw['homeworks'];

    if (isMissing(currentDate)) return fail(missingKey('current_date'));
    if (isMissing(homeworks)) return fail(missingKey('homeworks'));

    if (typeof currentDate !== 'number' || !Number.isInteger(currentDate)) {
        return fail(typeMismatch('current_date', 'integer', describeType(currentDate)));
    }
    if (!Array.isArray(homeworks)) {
        return fail(typeMismatch('homeworks', 'array', describeType(homeworks)));
    }

    if (homeworks.length === 0) {
        return ok({ current_date: currentDate, homework: null });
    }

    const homework = parseHomework(homeworks[0]);
    if (!homework.success) return homework;

    return ok({ current_date: currentDate, homework: homework.data });
}

export function parseHomework(raw: unknown): Result<Homework, ContractError | DomainError> {
    if (!isRecord(raw)) {
        return fail(typeMismatch('homeworks[0]', 'object', describeType(raw)));
    }

    const name = raw['homework_name'];
    const status = raw['status'];

    if (isMissing(name)) return fail(missingKey('homework_name'));
    if (isMissing(status)) return fail(missingKey('status'));
    if (typeof name !== 'string') {
        return fail(typeMismatch('homework_name', 'string', describeType(name)));
    }
    if (typeof status !== 'string') {
        return fail(typeMismatch('status', 'string', describeType(status)));
    }
    if (!isHomeworkStatus(status)) {
        return fail<DomainError>({
            kind: 'domain',
            status,
            message: `Неожиданный статус домашней работы в ответе API: ${status}`,
        });
    }

    return ok({ homework_name: name, status });
}

export function formatStatusMessage(homework: Homework): string {
    const verdict = HOMEWORK_VERDICTS[homework.status];
    return `Изменился статус проверки работы "${homework.homework_name}". ${verdict}`;
}

/**
 * Extracts the notification text for a single homework record.
 */
export function parseStatus(raw: unknown): Result<string, ContractError | DomainError> {
    const homework = parseHomework(raw);
    if (!homework.success) return homework;
    return ok(formatStatusMessage(homework.data));
}
