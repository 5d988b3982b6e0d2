/**
 * Poll Error Taxonomy
 * Every pipeline step returns a Result; the poller branches on `kind`
 */

export type Result<T, E> =
    | { success: true; data: T }
    | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
    return { success: true, data };
}

export function fail<E>(error: E): { success: false; error: E } {
    return { success: false, error };
}

// ─── Error kinds ───

/** A required credential is absent. Halts the process. */
export interface ConfigurationError {
    kind: 'configuration';
    variable: string;
    message: string;
}

/** The homework API could not be reached or answered with a non-success status. */
export interface AvailabilityError {
    kind: 'availability';
    status?: number;
    message: string;
}

/** The response body is not JSON. */
export interface FormatError {
    kind: 'format';
    message: string;
}

export type ContractReason = 'missing_key' | 'type_mismatch';

/** The parsed response does not have the documented shape. */
export interface ContractError {
    kind: 'contract';
    reason: ContractReason;
    key: string;
    expected?: string;
    actual?: string;
    message: string;
}

/** A homework carries a status outside the verdict table. */
export interface DomainError {
    kind: 'domain';
    status: string;
    message: string;
}

/** Telegram refused or never received the message. Logged only. */
export interface DeliveryError {
    kind: 'delivery';
    message: string;
}

/** An exception escaped a pipeline step. */
export interface InternalError {
    kind: 'internal';
    message: string;
}

export type RecoverableError =
    | AvailabilityError
    | FormatError
    | ContractError
    | DomainError
    | InternalError;

// ─── Helpers ───

export function missingKey(key: string): ContractError {
    return {
        kind: 'contract',
        reason: 'missing_key',
        key,
        message: `В ответе API отсутствует ключ ${key}`,
    };
}

export function typeMismatch(key: string, expected: string, actual: string): ContractError {
    return {
        kind: 'contract',
        reason: 'type_mismatch',
        key,
        expected,
        actual,
        message: `Значение ${key} в ответе API имеет тип ${actual}. Ожидается: ${expected}`,
    };
}

/**
 * Describes a JSON value's type for error messages:
 * `null`, `array`, `integer`, `number`, `string`, `boolean`, `object`.
 */
export function describeType(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    if (typeof value === 'number' && Number.isInteger(value)) return 'integer';
    return typeof value;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
