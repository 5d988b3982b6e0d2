/**
 * Practicum Homework API Client
 * Fetches homework statuses changed since a given moment
 */

import {
    errorMessage,
    fail,
    ok,
    type AvailabilityError,
    type FormatError,
    type Result,
} from './errors.js';

export interface PracticumClientOptions {
    endpoint: string;
    timeoutMs: number;
}

export type FetchStatusesOutcome = Result<unknown, AvailabilityError | FormatError>;

export interface HomeworkSource {
    getHomeworkStatuses(fromDate: number): Promise<FetchStatusesOutcome>;
}

export class PracticumClient implements HomeworkSource {
    private token: string;
    private endpoint: string;
    private timeoutMs: number;

    constructor(token: string, options: PracticumClientOptions) {
        this.token = token;
        this.endpoint = options.endpoint;
        this.timeoutMs = options.timeoutMs;
    }

    /**
     * GET the endpoint with `from_date`. The body comes back untrusted;
     * shape checks belong to `checkResponse`.
     */
    async getHomeworkStatuses(fromDate: number): Promise<FetchStatusesOutcome> {
        const url = new URL(this.endpoint);
        url.searchParams.set('from_date', String(fromDate));

        let res: Response;
        try {
            res = await fetch(url, {
                method: 'GET',
                headers: { Authorization: `OAuth ${this.token}` },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (error) {
            return fail(this.unreachable(error));
        }

        if (!res.ok) {
            return fail<AvailabilityError>({
                kind: 'availability',
                status: res.status,
                message: `Эндпоинт ${this.endpoint} недоступен. Код ответа API: ${res.status}`,
            });
        }

        let body: string;
        try {
            body = await res.text();
        } catch (error) {
            return fail(this.unreachable(error));
        }

        try {
            const parsed: unknown = JSON.parse(body);
            return ok(parsed);
        } catch (error) {
            return fail<FormatError>({
                kind: 'format',
                message: `Ответ API не в формате JSON: ${errorMessage(error)}`,
            });
        }
    }

    private unreachable(error: unknown): AvailabilityError {
        if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
            return {
                kind: 'availability',
                message: `Эндпоинт ${this.endpoint} не ответил за ${this.timeoutMs} мс`,
            };
        }
        return {
            kind: 'availability',
            message: `Эндпоинт ${this.endpoint} недоступен. ${errorMessage(error)}`,
        };
    }
}
