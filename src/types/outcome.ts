/**
 * Result of one unit of work (page fetch, publication, paper, author lookup).
 * The orchestrators branch on `status` instead of catching exceptions.
 */
export type Outcome<T> = Success<T> | Skipped | Failed;

export interface Success<T> {
    status: 'success';
    value: T;
}

export interface Skipped {
    status: 'skipped';
    reason: string;
}

export interface Failed {
    status: 'failed';
    kind: FailureKind;
    message: string;
    /** HTTP status of the last attempt, when there was a response */
    httpStatus?: number;
}

/**
 * Failure taxonomy.
 *
 *   transient-network  timeouts, connection errors
 *   rate-limited       HTTP 429
 *   permanent-page     non-200 after the retry budget, or an unparseable body
 *   malformed-record   one result block failed extraction
 */
export type FailureKind = 'transient-network' | 'rate-limited' | 'permanent-page' | 'malformed-record';

export function success<T>(value: T): Success<T> {
    return { status: 'success', value };
}

export function skipped(reason: string): Skipped {
    return { status: 'skipped', reason };
}

export function failed(kind: FailureKind, message: string, httpStatus?: number): Failed {
    return httpStatus === undefined
        ? { status: 'failed', kind, message }
        : { status: 'failed', kind, message, httpStatus };
}

/**
 * Human-readable reason for a non-success outcome, for logs.
 */
export function describeOutcome(outcome: Skipped | Failed): string {
    return outcome.status === 'skipped' ? outcome.reason : `${outcome.kind}: ${outcome.message}`;
}
