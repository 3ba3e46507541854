/**
 * Book Reservations - Result Type
 *
 * Lifecycle operations return a Result instead of throwing for expected
 * failures (validation, not-found, access denied). Infrastructure failures
 * still throw and are mapped at the handler boundary.
 *
 * @module errors/result
 */

import type { ApiError } from './api-errors';

export interface Ok<T> {
    readonly ok: true;
    readonly value: T;
}

export interface Err<E> {
    readonly ok: false;
    readonly error: E;
}

export type Result<T, E extends ApiError = ApiError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
    return { ok: true, value };
}

export function fail<E extends ApiError>(error: E): Err<E> {
    return { ok: false, error };
}
