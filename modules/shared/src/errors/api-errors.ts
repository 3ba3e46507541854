/**
 * Book Reservations - Error Taxonomy
 *
 * Every failure a handler can report is one of these classes. Each carries
 * a stable `kind` discriminator and the HTTP status it maps to, so the
 * response layer never inspects messages.
 *
 * @module errors/api-errors
 */

import { HttpStatus } from './http-status';
import { ErrorMessages } from './error-messages';

export type ApiErrorKind =
    | 'InvalidInput'
    | 'Unauthenticated'
    | 'Forbidden'
    | 'NotFound'
    | 'BookUnavailable'
    | 'StorageUnavailable'
    | 'UnexpectedError';

// =============================================================================
// Base Class
// =============================================================================

export abstract class ApiError extends Error {
    abstract readonly kind: ApiErrorKind;
    abstract readonly statusCode: number;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

// =============================================================================
// Client Errors
// =============================================================================

/**
 * Body failed to parse or validate, or a query parameter is malformed.
 * `violations` keeps each individual problem; `message` joins them.
 */
export class InvalidInputError extends ApiError {
    readonly kind = 'InvalidInput';
    readonly statusCode: 400 | 415;
    readonly violations: readonly string[];

    constructor(violations: string | readonly string[], statusCode: 400 | 415 = HttpStatus.BAD_REQUEST) {
        const list = typeof violations === 'string' ? [violations] : violations;
        super(list.join('; '));
        this.violations = list;
        this.statusCode = statusCode;
    }

    static unsupportedMediaType(): InvalidInputError {
        return new InvalidInputError(ErrorMessages.REQUEST_MUST_BE_JSON, HttpStatus.UNSUPPORTED_MEDIA_TYPE);
    }
}

/** No valid session. Answered with a redirect to the login route. */
export class UnauthenticatedError extends ApiError {
    readonly kind = 'Unauthenticated';
    readonly statusCode = HttpStatus.FOUND;

    constructor(message = 'Authentication required') {
        super(message);
    }
}

export class ForbiddenError extends ApiError {
    readonly kind = 'Forbidden';
    readonly statusCode = HttpStatus.FORBIDDEN;

    constructor(
        message: string,
        readonly reason: 'missing_role' | 'not_owner'
    ) {
        super(message);
    }
}

export class NotFoundError extends ApiError {
    readonly kind = 'NotFound';
    readonly statusCode = HttpStatus.NOT_FOUND;
}

/** Reservation attempted against a missing or soft-deleted book. */
export class BookUnavailableError extends ApiError {
    readonly kind = 'BookUnavailable';
    readonly statusCode = HttpStatus.NOT_FOUND;

    constructor(readonly bookId: string) {
        super(ErrorMessages.BOOK_NOT_FOUND);
    }
}

// =============================================================================
// Server Errors
// =============================================================================

export class StorageUnavailableError extends ApiError {
    readonly kind = 'StorageUnavailable';
    readonly statusCode = HttpStatus.INTERNAL_SERVER_ERROR;

    constructor(options?: ErrorOptions) {
        super(ErrorMessages.STORAGE_UNAVAILABLE, options);
    }
}

export class UnexpectedError extends ApiError {
    readonly kind = 'UnexpectedError';
    readonly statusCode = HttpStatus.INTERNAL_SERVER_ERROR;

    constructor(options?: ErrorOptions) {
        super(ErrorMessages.UNEXPECTED, options);
    }
}

/**
 * Narrow anything thrown to an ApiError. Unknown failures become
 * UnexpectedError with the original kept as `cause`.
 */
export function toApiError(error: unknown): ApiError {
    if (error instanceof ApiError) {
        return error;
    }
    return new UnexpectedError({ cause: error });
}
