/**
 * Book Reservations - Errors Module
 *
 * @module errors
 */

export { HttpStatus } from './http-status';

export type { HttpStatusCode } from './http-status';

export { ErrorMessages } from './error-messages';

export {
    ApiError,
    InvalidInputError,
    UnauthenticatedError,
    ForbiddenError,
    NotFoundError,
    BookUnavailableError,
    StorageUnavailableError,
    UnexpectedError,
    toApiError,
} from './api-errors';

export type { ApiErrorKind } from './api-errors';

export { ok, fail } from './result';

export type { Ok, Err, Result } from './result';
