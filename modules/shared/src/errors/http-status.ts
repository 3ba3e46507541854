/**
 * Book Reservations - HTTP Status Codes
 *
 * Status codes returned by the catalogue, reservation and sign-in endpoints.
 *
 * @see RFC 9110 - HTTP Semantics
 */

export const HttpStatus = {
    /** Request succeeded */
    OK: 200,
    /** Resource created successfully */
    CREATED: 201,
    /** Request succeeded with no content to return */
    NO_CONTENT: 204,
    /** Sign-in redirects and unauthenticated requests */
    FOUND: 302,
    /** Malformed body, failed validation or bad pagination */
    BAD_REQUEST: 400,
    /** ID token could not be verified */
    UNAUTHORIZED: 401,
    /** Authenticated but lacking a role or ownership */
    FORBIDDEN: 403,
    /** Resource not found, or no longer active */
    NOT_FOUND: 404,
    /** HTTP method not allowed for this endpoint */
    METHOD_NOT_ALLOWED: 405,
    /** Body is not JSON */
    UNSUPPORTED_MEDIA_TYPE: 415,
    /** Unexpected server error */
    INTERNAL_SERVER_ERROR: 500,
} as const;

/** Type representing valid HTTP status code values */
export type HttpStatusCode = typeof HttpStatus[keyof typeof HttpStatus];
