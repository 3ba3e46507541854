/**
 * Book Reservations - Error Messages
 *
 * Human-readable messages placed in error response bodies.
 */

export const ErrorMessages = {
    // -------------------------------------------------------------------------
    // Request Body
    // -------------------------------------------------------------------------

    /** Content-Type is not application/json, or the body does not parse */
    REQUEST_MUST_BE_JSON: 'Request must be JSON',

    /** Parsed body is an array, string, number or null */
    PAYLOAD_MUST_BE_OBJECT: 'JSON payload must be a dictionary',

    /** Prefix for the comma-separated list of absent book fields */
    MISSING_FIELDS_PREFIX: 'Missing required fields: ',

    // -------------------------------------------------------------------------
    // Lookups
    // -------------------------------------------------------------------------

    BOOK_NOT_FOUND: 'Book not found',

    RESERVATION_NOT_FOUND: 'Reservation not found',

    // -------------------------------------------------------------------------
    // Access Control
    // -------------------------------------------------------------------------

    /** Authenticated principal lacks every role the operation accepts */
    MISSING_ROLE: 'You do not have permission to perform this action',

    /** Principal is neither the owner nor an admin */
    NOT_OWNER: 'You do not have access to this reservation',

    // -------------------------------------------------------------------------
    // Server
    // -------------------------------------------------------------------------

    UNEXPECTED: 'An unexpected error occurred',

    STORAGE_UNAVAILABLE: 'The storage backend is unavailable',

    // -------------------------------------------------------------------------
    // Sign-in
    // -------------------------------------------------------------------------

    MISSING_CALLBACK_PARAMS: 'Missing required parameters: code and state',

    UNKNOWN_LOGIN_STATE: 'Login state is unknown or has expired',

    ID_TOKEN_INVALID: 'ID token could not be verified',

    PROVIDER_UNAVAILABLE: 'Identity provider could not be reached',

    /** Token endpoint answered with an error or without an id_token */
    TOKEN_EXCHANGE_REJECTED: 'Authorization code was rejected by the identity provider',

    /** Prefix for an `error` parameter returned on the callback */
    PROVIDER_ERROR_PREFIX: 'Identity provider returned an error: ',
} as const;
