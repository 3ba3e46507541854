/**
 * Book Reservations - Standardized HTTP Response Helpers
 *
 * Consistent response formatting for all Lambda functions.
 *
 * Error body shapes:
 * - 400/415: { "error": "<message>" }
 * - 403/404/405: { "code": <status>, "name": "<reason phrase>", "description": "<message>" }
 * - 302 (unauthenticated): Location: /auth/login, empty body
 * - 500: { "error": "An unexpected error occurred" }
 * - Sign-in failures: { "error": "<code>", "error_description": "<message>" }
 *
 * Security Headers:
 * - Strict-Transport-Security: Enforces HTTPS connections (HSTS)
 * - X-Content-Type-Options: nosniff - Prevents MIME type sniffing
 * - X-Frame-Options: DENY - Prevents clickjacking
 * - Content-Security-Policy: Restricts resource loading
 * - Cache-Control: no-store - Responses depend on the caller's session
 *
 * HTTP API Gateway v2 does not support response header manipulation at the
 * gateway level, so headers are added here.
 *
 * @see RFC 6797 - HTTP Strict Transport Security (HSTS)
 */

import type { APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import type { ApiError } from './errors/api-errors';
import { ErrorMessages } from './errors/error-messages';
import { HttpStatus } from './errors/http-status';
import { LOGIN_PATH } from './constants';

// =============================================================================
// Types
// =============================================================================

/**
 * Structured API Gateway response (excludes string shorthand).
 * Every helper returns this so headers can be extended afterwards.
 */
export type StructuredResponse = APIGatewayProxyStructuredResultV2;

// =============================================================================
// Response Headers
// =============================================================================

const SECURITY_HEADERS = {
    'Strict-Transport-Security': 'max-age=63072000; includeSubDomains; preload',
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'strict-origin-when-cross-origin',
} as const;

const JSON_HEADERS = {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    'Content-Security-Policy': "default-src 'none'; frame-ancestors 'none'",
    ...SECURITY_HEADERS,
} as const;

const REDIRECT_HEADERS = {
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    ...SECURITY_HEADERS,
} as const;

// =============================================================================
// Success Responses
// =============================================================================

/**
 * Return a successful JSON response.
 *
 * @param body - Response body (will be JSON stringified)
 * @param statusCode - HTTP status code (default: 200)
 */
export function success<T>(body: T, statusCode: number = HttpStatus.OK): StructuredResponse {
    return {
        statusCode,
        headers: { ...JSON_HEADERS },
        body: JSON.stringify(body),
    };
}

export function created<T>(body: T): StructuredResponse {
    return success(body, HttpStatus.CREATED);
}

export function noContent(): StructuredResponse {
    return {
        statusCode: HttpStatus.NO_CONTENT,
        headers: {
            'Cache-Control': 'no-store',
            ...SECURITY_HEADERS,
        },
        body: '',
    };
}

// =============================================================================
// Redirect Responses
// =============================================================================

/**
 * Return an HTTP 302 Found redirect.
 *
 * @param cookies - Set-Cookie values to send with the redirect
 */
export function redirect(url: string, cookies?: string[]): StructuredResponse {
    return {
        statusCode: HttpStatus.FOUND,
        headers: {
            ...REDIRECT_HEADERS,
            Location: url,
        },
        ...(cookies && cookies.length > 0 ? { cookies } : {}),
        body: '',
    };
}

/**
 * Redirect an unauthenticated caller to the login route.
 */
export function loginRedirect(cookies?: string[]): StructuredResponse {
    return redirect(LOGIN_PATH, cookies);
}

// =============================================================================
// Error Responses
// =============================================================================

/** Envelope for 403, 404 and 405 responses. */
export interface StatusErrorBody {
    code: number;
    name: string;
    description: string;
}

/** Envelope for sign-in failures, following the OAuth error response format. */
export interface OAuthErrorBody {
    error: string;
    error_description?: string;
}

function statusError(statusCode: number, name: string, description: string): StructuredResponse {
    const body: StatusErrorBody = { code: statusCode, name, description };
    return success(body, statusCode);
}

/** 400/415 with `{ error }`. */
export function badRequest(message: string, statusCode: number = HttpStatus.BAD_REQUEST): StructuredResponse {
    return success({ error: message }, statusCode);
}

export function forbidden(description: string = ErrorMessages.MISSING_ROLE): StructuredResponse {
    return statusError(HttpStatus.FORBIDDEN, 'Forbidden', description);
}

export function notFound(description: string): StructuredResponse {
    return statusError(HttpStatus.NOT_FOUND, 'Not Found', description);
}

export function methodNotAllowed(method: string, allowed: readonly string[]): StructuredResponse {
    const response = statusError(
        HttpStatus.METHOD_NOT_ALLOWED,
        'Method Not Allowed',
        `Method ${method} is not allowed on this resource`
    );
    return withHeaders(response, { Allow: allowed.join(', ') });
}

/**
 * 500 Internal Server Error. Never carries internal detail.
 */
export function serverError(): StructuredResponse {
    return success({ error: ErrorMessages.UNEXPECTED }, HttpStatus.INTERNAL_SERVER_ERROR);
}

/**
 * Return an OAuth-style error response.
 *
 * @example
 * ```typescript
 * return error(400, 'invalid_request', 'Missing required parameters: code and state');
 * ```
 */
export function error(
    statusCode: number,
    errorCode: string,
    description?: string
): StructuredResponse {
    const body: OAuthErrorBody = {
        error: errorCode,
    };

    if (description) {
        body.error_description = description;
    }

    return success(body, statusCode);
}

export function invalidRequest(description: string): StructuredResponse {
    return error(HttpStatus.BAD_REQUEST, 'invalid_request', description);
}

/**
 * Map a typed error to its HTTP response.
 *
 * @param cookies - Set-Cookie values for the login redirect (stale-session clearing)
 */
export function errorResponse(err: ApiError, cookies?: string[]): StructuredResponse {
    switch (err.kind) {
        case 'InvalidInput':
            return badRequest(err.message, err.statusCode);
        case 'Unauthenticated':
            return loginRedirect(cookies);
        case 'Forbidden':
            return forbidden(err.message);
        case 'NotFound':
        case 'BookUnavailable':
            return notFound(err.message);
        case 'StorageUnavailable':
        case 'UnexpectedError':
            return serverError();
    }
}

// =============================================================================
// Header Helpers
// =============================================================================

export function withHeaders(
    response: StructuredResponse,
    headers: Record<string, string>
): StructuredResponse {
    return {
        ...response,
        headers: {
            ...response.headers,
            ...headers,
        },
    };
}

/**
 * Append Set-Cookie values. HTTP API v2 emits each entry of `cookies`
 * as its own Set-Cookie header.
 */
export function withCookies(response: StructuredResponse, cookies: string[]): StructuredResponse {
    if (cookies.length === 0) {
        return response;
    }
    return {
        ...response,
        cookies: [...(response.cookies ?? []), ...cookies],
    };
}
