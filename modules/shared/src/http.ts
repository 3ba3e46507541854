/**
 * Book Reservations - Request Helpers
 *
 * Body parsing and absolute-URL construction for API Gateway HTTP API
 * (payload format 2.0) events.
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import { ErrorMessages } from './errors/error-messages';
import { InvalidInputError } from './errors/api-errors';
import { fail, ok } from './errors/result';
import type { Result } from './errors/result';

export type JsonObject = Record<string, unknown>;

/** Invalid JSON body message */
export const INVALID_JSON_BODY = 'Invalid JSON body';

/**
 * Accepts application/json and the application/*+json family, with or
 * without parameters such as charset.
 */
export function isJsonContentType(contentType: string | undefined): boolean {
    if (!contentType) {
        return false;
    }
    const mediaType = contentType.split(';')[0].trim().toLowerCase();
    return mediaType === 'application/json' || (mediaType.startsWith('application/') && mediaType.endsWith('+json'));
}

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON object body.
 *
 * - Content-Type not JSON → 415 "Request must be JSON"
 * - Body does not parse → 400 "Invalid JSON body"
 * - Parsed value is not an object → 400 "JSON payload must be a dictionary"
 */
export function parseJsonBody(event: APIGatewayProxyEventV2): Result<JsonObject, InvalidInputError> {
    if (!isJsonContentType(event.headers?.['content-type'])) {
        return fail(InvalidInputError.unsupportedMediaType());
    }

    const raw = event.isBase64Encoded && event.body
        ? Buffer.from(event.body, 'base64').toString('utf-8')
        : event.body ?? '';

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return fail(new InvalidInputError(INVALID_JSON_BODY));
    }

    if (!isJsonObject(parsed)) {
        return fail(new InvalidInputError(ErrorMessages.PAYLOAD_MUST_BE_OBJECT));
    }

    return ok(parsed);
}

/**
 * Scheme and host the client used, honouring proxy headers.
 *
 * @example
 * ```typescript
 * requestBaseUrl(event); // 'https://api.example.com'
 * ```
 */
export function requestBaseUrl(event: APIGatewayProxyEventV2): string {
    const headers = event.headers ?? {};
    const proto = headers['x-forwarded-proto']?.split(',')[0].trim() || 'https';
    const host = headers['x-forwarded-host']?.split(',')[0].trim()
        || headers.host
        || event.requestContext.domainName;

    return `${proto}://${host}`;
}

/**
 * Join a stored relative path onto the request's base URL.
 */
export function absoluteUrl(baseUrl: string, path: string): string {
    return new URL(path, baseUrl).toString();
}

/**
 * Source IP, preferring the first X-Forwarded-For hop.
 */
export function sourceIp(event: APIGatewayProxyEventV2): string {
    const forwardedFor = event.headers?.['x-forwarded-for'];
    return forwardedFor
        ? forwardedFor.split(',')[0].trim()
        : event.requestContext?.http?.sourceIp || 'unknown';
}
