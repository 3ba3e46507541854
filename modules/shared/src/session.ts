/**
 * Book Reservations - Session Cookie Helpers
 *
 * The session cookie carries only an opaque session id. Cookies are
 * HttpOnly, Secure and SameSite=Lax with Path=/, which also satisfies the
 * __Host- prefix rules (no Domain attribute).
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import type { SessionCookieConfig } from '../../shared_types/schema';

/**
 * Parse cookies from a Cookie header.
 *
 * @returns Map of cookie name to value
 */
export function parseCookies(cookieHeader: string | undefined): Map<string, string> {
    const cookies = new Map<string, string>();
    if (!cookieHeader) return cookies;

    const pairs = cookieHeader.split(';');
    for (const pair of pairs) {
        const [name, ...valueParts] = pair.trim().split('=');
        if (name) {
            cookies.set(name, valueParts.join('='));
        }
    }
    return cookies;
}

/**
 * Get the session id from the session cookie.
 * HTTP API v2 delivers cookies in `event.cookies`; the header is a fallback.
 */
export function getSessionIdFromCookie(event: APIGatewayProxyEventV2, cookieName: string): string | undefined {
    const cookieHeader = event.cookies?.join('; ') || event.headers?.cookie;
    const value = parseCookies(cookieHeader).get(cookieName);
    return value ? value : undefined;
}

export function buildSessionCookieHeader(config: SessionCookieConfig, sessionId: string): string {
    return `${config.name}=${sessionId}; Path=/; HttpOnly; Secure; SameSite=Lax; Max-Age=${config.ttlSeconds}`;
}

export function buildClearSessionCookieHeader(config: SessionCookieConfig): string {
    return `${config.name}=; Path=/; HttpOnly; Secure; SameSite=Lax; Max-Age=0`;
}
