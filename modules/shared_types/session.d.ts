/**
 * Book Reservations - Session Entity Types
 *
 * Server-side sessions referenced by the session cookie, and the short-lived
 * state kept between the login redirect and the provider callback.
 *
 * Key Patterns:
 *   Session:     PK=SESSION#<id>        SK=METADATA  GSI1PK=USER#<user_id>  GSI1SK=SESSION#<timestamp>
 *   Login state: PK=LOGIN_STATE#<state> SK=METADATA  GSI1PK=LOGIN_STATES    GSI1SK=<timestamp>
 */

import type { BaseItem } from './base';

// =============================================================================
// Session Entity
// =============================================================================

/**
 * Lifecycle:
 * 1. Created by /auth/callback after the provider profile is verified
 * 2. Referenced by the session cookie on every request
 * 3. Deleted by /auth/logout, when its user no longer exists, or by TTL
 */
export interface SessionItem extends BaseItem {
    /** PK pattern: SESSION#<session_id> */
    PK: `SESSION#${string}`;
    SK: 'METADATA';
    entityType: 'SESSION';

    sessionId: string;

    /** Internal id of the signed-in user */
    userId: string;

    /** TTL is mandatory for sessions */
    ttl: number;

    userAgent?: string;
    ipAddress?: string;
}

// =============================================================================
// Login State Entity
// =============================================================================

export interface LoginStateItem extends BaseItem {
    /** PK pattern: LOGIN_STATE#<state> */
    PK: `LOGIN_STATE#${string}`;
    SK: 'METADATA';
    entityType: 'LOGIN_STATE';

    /** Opaque state parameter sent to the provider */
    state: string;

    /** Nonce expected in the returned ID token */
    nonce: string;

    /** PKCE verifier for the token exchange */
    codeVerifier: string;

    ttl: number;
}

// =============================================================================
// Session Cookie Configuration
// =============================================================================

export interface SessionCookieConfig {
    /** Cookie name (default: __Host-sid) */
    name: string;

    /** Session TTL in seconds (default: 24 hours) */
    ttlSeconds: number;
}
