/**
 * Book Reservations - Identity Resolver
 *
 * Turns the session cookie into a Principal, or into LoggedOut when there
 * is no usable session. Resolution never writes; invalidating a stale
 * session is a separate, explicit step.
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import type { AuditActor } from '../../shared_types/audit';
import type { SessionCookieConfig, UserItem, UserProfile } from '../../shared_types/schema';
import type { SessionStore, UserStore } from './storage/types';
import { buildClearSessionCookieHeader, getSessionIdFromCookie } from './session';

// =============================================================================
// Types
// =============================================================================

export interface Principal {
    /** Internal user id */
    id: string;
    email?: string;
    roles: ReadonlySet<string>;
    profile: UserProfile;
}

export interface Authenticated {
    status: 'authenticated';
    principal: Principal;
}

export interface LoggedOut {
    status: 'logged_out';
    /**
     * no_session: no cookie, or the session is missing or expired.
     * unknown_user: the session points at a user that no longer exists.
     */
    reason: 'no_session' | 'unknown_user';
}

export type Identity = Authenticated | LoggedOut;

export interface RequestIdentity {
    identity: Identity;
    /** Session id from a cookie that no longer resolves to a principal */
    staleSessionId?: string;
}

// =============================================================================
// Resolution
// =============================================================================

export function principalFromUser(user: UserItem): Principal {
    return {
        id: user.id,
        email: user.email,
        roles: new Set(user.roles),
        profile: user.profile,
    };
}

/**
 * Load the principal for a session's user id.
 */
export async function resolvePrincipal(
    sessionUserId: string | undefined,
    users: Pick<UserStore, 'getUser'>
): Promise<Identity> {
    if (!sessionUserId) {
        return { status: 'logged_out', reason: 'no_session' };
    }

    const user = await users.getUser(sessionUserId);
    if (!user) {
        return { status: 'logged_out', reason: 'unknown_user' };
    }

    return { status: 'authenticated', principal: principalFromUser(user) };
}

export interface IdentityDeps {
    users: Pick<UserStore, 'getUser'>;
    sessions: Pick<SessionStore, 'getSession'>;
    session: SessionCookieConfig;
}

/**
 * Resolve the caller from the session cookie on an HTTP API event.
 */
export async function resolveRequestIdentity(
    event: APIGatewayProxyEventV2,
    deps: IdentityDeps
): Promise<RequestIdentity> {
    const sessionId = getSessionIdFromCookie(event, deps.session.name);
    if (!sessionId) {
        return { identity: { status: 'logged_out', reason: 'no_session' } };
    }

    const session = await deps.sessions.getSession(sessionId);
    if (!session) {
        return {
            identity: { status: 'logged_out', reason: 'no_session' },
            staleSessionId: sessionId,
        };
    }

    const identity = await resolvePrincipal(session.userId, deps.users);
    return identity.status === 'authenticated'
        ? { identity }
        : { identity, staleSessionId: sessionId };
}

/**
 * Delete a stale session and return the Set-Cookie values that expire the
 * cookie. Returns an empty list when the session was valid or absent.
 */
export async function invalidateStaleSession(
    resolved: RequestIdentity,
    sessions: Pick<SessionStore, 'deleteSession'>,
    session: SessionCookieConfig
): Promise<string[]> {
    if (!resolved.staleSessionId) {
        return [];
    }

    await sessions.deleteSession(resolved.staleSessionId);
    return [buildClearSessionCookieHeader(session)];
}

/**
 * Audit actor for the caller.
 */
export function actorOf(identity: Identity): AuditActor {
    return identity.status === 'authenticated'
        ? { type: 'USER', sub: identity.principal.id }
        : { type: 'ANONYMOUS' };
}
