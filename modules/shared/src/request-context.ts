/**
 * Book Reservations - Per-Request Context
 *
 * Everything a catalogue handler needs once the event arrives: loggers,
 * the resolved caller, the base URL for links, and any Set-Cookie values
 * that must ride on the response (a stale session cookie being expired).
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type { AccessDeniedDetails } from '../../shared_types/audit';
import type { SessionCookieConfig } from '../../shared_types/schema';
import { AuditLogger, Logger, createLogger, describeError, withContext } from './audit-logger';
import type { ApiError } from './errors/api-errors';
import { ForbiddenError, toApiError } from './errors/api-errors';
import { actorOf, invalidateStaleSession, resolveRequestIdentity } from './identity';
import type { Identity } from './identity';
import { requestBaseUrl } from './http';
import { errorResponse, withCookies } from './response';
import type { StructuredResponse } from './response';
import type { SessionStore, UserStore } from './storage/types';

export interface IdentityStores {
    users: Pick<UserStore, 'getUser'>;
    sessions: Pick<SessionStore, 'getSession' | 'deleteSession'>;
    session: SessionCookieConfig;
}

export interface RequestContext {
    logger: Logger;
    auditLogger: AuditLogger;
    identity: Identity;
    /** Scheme and host for absolute links */
    baseUrl: string;
    /** Set-Cookie values appended to whatever response is sent */
    cookies: string[];
}

/**
 * Build the context for one invocation. A session cookie that no longer
 * resolves is deleted and expired here, before any gate runs.
 */
export async function createRequestContext(
    event: APIGatewayProxyEventV2,
    lambdaContext: Context,
    stores: IdentityStores
): Promise<RequestContext> {
    const logger = createLogger(event, lambdaContext);
    const resolved = await resolveRequestIdentity(event, stores);
    const cookies = await invalidateStaleSession(resolved, stores.sessions, stores.session);

    if (resolved.identity.status === 'logged_out' && cookies.length > 0) {
        logger.info('Stale session invalidated', { reason: resolved.identity.reason });
    }

    return {
        logger,
        auditLogger: withContext(event, lambdaContext),
        identity: resolved.identity,
        baseUrl: requestBaseUrl(event),
        cookies,
    };
}

/**
 * Attach the context's cookies to a response.
 */
export function respond(ctx: RequestContext, response: StructuredResponse): StructuredResponse {
    return withCookies(response, ctx.cookies);
}

/**
 * Respond to an expected failure. Forbidden outcomes are audited.
 */
export function reject(
    ctx: RequestContext,
    error: ApiError,
    audit?: Omit<AccessDeniedDetails, 'reason'>
): StructuredResponse {
    if (error instanceof ForbiddenError && audit) {
        ctx.auditLogger.accessDenied(actorOf(ctx.identity), { ...audit, reason: error.reason });
    }
    // Login redirect carries its own cookies
    if (error.kind === 'Unauthenticated') {
        return errorResponse(error, ctx.cookies);
    }
    return respond(ctx, errorResponse(error));
}

/**
 * Respond to a thrown error: log it with detail, answer with a generic 500.
 */
export function handleUnexpected(logger: Logger, error: unknown, cookies: string[] = []): StructuredResponse {
    const apiError = toApiError(error);
    logger.error(
        apiError.kind === 'StorageUnavailable' ? 'Storage unavailable' : 'Unexpected error',
        describeError(error)
    );
    return withCookies(errorResponse(apiError), cookies);
}
