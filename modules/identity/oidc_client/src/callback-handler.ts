/**
 * OIDC Client - Callback Handler
 *
 * Lambda handler for GET /auth/callback
 *
 * Flow:
 * 1. Require code and state (or surface the provider's error)
 * 2. Consume the login-state item; unknown or expired state is rejected
 * 3. Exchange the code at the token endpoint with the PKCE verifier
 * 4. Verify the ID token (signature, issuer, audience, expiry, nonce)
 * 5. Upsert the user by subject; first sign-in provisions default roles
 * 6. Create a session, set the cookie, redirect to /
 *
 * Failures before verification are 400 invalid_request; a token that
 * fails verification is 401 invalid_token.
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    HttpStatus,
    buildSessionCookieHeader,
    createLogger,
    describeError,
    error,
    generateId,
    generateSecureRandom,
    getSessionIdFromCookie,
    invalidRequest,
    redirect,
    serverError,
    sourceIp,
    withContext,
} from '@book-reservations/shared';
import type { AuditLogger, Logger, StructuredResponse } from '@book-reservations/shared';
import { getDefaultDeps } from './deps';
import { IdTokenVerificationError, ProviderError } from './provider';
import type { OidcDeps } from './types';

/** Where a successful sign-in lands */
export const POST_LOGIN_REDIRECT = '/';

// =============================================================================
// Sign-in
// =============================================================================

async function completeSignIn(
    event: APIGatewayProxyEventV2,
    deps: OidcDeps,
    logger: Logger,
    audit: AuditLogger
): Promise<StructuredResponse> {
    const query = event.queryStringParameters ?? {};

    if (query.error) {
        audit.loginFailure({ method: 'oidc', reason: query.error });
        return invalidRequest(`${ErrorMessages.PROVIDER_ERROR_PREFIX}${query.error}`);
    }

    const { code, state } = query;
    if (!code || !state) {
        return invalidRequest(ErrorMessages.MISSING_CALLBACK_PARAMS);
    }

    const loginState = await deps.sessions.consumeLoginState(state);
    if (!loginState) {
        audit.loginFailure({ method: 'oidc', reason: 'unknown_state' });
        return invalidRequest(ErrorMessages.UNKNOWN_LOGIN_STATE);
    }

    const tokens = await deps.provider.exchangeCode(code, loginState.codeVerifier);
    const profile = await deps.provider.verifyIdToken(tokens.id_token, loginState.nonce);

    const { user, created } = await deps.users.upsertUserFromProfile(profile, generateId());
    const actor = { type: 'USER', sub: user.id } as const;
    if (created) {
        audit.userProvisioned(actor, { userId: user.id, roles: user.roles });
    }

    // A session from before this sign-in is not carried over
    const previousSessionId = getSessionIdFromCookie(event, deps.config.session.name);
    if (previousSessionId) {
        await deps.sessions.deleteSession(previousSessionId);
    }

    const sessionId = generateSecureRandom(32);
    await deps.sessions.createSession({
        sessionId,
        userId: user.id,
        ttlSeconds: deps.config.session.ttlSeconds,
        userAgent: event.headers?.['user-agent'],
        ipAddress: sourceIp(event),
    });

    audit.loginSuccess(actor, { method: 'oidc', email: user.email });
    logger.info('User signed in', { userId: user.id, created });

    return redirect(POST_LOGIN_REDIRECT, [buildSessionCookieHeader(deps.config.session, sessionId)]);
}

// =============================================================================
// Lambda Handler
// =============================================================================

export function createCallbackHandler(
    resolveDeps: () => OidcDeps = getDefaultDeps
): (event: APIGatewayProxyEventV2, context: Context) => Promise<StructuredResponse> {
    return async (event, context) => {
        const logger = createLogger(event, context);
        const audit = withContext(event, context);

        try {
            return await completeSignIn(event, resolveDeps(), logger, audit);
        } catch (err) {
            if (err instanceof IdTokenVerificationError) {
                logger.warn('ID token rejected', { reason: err.reason });
                audit.loginFailure({ method: 'oidc', reason: err.reason });
                return error(HttpStatus.UNAUTHORIZED, 'invalid_token', err.message);
            }
            if (err instanceof ProviderError) {
                logger.warn('Identity provider error', { reason: err.reason, ...describeError(err) });
                audit.loginFailure({ method: 'oidc', reason: err.reason });
                return invalidRequest(err.message);
            }

            logger.error('Sign-in failed', describeError(err));
            return serverError();
        }
    };
}

export const handler = createCallbackHandler();
