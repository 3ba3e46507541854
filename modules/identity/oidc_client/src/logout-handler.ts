/**
 * OIDC Client - Logout Handler
 *
 * Lambda handler for GET/POST /auth/logout
 *
 * Deletes the server-side session, if any, expires the cookie and
 * redirects to the post-logout location. Never fails for a caller who is
 * already signed out.
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    buildClearSessionCookieHeader,
    createLogger,
    describeError,
    getSessionIdFromCookie,
    redirect,
    serverError,
    withContext,
} from '@book-reservations/shared';
import type { StructuredResponse } from '@book-reservations/shared';
import { getDefaultDeps } from './deps';
import type { OidcDeps } from './types';

export function createLogoutHandler(
    resolveDeps: () => OidcDeps = getDefaultDeps
): (event: APIGatewayProxyEventV2, context: Context) => Promise<StructuredResponse> {
    return async (event, context) => {
        const logger = createLogger(event, context);
        const audit = withContext(event, context);

        try {
            const { sessions, config } = resolveDeps();
            const sessionId = getSessionIdFromCookie(event, config.session.name);

            if (sessionId) {
                const session = await sessions.getSession(sessionId);
                await sessions.deleteSession(sessionId);

                if (session) {
                    audit.logout({ type: 'USER', sub: session.userId });
                }
            }

            return redirect(config.postLogoutRedirect, [buildClearSessionCookieHeader(config.session)]);
        } catch (err) {
            logger.error('Logout failed', describeError(err));
            return serverError();
        }
    };
}

export const handler = createLogoutHandler();
