/**
 * OIDC Client - Login Handler
 *
 * Lambda handler for GET /auth/login
 *
 * Flow:
 * 1. Generate state, nonce and a PKCE code verifier
 * 2. Store them as a login-state item (10 minute TTL)
 * 3. Redirect to the provider's authorization endpoint
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    SessionDefaults,
    createLogger,
    describeError,
    generateCodeChallenge,
    generateCodeVerifier,
    generateSecureRandom,
    redirect,
    serverError,
} from '@book-reservations/shared';
import type { StructuredResponse } from '@book-reservations/shared';
import { getDefaultDeps } from './deps';
import type { OidcDeps } from './types';

export function createLoginHandler(
    resolveDeps: () => OidcDeps = getDefaultDeps
): (event: APIGatewayProxyEventV2, context: Context) => Promise<StructuredResponse> {
    return async (event, context) => {
        const logger = createLogger(event, context);

        try {
            const { sessions, provider } = resolveDeps();

            const state = generateSecureRandom(32);
            const nonce = generateSecureRandom(32);
            const codeVerifier = generateCodeVerifier();

            await sessions.saveLoginState({
                state,
                nonce,
                codeVerifier,
                ttlSeconds: SessionDefaults.LOGIN_STATE_TTL_SECONDS,
            });

            const location = await provider.authorizationUrl({
                state,
                nonce,
                codeChallenge: generateCodeChallenge(codeVerifier),
            });

            logger.info('Redirecting to identity provider');
            return redirect(location);
        } catch (err) {
            logger.error('Login initiation failed', describeError(err));
            return serverError();
        }
    };
}

export const handler = createLoginHandler();
