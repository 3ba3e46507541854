/**
 * OIDC Client
 *
 * Sign-in through an external OpenID Connect provider:
 * - GET /auth/login - start the authorization code flow
 * - GET /auth/callback - finish it and open a session
 * - GET|POST /auth/logout - close the session
 *
 * @module identity/oidc_client
 */

export type {
    OidcEnvConfig,
    ProviderMetadata,
    TokenResponse,
    AuthorizationRequest,
    IdentityProvider,
    FetchLike,
    OidcDeps,
} from './types';

export { getEnvConfig, clearConfigCache } from './config';

export {
    OidcProvider,
    ProviderError,
    IdTokenVerificationError,
    LOGIN_SCOPE,
} from './provider';

export type { OidcProviderConfig, KeySetResolver } from './provider';

export { createLoginHandler, handler as loginHandler } from './login-handler';
export { createCallbackHandler, POST_LOGIN_REDIRECT, handler as callbackHandler } from './callback-handler';
export { createLogoutHandler, handler as logoutHandler } from './logout-handler';
