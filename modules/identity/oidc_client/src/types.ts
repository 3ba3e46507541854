/**
 * OIDC Client - Type Definitions
 *
 * Types for signing users in through an external OpenID Connect provider
 * with the authorization code flow and PKCE.
 */

import type { BaseEnvConfig, ProviderProfile, SessionStore, UserStore } from '@book-reservations/shared';

// =============================================================================
// Environment Configuration
// =============================================================================

export interface OidcEnvConfig extends BaseEnvConfig {
    /** Provider issuer URL; discovery is read from <issuer>/.well-known/openid-configuration */
    issuer: string;
    clientId: string;
    clientSecret: string;
    /** Registered redirect URI, pointing at /auth/callback */
    redirectUri: string;
    /** Where logout sends the browser */
    postLogoutRedirect: string;
}

// =============================================================================
// Provider Wire Types
// =============================================================================

/**
 * The discovery document fields this client uses.
 *
 * @see https://openid.net/specs/openid-connect-discovery-1_0.html#ProviderMetadata
 */
export interface ProviderMetadata {
    issuer: string;
    authorization_endpoint: string;
    token_endpoint: string;
    jwks_uri: string;
}

/**
 * Successful token endpoint response. Only the id_token is used; access
 * tokens issued to this client are discarded.
 */
export interface TokenResponse {
    id_token: string;
    token_type: string;
    access_token?: string;
}

export interface AuthorizationRequest {
    state: string;
    nonce: string;
    codeChallenge: string;
}

// =============================================================================
// Provider Contract
// =============================================================================

/**
 * What the handlers need from the identity provider. OidcProvider is the
 * production implementation.
 */
export interface IdentityProvider {
    authorizationUrl(request: AuthorizationRequest): Promise<string>;
    exchangeCode(code: string, codeVerifier: string): Promise<TokenResponse>;
    /** Verify signature, issuer, audience, expiry and nonce; return the profile claims. */
    verifyIdToken(idToken: string, nonce: string): Promise<ProviderProfile>;
}

/**
 * Subset of the WHATWG fetch signature; tests inject a fake.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

// =============================================================================
// Handler Dependencies
// =============================================================================

export interface OidcDeps {
    users: Pick<UserStore, 'upsertUserFromProfile'>;
    sessions: SessionStore;
    provider: IdentityProvider;
    config: OidcEnvConfig;
}
