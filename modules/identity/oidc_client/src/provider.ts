/**
 * OIDC Client - Identity Provider
 *
 * Talks to the external OpenID Connect provider:
 * - Discovery: <issuer>/.well-known/openid-configuration
 * - Authorization URL with PKCE (S256) and nonce
 * - Token exchange (client_secret_post + code_verifier)
 * - ID token verification with jose against the provider's JWKS
 *
 * Discovery metadata and the key set are cached per instance, which lives
 * for the warm container.
 *
 * @see https://openid.net/specs/openid-connect-core-1_0.html#CodeFlowAuth
 * @see RFC 7636 - Proof Key for Code Exchange
 */

import * as jose from 'jose';
import { ErrorMessages } from '@book-reservations/shared';
import type { ProviderProfile } from '@book-reservations/shared';
import type {
    AuthorizationRequest,
    FetchLike,
    IdentityProvider,
    OidcEnvConfig,
    ProviderMetadata,
    TokenResponse,
} from './types';

export const LOGIN_SCOPE = 'openid email profile';

const DISCOVERY_PATH = '/.well-known/openid-configuration';

// =============================================================================
// Errors
// =============================================================================

/**
 * The provider could not be reached, or answered with an error.
 * `reason` is the provider's error code where it sent one.
 */
export class ProviderError extends Error {
    constructor(
        message: string,
        readonly reason: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** The ID token failed signature, claim or nonce checks. */
export class IdTokenVerificationError extends Error {
    constructor(
        readonly reason: string,
        options?: ErrorOptions
    ) {
        super(ErrorMessages.ID_TOKEN_INVALID, options);
        this.name = new.target.name;
    }
}

// =============================================================================
// Response Validation
// =============================================================================

function stringField(value: object, key: string): string | undefined {
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' && field !== '' ? field : undefined;
}

function isProviderMetadata(value: unknown): value is ProviderMetadata {
    return (
        typeof value === 'object' &&
        value !== null &&
        stringField(value, 'issuer') !== undefined &&
        stringField(value, 'authorization_endpoint') !== undefined &&
        stringField(value, 'token_endpoint') !== undefined &&
        stringField(value, 'jwks_uri') !== undefined
    );
}

function isTokenResponse(value: unknown): value is TokenResponse {
    return (
        typeof value === 'object' &&
        value !== null &&
        stringField(value, 'id_token') !== undefined &&
        stringField(value, 'token_type') !== undefined
    );
}

async function readJson(response: Response): Promise<unknown> {
    try {
        const body: unknown = await response.json();
        return body;
    } catch {
        return null;
    }
}

function stringClaim(payload: jose.JWTPayload, name: string): string | undefined {
    const claim = payload[name];
    return typeof claim === 'string' && claim !== '' ? claim : undefined;
}

// =============================================================================
// Provider
// =============================================================================

export type OidcProviderConfig = Pick<OidcEnvConfig, 'issuer' | 'clientId' | 'clientSecret' | 'redirectUri'>;

export type KeySetResolver = (jwksUri: URL) => jose.JWTVerifyGetKey;

export class OidcProvider implements IdentityProvider {
    private metadata: ProviderMetadata | null = null;
    private keySet: jose.JWTVerifyGetKey | null = null;

    constructor(
        private readonly config: OidcProviderConfig,
        private readonly fetchFn: FetchLike = fetch,
        private readonly resolveKeySet: KeySetResolver = jwksUri => jose.createRemoteJWKSet(jwksUri)
    ) {}

    /**
     * Fetch and cache the discovery document.
     *
     * @throws ProviderError if the document is unreachable, malformed, or
     *         names a different issuer
     */
    async discover(): Promise<ProviderMetadata> {
        if (this.metadata) {
            return this.metadata;
        }

        const url = `${this.config.issuer.replace(/\/+$/, '')}${DISCOVERY_PATH}`;
        let response: Response;
        try {
            response = await this.fetchFn(url, { headers: { Accept: 'application/json' } });
        } catch (err) {
            throw new ProviderError(ErrorMessages.PROVIDER_UNAVAILABLE, 'discovery_failed', { cause: err });
        }

        const body = await readJson(response);
        if (!response.ok || !isProviderMetadata(body)) {
            throw new ProviderError(ErrorMessages.PROVIDER_UNAVAILABLE, 'invalid_discovery_document');
        }
        if (body.issuer !== this.config.issuer) {
            throw new ProviderError(ErrorMessages.PROVIDER_UNAVAILABLE, 'issuer_mismatch');
        }

        this.metadata = body;
        return body;
    }

    async authorizationUrl(request: AuthorizationRequest): Promise<string> {
        const metadata = await this.discover();
        const url = new URL(metadata.authorization_endpoint);

        url.searchParams.set('response_type', 'code');
        url.searchParams.set('client_id', this.config.clientId);
        url.searchParams.set('redirect_uri', this.config.redirectUri);
        url.searchParams.set('scope', LOGIN_SCOPE);
        url.searchParams.set('state', request.state);
        url.searchParams.set('nonce', request.nonce);
        url.searchParams.set('code_challenge', request.codeChallenge);
        url.searchParams.set('code_challenge_method', 'S256');

        return url.toString();
    }

    /**
     * Redeem an authorization code at the token endpoint.
     *
     * @throws ProviderError if the request fails or the provider rejects the code
     */
    async exchangeCode(code: string, codeVerifier: string): Promise<TokenResponse> {
        const metadata = await this.discover();
        const form = new URLSearchParams({
            grant_type: 'authorization_code',
            code,
            redirect_uri: this.config.redirectUri,
            client_id: this.config.clientId,
            client_secret: this.config.clientSecret,
            code_verifier: codeVerifier,
        });

        let response: Response;
        try {
            response = await this.fetchFn(metadata.token_endpoint, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/x-www-form-urlencoded',
                    Accept: 'application/json',
                },
                body: form.toString(),
            });
        } catch (err) {
            throw new ProviderError(ErrorMessages.PROVIDER_UNAVAILABLE, 'token_request_failed', { cause: err });
        }

        const body = await readJson(response);
        if (response.ok && isTokenResponse(body)) {
            return body;
        }

        const errorCode = typeof body === 'object' && body !== null ? stringField(body, 'error') : undefined;
        throw new ProviderError(ErrorMessages.TOKEN_EXCHANGE_REJECTED, errorCode ?? `http_${response.status}`);
    }

    /**
     * Verify an ID token and extract the profile claims.
     *
     * @throws IdTokenVerificationError if any check fails
     * @throws ProviderError if the key set cannot be loaded
     */
    async verifyIdToken(idToken: string, nonce: string): Promise<ProviderProfile> {
        const metadata = await this.discover();
        if (!this.keySet) {
            this.keySet = this.resolveKeySet(new URL(metadata.jwks_uri));
        }

        let payload: jose.JWTPayload;
        try {
            const verified = await jose.jwtVerify(idToken, this.keySet, {
                issuer: metadata.issuer,
                audience: this.config.clientId,
            });
            payload = verified.payload;
        } catch (err) {
            if (err instanceof jose.errors.JOSEError) {
                throw new IdTokenVerificationError(err.code, { cause: err });
            }
            throw new ProviderError(ErrorMessages.PROVIDER_UNAVAILABLE, 'jwks_unavailable', { cause: err });
        }

        if (payload.nonce !== nonce) {
            throw new IdTokenVerificationError('nonce_mismatch');
        }
        if (!payload.sub) {
            throw new IdTokenVerificationError('missing_subject');
        }

        return {
            subject: payload.sub,
            email: stringClaim(payload, 'email'),
            displayName: stringClaim(payload, 'name'),
            givenName: stringClaim(payload, 'given_name'),
            familyName: stringClaim(payload, 'family_name'),
        };
    }
}
