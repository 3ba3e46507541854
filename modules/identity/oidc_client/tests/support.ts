/**
 * In-process identity provider for the OIDC client tests.
 *
 * Serves a discovery document and a token endpoint through a fake fetch,
 * and signs ID tokens with a locally generated RS256 key.
 */

import * as jose from 'jose';
import { InMemoryStorage, buildEvent, lambdaContext } from '@book-reservations/shared/testing';
import type { TestEventOptions } from '@book-reservations/shared/testing';
import type { StructuredResponse } from '@book-reservations/shared';
import {
  OidcProvider,
  createCallbackHandler,
  createLoginHandler,
  createLogoutHandler,
} from '../src/index';
import type { FetchLike, KeySetResolver, OidcDeps, OidcEnvConfig } from '../src/index';

export const ISSUER = 'https://idp.example.com';
export const CLIENT_ID = 'books-client';
export const SUBJECT = 'provider-sub-1';
export const KEY_ID = 'test-key';

export const CONFIG: OidcEnvConfig = {
  tableName: 'test-table',
  session: { name: '__Host-sid', ttlSeconds: 3600 },
  issuer: ISSUER,
  clientId: CLIENT_ID,
  clientSecret: 'test-secret',
  redirectUri: 'https://api.example.com/auth/callback',
  postLogoutRedirect: '/',
};

export const METADATA = {
  issuer: ISSUER,
  authorization_endpoint: `${ISSUER}/authorize`,
  token_endpoint: `${ISSUER}/token`,
  jwks_uri: `${ISSUER}/jwks`,
};

interface Reply {
  status: number;
  body: unknown;
}

export interface RecordedRequest {
  url: string;
  init?: RequestInit;
}

export interface IdTokenOptions {
  issuer?: string;
  audience?: string;
  subject?: string;
  expiresAt?: number;
  key?: jose.KeyLike;
}

function json(reply: Reply): Response {
  return new Response(JSON.stringify(reply.body), {
    status: reply.status,
    headers: { 'content-type': 'application/json' },
  });
}

export class FakeIdp {
  readonly requests: RecordedRequest[] = [];
  discoveryReply: Reply = { status: 200, body: METADATA };
  tokenReply: Reply = { status: 400, body: { error: 'invalid_grant' } };

  private constructor(
    private readonly privateKey: jose.KeyLike,
    readonly jwks: jose.JSONWebKeySet
  ) {}

  static async create(): Promise<FakeIdp> {
    const { publicKey, privateKey } = await jose.generateKeyPair('RS256');
    const jwk = await jose.exportJWK(publicKey);
    return new FakeIdp(privateKey, { keys: [{ ...jwk, kid: KEY_ID, alg: 'RS256', use: 'sig' }] });
  }

  readonly fetch: FetchLike = async (url, init) => {
    this.requests.push({ url, init });
    if (url === `${ISSUER}/.well-known/openid-configuration`) {
      return json(this.discoveryReply);
    }
    if (url === METADATA.token_endpoint) {
      return json(this.tokenReply);
    }
    return json({ status: 404, body: { error: 'not_found' } });
  };

  readonly keySet: KeySetResolver = () => jose.createLocalJWKSet(this.jwks);

  async idToken(claims: jose.JWTPayload, options: IdTokenOptions = {}): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    return new jose.SignJWT(claims)
      .setProtectedHeader({ alg: 'RS256', kid: KEY_ID })
      .setIssuer(options.issuer ?? ISSUER)
      .setAudience(options.audience ?? CLIENT_ID)
      .setSubject(options.subject ?? SUBJECT)
      .setIssuedAt(now)
      .setExpirationTime(options.expiresAt ?? now + 300)
      .sign(options.key ?? this.privateKey);
  }

  issueTokens(idToken: string): void {
    this.tokenReply = {
      status: 200,
      body: { id_token: idToken, token_type: 'Bearer', access_token: 'test-access-token' },
    };
  }

  tokenRequests(): URLSearchParams[] {
    return this.requests
      .filter(request => request.url === METADATA.token_endpoint)
      .map(request => new URLSearchParams(String(request.init?.body ?? '')));
  }
}

export async function setup(config: OidcEnvConfig = CONFIG) {
  const storage = new InMemoryStorage();
  const idp = await FakeIdp.create();
  const provider = new OidcProvider(config, idp.fetch, idp.keySet);
  const deps: OidcDeps = { users: storage, sessions: storage, provider, config };

  const login = createLoginHandler(() => deps);
  const callback = createCallbackHandler(() => deps);
  const logout = createLogoutHandler(() => deps);

  const call = (
    handler: (event: ReturnType<typeof buildEvent>, context: ReturnType<typeof lambdaContext>) => Promise<StructuredResponse>,
    options: TestEventOptions
  ): Promise<StructuredResponse> => handler(buildEvent(options), lambdaContext());

  /**
   * Run the login redirect and return what the provider would receive.
   */
  const startLogin = async () => {
    const response = await call(login, { method: 'GET', path: '/auth/login' });
    const location = new URL(String(response.headers?.Location));
    const state = location.searchParams.get('state') ?? '';
    const stored = storage.loginStates.get(state);
    if (!stored) {
      throw new Error('login state was not stored');
    }
    return { response, location, state, nonce: stored.nonce, codeVerifier: stored.codeVerifier };
  };

  return {
    storage,
    idp,
    provider,
    startLogin,
    login: (options: TestEventOptions = {}) => call(login, { method: 'GET', path: '/auth/login', ...options }),
    callback: (options: TestEventOptions = {}) => call(callback, { method: 'GET', path: '/auth/callback', ...options }),
    logout: (options: TestEventOptions = {}) => call(logout, { method: 'GET', path: '/auth/logout', ...options }),
  };
}

/**
 * Session id from a Set-Cookie value.
 */
export function sessionIdFrom(cookie: string | undefined): string | undefined {
  return /^__Host-sid=([^;]*);/.exec(cookie ?? '')?.[1];
}
