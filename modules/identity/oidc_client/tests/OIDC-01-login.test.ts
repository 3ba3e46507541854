/**
 * OIDC-01: Login Redirect
 *
 * GET /auth/login stores state, nonce and a PKCE verifier, then redirects
 * to the provider's authorization endpoint with an S256 challenge.
 */

import { describe, it, expect } from 'vitest';
import { captureLogs, jsonBody } from '@book-reservations/shared/testing';
import { generateCodeChallenge } from '@book-reservations/shared';
import { ISSUER, METADATA, setup } from './support';

describe('OIDC-01: Login redirect', () => {
  it('redirects to the authorization endpoint with the code flow parameters', async () => {
    captureLogs();
    const { startLogin } = await setup();

    const { response, location } = await startLogin();

    expect(response.statusCode).toBe(302);
    expect(`${location.origin}${location.pathname}`).toBe(`${ISSUER}/authorize`);
    expect(location.searchParams.get('response_type')).toBe('code');
    expect(location.searchParams.get('client_id')).toBe('books-client');
    expect(location.searchParams.get('redirect_uri')).toBe('https://api.example.com/auth/callback');
    expect(location.searchParams.get('scope')).toBe('openid email profile');
    expect(location.searchParams.get('code_challenge_method')).toBe('S256');
  });

  it('stores the state with its nonce and verifier', async () => {
    captureLogs();
    const { startLogin, storage } = await setup();

    const { location, state, nonce, codeVerifier } = await startLogin();

    expect(state).not.toBe('');
    expect(location.searchParams.get('nonce')).toBe(nonce);
    expect(location.searchParams.get('code_challenge')).toBe(generateCodeChallenge(codeVerifier));
    expect(storage.loginStates.size).toBe(1);
  });

  it('expires the login state after ten minutes', async () => {
    captureLogs();
    const { startLogin, storage } = await setup();
    const before = Math.floor(Date.now() / 1000);

    const { state } = await startLogin();

    const ttl = storage.loginStates.get(state)?.ttl ?? 0;
    expect(ttl).toBeGreaterThanOrEqual(before + 600);
    expect(ttl).toBeLessThanOrEqual(Math.floor(Date.now() / 1000) + 600);
  });

  it('uses fresh state for every login', async () => {
    captureLogs();
    const { startLogin } = await setup();

    const first = await startLogin();
    const second = await startLogin();

    expect(first.state).not.toBe(second.state);
    expect(first.nonce).not.toBe(second.nonce);
  });

  it('fetches the discovery document once per provider instance', async () => {
    captureLogs();
    const { startLogin, idp } = await setup();

    await startLogin();
    await startLogin();

    expect(idp.requests.map(request => request.url)).toEqual([`${ISSUER}/.well-known/openid-configuration`]);
  });

  it('answers 500 when discovery fails', async () => {
    captureLogs();
    const { login, idp } = await setup();
    idp.discoveryReply = { status: 503, body: { error: 'unavailable' } };

    const response = await login();

    expect(response.statusCode).toBe(500);
    expect(jsonBody(response)).toEqual({ error: 'An unexpected error occurred' });
  });

  it('answers 500 when discovery names a different issuer', async () => {
    captureLogs();
    const { login, idp } = await setup();
    idp.discoveryReply = { status: 200, body: { ...METADATA, issuer: 'https://other-idp.example.com' } };

    const response = await login();

    expect(response.statusCode).toBe(500);
  });
});
