/**
 * CRY-01: Identifiers and PKCE
 */

import { describe, it, expect } from 'vitest';
import { base64UrlEncode, generateCodeChallenge, generateCodeVerifier, generateId, generateSecureRandom } from '../src/index';

describe('CRY-01: Identifiers and PKCE', () => {
  it('derives the S256 challenge from the verifier', () => {
    expect(generateCodeChallenge('dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk')).toBe(
      'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM'
    );
  });

  it('produces URL-safe verifiers of 43 characters', () => {
    const verifier = generateCodeVerifier();

    expect(verifier).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(generateSecureRandom(16)).toMatch(/^[A-Za-z0-9_-]{22}$/);
  });

  it('encodes without padding or URL-unsafe characters', () => {
    expect(base64UrlEncode(Buffer.from([0xfb, 0xff, 0xfe]))).toBe('-__-');
    expect(base64UrlEncode('a')).toBe('YQ');
  });

  it('generates UUIDs for resources', () => {
    expect(generateId()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(generateId()).not.toBe(generateId());
  });
});
