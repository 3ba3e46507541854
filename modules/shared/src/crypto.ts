/**
 * Book Reservations - Cryptographic Utilities
 *
 * Random identifiers for resources and sessions, and the PKCE pair used
 * when signing in with the identity provider.
 *
 * - Random generation uses Node.js crypto (CSPRNG backed by OS entropy)
 * - Base64url encoding follows RFC 4648 Section 5 (URL-safe, no padding)
 *
 * @see RFC 7636 - Proof Key for Code Exchange (PKCE)
 * @see RFC 4648 Section 5 - Base64url Encoding
 */

import { createHash, randomBytes, randomUUID } from 'node:crypto';

/** Default entropy bytes for secure random generation */
const DEFAULT_ENTROPY_BYTES = 32;

// =============================================================================
// Identifiers
// =============================================================================

/**
 * New resource identifier (UUID v4) for users, books and reservations.
 */
export function generateId(): string {
    return randomUUID();
}

/**
 * Generate a cryptographically secure random string.
 * Used for session ids, login state and nonce values.
 *
 * @param byteLength - Number of random bytes (default: 32, providing 256 bits of entropy)
 * @returns Base64url-encoded random string
 */
export function generateSecureRandom(byteLength = DEFAULT_ENTROPY_BYTES): string {
    return base64UrlEncode(randomBytes(byteLength));
}

// =============================================================================
// PKCE (Proof Key for Code Exchange)
// =============================================================================

/**
 * Generate a code verifier for PKCE.
 * Per RFC 7636 Section 4.1, must be 43-128 characters from unreserved URI characters.
 *
 * @returns A 43-character base64url-encoded random string (32 bytes of entropy)
 */
export function generateCodeVerifier(): string {
    return base64UrlEncode(randomBytes(DEFAULT_ENTROPY_BYTES));
}

/**
 * S256: BASE64URL(SHA256(code_verifier))
 *
 * @see RFC 7636 Section 4.2
 */
export function generateCodeChallenge(codeVerifier: string): string {
    const hash = createHash('sha256').update(codeVerifier, 'ascii').digest();
    return base64UrlEncode(hash);
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Encode a buffer to base64url format (RFC 4648 Section 5).
 * Base64url is URL-safe: '+' → '-', '/' → '_', no padding.
 */
export function base64UrlEncode(data: Buffer | string): string {
    const buffer = typeof data === 'string' ? Buffer.from(data) : data;
    return buffer
        .toString('base64')
        .replace(/\+/g, '-')
        .replace(/\//g, '_')
        .replace(/=+$/, '');
}
