/**
 * OIDC-03: Logout
 *
 * GET /auth/logout deletes the session, expires the cookie and redirects.
 */

import { describe, it, expect, vi } from 'vitest';
import { auditEntries, captureLogs, header, jsonBody } from '@book-reservations/shared/testing';
import { CONFIG, setup } from './support';

const CLEAR_COOKIE = '__Host-sid=; Path=/; HttpOnly; Secure; SameSite=Lax; Max-Age=0';

describe('OIDC-03: Logout', () => {
  it('deletes the session and expires the cookie', async () => {
    const logs = captureLogs();
    const { logout, storage } = await setup();
    const sessionId = await storage.signIn({ id: 'user-1' });

    const response = await logout({ cookies: [`__Host-sid=${sessionId}`] });

    expect(response.statusCode).toBe(302);
    expect(header(response, 'Location')).toBe('/');
    expect(response.cookies).toEqual([CLEAR_COOKIE]);
    expect(storage.sessions.has(sessionId)).toBe(false);
    expect(auditEntries(logs())).toMatchObject([
      { action: 'LOGOUT', actor: { type: 'USER', sub: 'user-1' } },
    ]);
  });

  it('accepts POST as well as GET', async () => {
    captureLogs();
    const { logout, storage } = await setup();
    const sessionId = await storage.signIn({ id: 'user-1' });

    const response = await logout({ method: 'POST', cookies: [`__Host-sid=${sessionId}`] });

    expect(response.statusCode).toBe(302);
    expect(storage.sessions.size).toBe(0);
  });

  it('redirects a caller without a session and audits nothing', async () => {
    const logs = captureLogs();
    const { logout } = await setup();

    const response = await logout();

    expect(response.statusCode).toBe(302);
    expect(response.cookies).toEqual([CLEAR_COOKIE]);
    expect(auditEntries(logs())).toEqual([]);
  });

  it('clears the cookie of a session that no longer exists', async () => {
    const logs = captureLogs();
    const { logout } = await setup();

    const response = await logout({ cookies: ['__Host-sid=expired-session'] });

    expect(response.statusCode).toBe(302);
    expect(response.cookies).toEqual([CLEAR_COOKIE]);
    expect(auditEntries(logs())).toEqual([]);
  });

  it('redirects to the configured post-logout location', async () => {
    captureLogs();
    const { logout } = await setup({ ...CONFIG, postLogoutRedirect: 'https://books.example.com/goodbye' });

    const response = await logout();

    expect(header(response, 'Location')).toBe('https://books.example.com/goodbye');
  });

  it('answers 500 when the session store fails', async () => {
    captureLogs();
    const { logout, storage } = await setup();
    vi.spyOn(storage, 'getSession').mockRejectedValue(new Error('socket hang up'));

    const response = await logout({ cookies: ['__Host-sid=session-1'] });

    expect(response.statusCode).toBe(500);
    expect(jsonBody(response)).toEqual({ error: 'An unexpected error occurred' });
  });
});
