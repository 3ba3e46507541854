/**
 * IDN-01: Identity resolution and request context
 */

import { describe, it, expect, vi } from 'vitest';
import { actorOf, createRequestContext, resolvePrincipal, resolveRequestIdentity } from '../src/index';
import { InMemoryStorage, buildEvent, captureLogs, lambdaContext } from '../src/testing';

const SESSION = { name: '__Host-sid', ttlSeconds: 3600 };
const CLEAR_COOKIE = '__Host-sid=; Path=/; HttpOnly; Secure; SameSite=Lax; Max-Age=0';

function stores(storage: InMemoryStorage) {
  return { users: storage, sessions: storage, session: SESSION };
}

describe('IDN-01: Principal resolution', () => {
  it('loads the user behind a session', async () => {
    const storage = new InMemoryStorage();
    storage.seedUser({ id: 'user-1', roles: ['viewer', 'editor'], email: 'ada@example.com' });

    const identity = await resolvePrincipal('user-1', storage);

    expect(identity.status).toBe('authenticated');
    if (identity.status === 'authenticated') {
      expect(identity.principal.id).toBe('user-1');
      expect(identity.principal.email).toBe('ada@example.com');
      expect([...identity.principal.roles]).toEqual(['viewer', 'editor']);
    }
  });

  it('is logged out without a session user', async () => {
    const getUser = vi.fn();

    expect(await resolvePrincipal(undefined, { getUser })).toEqual({ status: 'logged_out', reason: 'no_session' });
    expect(getUser).not.toHaveBeenCalled();
  });

  it('is logged out when the user no longer exists', async () => {
    expect(await resolvePrincipal('ghost', new InMemoryStorage())).toEqual({
      status: 'logged_out',
      reason: 'unknown_user',
    });
  });
});

describe('IDN-01: Request identity', () => {
  it('reads the session from the cookie', async () => {
    const storage = new InMemoryStorage();
    const sessionId = await storage.signIn({ id: 'user-1' });

    const resolved = await resolveRequestIdentity(
      buildEvent({ cookies: ['theme=dark', `__Host-sid=${sessionId}`] }),
      stores(storage)
    );

    expect(resolved.staleSessionId).toBeUndefined();
    expect(actorOf(resolved.identity)).toEqual({ type: 'USER', sub: 'user-1' });
  });

  it('falls back to the Cookie header', async () => {
    const storage = new InMemoryStorage();
    const sessionId = await storage.signIn({ id: 'user-1' });

    const resolved = await resolveRequestIdentity(
      buildEvent({ headers: { cookie: `__Host-sid=${sessionId}` } }),
      stores(storage)
    );

    expect(resolved.identity.status).toBe('authenticated');
  });

  it('reports an expired session as stale', async () => {
    const storage = new InMemoryStorage();
    storage.seedUser({ id: 'user-1' });
    await storage.createSession({ sessionId: 'old', userId: 'user-1', ttlSeconds: -1 });

    const resolved = await resolveRequestIdentity(buildEvent({ cookies: ['__Host-sid=old'] }), stores(storage));

    expect(resolved).toEqual({ identity: { status: 'logged_out', reason: 'no_session' }, staleSessionId: 'old' });
  });

  it('reports a session for a deleted user as stale', async () => {
    const storage = new InMemoryStorage();
    await storage.createSession({ sessionId: 'orphan', userId: 'ghost', ttlSeconds: 3600 });

    const resolved = await resolveRequestIdentity(buildEvent({ cookies: ['__Host-sid=orphan'] }), stores(storage));

    expect(resolved).toEqual({ identity: { status: 'logged_out', reason: 'unknown_user' }, staleSessionId: 'orphan' });
  });

  it('treats a logged-out caller as anonymous', () => {
    expect(actorOf({ status: 'logged_out', reason: 'no_session' })).toEqual({ type: 'ANONYMOUS' });
  });
});

describe('IDN-01: Request context', () => {
  it('deletes a stale session and expires its cookie', async () => {
    captureLogs();
    const storage = new InMemoryStorage();
    await storage.createSession({ sessionId: 'orphan', userId: 'ghost', ttlSeconds: 3600 });

    const ctx = await createRequestContext(buildEvent({ cookies: ['__Host-sid=orphan'] }), lambdaContext(), stores(storage));

    expect(ctx.cookies).toEqual([CLEAR_COOKIE]);
    expect(storage.sessions.has('orphan')).toBe(false);
    expect(ctx.identity.status).toBe('logged_out');
  });

  it('sets no cookies for a valid session', async () => {
    const storage = new InMemoryStorage();
    const sessionId = await storage.signIn({ id: 'user-1' });

    const ctx = await createRequestContext(buildEvent({ cookies: [`__Host-sid=${sessionId}`] }), lambdaContext(), stores(storage));

    expect(ctx.cookies).toEqual([]);
    expect(ctx.baseUrl).toBe('https://api.example.com');
  });
});
