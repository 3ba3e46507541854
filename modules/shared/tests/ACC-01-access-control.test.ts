/**
 * ACC-01: Access control
 *
 * Role gates, ownership checks and the reservation listing scope.
 */

import { describe, it, expect } from 'vitest';
import { authorize, reservationListScope } from '../src/index';
import type { Identity, Principal } from '../src/index';

function principal(id: string, roles: string[]): Principal {
  return { id, roles: new Set(roles), profile: {} };
}

function signedIn(id: string, roles: string[]): Identity {
  return { status: 'authenticated', principal: principal(id, roles) };
}

const LOGGED_OUT: Identity = { status: 'logged_out', reason: 'no_session' };

describe('ACC-01: Book operations', () => {
  it('lets anyone read books', () => {
    expect(authorize(LOGGED_OUT, 'book:read')).toEqual({ ok: true, value: null });

    const viewer = signedIn('user-1', ['viewer']);
    const result = authorize(viewer, 'book:read');
    expect(result.ok && result.value?.id).toBe('user-1');
  });

  it.each([
    ['book:create', ['editor']],
    ['book:create', ['admin']],
    ['book:update', ['editor']],
    ['book:update', ['admin']],
    ['book:delete', ['admin']],
  ] as const)('allows %s for roles %j', (operation, roles) => {
    expect(authorize(signedIn('user-1', [...roles]), operation).ok).toBe(true);
  });

  it.each([
    ['book:create', ['viewer']],
    ['book:update', ['viewer']],
    ['book:delete', ['editor']],
    ['book:delete', []],
  ] as const)('forbids %s for roles %j', (operation, roles) => {
    const result = authorize(signedIn('user-1', [...roles]), operation);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('Forbidden');
      expect(result.error.message).toBe('You do not have permission to perform this action');
    }
  });

  it('requires a session before checking roles', () => {
    const result = authorize(LOGGED_OUT, 'book:delete');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('Unauthenticated');
      expect(result.error.statusCode).toBe(302);
    }
  });
});

describe('ACC-01: Reservation operations', () => {
  it('lets any signed-in user reserve', () => {
    expect(authorize(signedIn('user-1', []), 'reservation:create').ok).toBe(true);
    expect(authorize(LOGGED_OUT, 'reservation:create').ok).toBe(false);
  });

  it('defers the ownership check until the resource is supplied', () => {
    expect(authorize(signedIn('user-1', ['viewer']), 'reservation:read').ok).toBe(true);
  });

  it('lets the owner read and cancel', () => {
    const owner = signedIn('user-1', ['viewer']);

    expect(authorize(owner, 'reservation:read', { ownerId: 'user-1' }).ok).toBe(true);
    expect(authorize(owner, 'reservation:cancel', { ownerId: 'user-1' }).ok).toBe(true);
  });

  it('lets an admin act on any reservation', () => {
    const admin = signedIn('admin-1', ['admin']);

    expect(authorize(admin, 'reservation:cancel', { ownerId: 'user-1' }).ok).toBe(true);
  });

  it('forbids editors and viewers acting on reservations they do not own', () => {
    const result = authorize(signedIn('user-2', ['viewer', 'editor']), 'reservation:cancel', { ownerId: 'user-1' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ kind: 'Forbidden', reason: 'not_owner' });
    }
  });
});

describe('ACC-01: Reservation listing scope', () => {
  it('scopes a non-admin to their own reservations whatever they ask for', () => {
    expect(reservationListScope(principal('user-1', ['editor']), 'user-2')).toEqual({ userId: 'user-1' });
    expect(reservationListScope(principal('user-1', ['viewer']))).toEqual({ userId: 'user-1' });
  });

  it('lets an admin list everything or filter by user', () => {
    const admin = principal('admin-1', ['admin']);

    expect(reservationListScope(admin)).toEqual({});
    expect(reservationListScope(admin, 'user-2')).toEqual({ userId: 'user-2' });
  });
});
