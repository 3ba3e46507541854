/**
 * RSV-03: Read and Cancel Reservation
 *
 * Owners and admins may read or cancel a reservation. Existence is
 * checked before ownership, so a missing reservation is 404 for anyone
 * signed in. Cancellation is reserved -> cancelled, once.
 */

import { describe, it, expect } from 'vitest';
import { auditEntries, captureLogs, header, jsonBody } from '@book-reservations/shared/testing';
import { ADMIN, OTHER, OWNER, itemPath, readReservation, setup } from './support';

const RESERVED_AT = '2025-01-01T10:00:00.000Z';

async function withReservation() {
  const context = setup();
  await context.seedBook('book-1');
  await context.seedReservation('res-1', 'book-1', 'owner-1', RESERVED_AT);
  return context;
}

describe('RSV-03: Read reservation', () => {
  it('returns the reservation to its owner without user_id', async () => {
    captureLogs();
    const { invoke, signIn } = await withReservation();
    const cookies = await signIn(OWNER);

    const response = await invoke({ method: 'GET', ...itemPath('book-1', 'res-1'), cookies });

    expect(response.statusCode).toBe(200);
    expect(jsonBody(response)).toEqual({
      id: 'res-1',
      book_id: 'book-1',
      forenames: 'Ada',
      surname: 'Lovelace',
      state: 'reserved',
      reserved_at: RESERVED_AT,
    });
  });

  it('returns any reservation to an admin', async () => {
    captureLogs();
    const { invoke, signIn } = await withReservation();
    const cookies = await signIn(ADMIN);

    const response = await invoke({ method: 'GET', ...itemPath('book-1', 'res-1'), cookies });

    expect(response.statusCode).toBe(200);
    expect(readReservation(response).id).toBe('res-1');
  });

  it('forbids another user and audits the denial', async () => {
    const logs = captureLogs();
    const { invoke, signIn } = await withReservation();
    const cookies = await signIn(OTHER);

    const response = await invoke({ method: 'GET', ...itemPath('book-1', 'res-1'), cookies });

    expect(response.statusCode).toBe(403);
    expect(jsonBody(response)).toEqual({
      code: 403,
      name: 'Forbidden',
      description: 'You do not have access to this reservation',
    });
    expect(auditEntries(logs())).toMatchObject([
      {
        action: 'ACCESS_DENIED',
        actor: { type: 'USER', sub: 'other-1' },
        details: { operation: 'reservation:read', reason: 'not_owner', resourceId: 'res-1' },
      },
    ]);
  });

  it('answers 404 rather than 403 for a missing reservation', async () => {
    captureLogs();
    const { invoke, signIn } = await withReservation();
    const cookies = await signIn(OTHER);

    const response = await invoke({ method: 'GET', ...itemPath('book-1', 'res-missing'), cookies });

    expect(response.statusCode).toBe(404);
    expect(jsonBody(response)).toEqual({ code: 404, name: 'Not Found', description: 'Reservation not found' });
  });

  it('answers 404 when the reservation belongs to another book', async () => {
    captureLogs();
    const { invoke, signIn, seedBook } = await withReservation();
    await seedBook('book-2');
    const cookies = await signIn(OWNER);

    const response = await invoke({ method: 'GET', ...itemPath('book-2', 'res-1'), cookies });

    expect(response.statusCode).toBe(404);
  });

  it('redirects an anonymous caller to the login route', async () => {
    captureLogs();
    const { invoke } = await withReservation();

    const response = await invoke({ method: 'GET', ...itemPath('book-1', 'res-1') });

    expect(response.statusCode).toBe(302);
    expect(header(response, 'Location')).toBe('/auth/login');
  });
});

describe('RSV-03: Cancel reservation', () => {
  it('cancels for the owner and stamps cancelled_at', async () => {
    captureLogs();
    const { invoke, signIn, storage } = await withReservation();
    const cookies = await signIn(OWNER);

    const response = await invoke({ method: 'DELETE', ...itemPath('book-1', 'res-1'), cookies });

    expect(response.statusCode).toBe(200);
    const cancelled = readReservation(response);
    expect(cancelled.state).toBe('cancelled');
    expect(cancelled.cancelled_at).toEqual(expect.any(String));
    expect(cancelled).not.toHaveProperty('user_id');
    expect(storage.reservations.get('res-1')?.state).toBe('cancelled');
  });

  it('answers 404 when an admin cancels an already cancelled reservation', async () => {
    captureLogs();
    const { invoke, signIn } = await withReservation();
    const ownerCookies = await signIn(OWNER);
    const adminCookies = await signIn(ADMIN);

    await invoke({ method: 'DELETE', ...itemPath('book-1', 'res-1'), cookies: ownerCookies });
    const again = await invoke({ method: 'DELETE', ...itemPath('book-1', 'res-1'), cookies: adminCookies });

    expect(again.statusCode).toBe(404);
    expect(jsonBody(again)).toEqual({ code: 404, name: 'Not Found', description: 'Reservation not found' });
  });

  it('lets exactly one of two simultaneous cancellations succeed', async () => {
    const logs = captureLogs();
    const { invoke, signIn, storage } = await withReservation();
    const cookies = await signIn(OWNER);

    const responses = await Promise.all([
      invoke({ method: 'DELETE', ...itemPath('book-1', 'res-1'), cookies }),
      invoke({ method: 'DELETE', ...itemPath('book-1', 'res-1'), cookies }),
    ]);

    expect(responses.map(response => response.statusCode).sort()).toEqual([200, 404]);
    expect(storage.reservations.get('res-1')?.state).toBe('cancelled');
    expect(auditEntries(logs()).filter(entry => entry.action === 'RESERVATION_CANCELLED')).toHaveLength(1);
  });

  it('keeps a cancelled reservation readable', async () => {
    captureLogs();
    const { invoke, signIn } = await withReservation();
    const cookies = await signIn(OWNER);

    await invoke({ method: 'DELETE', ...itemPath('book-1', 'res-1'), cookies });
    const read = await invoke({ method: 'GET', ...itemPath('book-1', 'res-1'), cookies });

    expect(read.statusCode).toBe(200);
    expect(readReservation(read).state).toBe('cancelled');
  });

  it('forbids another user and leaves the reservation reserved', async () => {
    captureLogs();
    const { invoke, signIn, storage } = await withReservation();
    const cookies = await signIn(OTHER);

    const response = await invoke({ method: 'DELETE', ...itemPath('book-1', 'res-1'), cookies });

    expect(response.statusCode).toBe(403);
    expect(storage.reservations.get('res-1')?.state).toBe('reserved');
  });

  it('redirects an anonymous caller to the login route', async () => {
    captureLogs();
    const { invoke, storage } = await withReservation();

    const response = await invoke({ method: 'DELETE', ...itemPath('book-1', 'res-1') });

    expect(response.statusCode).toBe(302);
    expect(header(response, 'Location')).toBe('/auth/login');
    expect(storage.reservations.get('res-1')?.state).toBe('reserved');
  });

  it('audits the cancellation with the admin as actor', async () => {
    const logs = captureLogs();
    const { invoke, signIn } = await withReservation();
    const cookies = await signIn(ADMIN);

    await invoke({ method: 'DELETE', ...itemPath('book-1', 'res-1'), cookies });

    expect(auditEntries(logs())).toMatchObject([
      {
        action: 'RESERVATION_CANCELLED',
        actor: { type: 'USER', sub: 'admin-1' },
        details: { reservationId: 'res-1', bookId: 'book-1', ownerId: 'owner-1' },
      },
    ]);
  });

  it('answers 405 for other methods on a reservation', async () => {
    captureLogs();
    const { invoke, signIn } = await withReservation();
    const cookies = await signIn(OWNER);

    const response = await invoke({ method: 'PUT', ...itemPath('book-1', 'res-1'), cookies });

    expect(response.statusCode).toBe(405);
    expect(header(response, 'Allow')).toBe('GET, DELETE');
  });
});
