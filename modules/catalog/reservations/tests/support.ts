/**
 * Shared setup for the reservation tests.
 */

import { InMemoryStorage, buildEvent, lambdaContext } from '@book-reservations/shared/testing';
import type { SeedUser, TestEventOptions } from '@book-reservations/shared/testing';
import type { StructuredResponse } from '@book-reservations/shared';
import { createReservationsHandler } from '../src/index';
import type { ReservationResponse } from '../src/index';

export const OWNER: SeedUser = {
  id: 'owner-1',
  roles: ['viewer'],
  email: 'ada@example.com',
  profile: { givenName: 'Ada', familyName: 'Lovelace' },
};
export const OTHER: SeedUser = { id: 'other-1', roles: ['viewer', 'editor'] };
export const ADMIN: SeedUser = { id: 'admin-1', roles: ['admin'] };

export function setup() {
  const storage = new InMemoryStorage();
  const handler = createReservationsHandler(() => ({
    books: storage,
    reservations: storage,
    users: storage,
    sessions: storage,
    config: { tableName: 'test-table', session: { name: '__Host-sid', ttlSeconds: 3600 } },
  }));

  const invoke = (options: TestEventOptions): Promise<StructuredResponse> =>
    handler(buildEvent(options), lambdaContext());

  const signIn = async (seed: SeedUser): Promise<string[]> => {
    const sessionId = await storage.signIn(seed);
    return [`__Host-sid=${sessionId}`];
  };

  const seedBook = async (id: string) =>
    storage.createBook({
      id,
      title: `Title ${id}`,
      author: `Author ${id}`,
      synopsis: `Synopsis ${id}`,
      links: { self: `/books/${id}`, reservations: `/books/${id}/reservations`, reviews: `/books/${id}/reviews` },
    });

  const seedReservation = async (id: string, bookId: string, userId: string, reservedAt: string) =>
    storage.createReservation({ id, bookId, userId, forenames: 'Ada', surname: 'Lovelace', reservedAt });

  return { storage, invoke, signIn, seedBook, seedReservation };
}

export function readReservation(response: StructuredResponse): ReservationResponse {
  const reservation: ReservationResponse = JSON.parse(response.body ?? '');
  return reservation;
}

export function readReservations(response: StructuredResponse): ReservationResponse[] {
  const reservations: ReservationResponse[] = JSON.parse(response.body ?? '');
  return reservations;
}

export function itemPath(bookId: string, reservationId: string) {
  return {
    path: `/books/${bookId}/reservations/${reservationId}`,
    pathParameters: { id: bookId, rid: reservationId },
  };
}
