/**
 * Reservation Lifecycle
 *
 * State machine: reserved -> cancelled (terminal).
 *
 * A reservation may only be created against an active book. Deleting the
 * book later does not touch its reservations.
 */

import {
    BookUnavailableError,
    ErrorMessages,
    NotFoundError,
    fail,
    generateId,
    ok,
} from '@book-reservations/shared';
import type { BookStore, Principal, ReservationFilter, ReservationStore, Result } from '@book-reservations/shared';
import type { ReservationItem } from '../../../shared_types/schema';
import { deriveReservationName } from './names';

function reservationNotFound(): NotFoundError {
    return new NotFoundError(ErrorMessages.RESERVATION_NOT_FOUND);
}

/**
 * Reserve an active book for the owner. Any number of reservations per
 * owner and book may coexist.
 */
export async function createReservation(
    stores: {
        books: Pick<BookStore, 'getActiveBook'>;
        reservations: Pick<ReservationStore, 'createReservation'>;
    },
    bookId: string,
    owner: Pick<Principal, 'id' | 'email' | 'profile'>,
    now: Date = new Date()
): Promise<Result<ReservationItem, BookUnavailableError>> {
    const book = await stores.books.getActiveBook(bookId);
    if (!book) {
        return fail(new BookUnavailableError(bookId));
    }

    // Null when the book was deleted since the read above
    const reservation = await stores.reservations.createReservation({
        id: generateId(),
        bookId: book.id,
        userId: owner.id,
        ...deriveReservationName(owner),
        reservedAt: now.toISOString(),
    });
    return reservation ? ok(reservation) : fail(new BookUnavailableError(bookId));
}

/**
 * Fetch a reservation in any state, provided it belongs to the book.
 */
export async function getReservationForBook(
    store: Pick<ReservationStore, 'getReservation'>,
    bookId: string,
    reservationId: string
): Promise<Result<ReservationItem, NotFoundError>> {
    const reservation = await store.getReservation(reservationId);
    if (!reservation || reservation.bookId !== bookId) {
        return fail(reservationNotFound());
    }
    return ok(reservation);
}

/**
 * Conditional transition reserved -> cancelled. Anything else, including
 * an already cancelled reservation, is NotFound.
 */
export async function cancelReservation(
    store: Pick<ReservationStore, 'cancelReservation'>,
    reservationId: string,
    cancelledAt: string = new Date().toISOString()
): Promise<Result<ReservationItem, NotFoundError>> {
    const cancelled = await store.cancelReservation(reservationId, cancelledAt);
    return cancelled ? ok(cancelled) : fail(reservationNotFound());
}

export async function listReservations(
    store: Pick<ReservationStore, 'listReservations'>,
    filter: ReservationFilter
): Promise<ReservationItem[]> {
    return store.listReservations(filter);
}
