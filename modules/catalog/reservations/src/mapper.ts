/**
 * Reservation Response Mapper
 */

import type { ReservationItem } from '../../../shared_types/schema';
import type { ReservationResponse } from './types';

export interface ProjectionOptions {
    /** Include the owner's id (creation and listing responses) */
    includeUserId: boolean;
}

export function toReservationResponse(
    reservation: ReservationItem,
    options: ProjectionOptions
): ReservationResponse {
    return {
        id: reservation.id,
        book_id: reservation.bookId,
        ...(options.includeUserId ? { user_id: String(reservation.userId) } : {}),
        forenames: reservation.forenames,
        surname: reservation.surname,
        state: reservation.state,
        reserved_at: reservation.reservedAt,
        ...(reservation.cancelledAt ? { cancelled_at: reservation.cancelledAt } : {}),
    };
}
