/**
 * Reservation Types
 *
 * Wire shapes for the reservation endpoints (snake_case) and the
 * dependencies the handler is built from.
 */

import type { BaseEnvConfig, BookStore, ReservationStore, SessionStore, UserStore } from '@book-reservations/shared';
import type { ReservationState } from '../../../shared_types/schema';

// =============================================================================
// Responses
// =============================================================================

export interface ReservationResponse {
    id: string;
    book_id: string;
    /** Omitted on single reads and cancellations */
    user_id?: string;
    forenames: string;
    surname: string;
    state: ReservationState;
    /** ISO 8601 (UTC) */
    reserved_at: string;
    cancelled_at?: string;
}

// =============================================================================
// Handler Dependencies
// =============================================================================

export interface ReservationsDeps {
    books: Pick<BookStore, 'getActiveBook'>;
    reservations: ReservationStore;
    users: Pick<UserStore, 'getUser'>;
    sessions: Pick<SessionStore, 'getSession' | 'deleteSession'>;
    config: BaseEnvConfig;
}
