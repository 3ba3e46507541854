/**
 * Book Reservations - Reservation Entity Types
 *
 * Key Pattern:
 *   PK: RESERVATION#<id>
 *   SK: METADATA
 *   GSI1PK: USER#<user_id>
 *   GSI1SK: RESERVATION#<reserved_at>
 *
 * Lifecycle: reserved -> cancelled (terminal).
 */

import type { BaseItem } from './base';

export type ReservationState = 'reserved' | 'cancelled';

export interface ReservationItem extends BaseItem {
    /** PK pattern: RESERVATION#<id> */
    PK: `RESERVATION#${string}`;
    SK: 'METADATA';
    entityType: 'RESERVATION';

    /** Reservation identifier (UUID) */
    id: string;

    /** Book that was active when the reservation was made */
    bookId: string;

    /** Owner's internal user id */
    userId: string;

    /** Derived from the owner's profile once, at creation */
    forenames: string;
    surname: string;

    state: ReservationState;

    /** ISO 8601 (UTC) */
    reservedAt: string;
    cancelledAt?: string;
}
