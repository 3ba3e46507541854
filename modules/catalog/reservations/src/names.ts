/**
 * Reservation Names
 *
 * The owner's name is copied onto the reservation once, at creation, from
 * whatever the identity provider released:
 *
 * 1. given and family name claims, when both are present
 * 2. the full name claim, split on its first space
 * 3. the email address, with a placeholder surname
 * 4. placeholders for both
 */

import { NO_NAME_MARKER, UNKNOWN_USER_MARKER } from '@book-reservations/shared';
import type { Principal } from '@book-reservations/shared';

export interface ReservationName {
    forenames: string;
    surname: string;
}

export function deriveReservationName(owner: Pick<Principal, 'email' | 'profile'>): ReservationName {
    const { givenName, familyName, displayName } = owner.profile;

    if (givenName && familyName) {
        return { forenames: givenName, surname: familyName };
    }

    if (displayName) {
        const space = displayName.indexOf(' ');
        return space === -1
            ? { forenames: displayName, surname: '' }
            : { forenames: displayName.slice(0, space), surname: displayName.slice(space + 1) };
    }

    if (owner.email) {
        return { forenames: owner.email, surname: NO_NAME_MARKER };
    }

    return { forenames: UNKNOWN_USER_MARKER, surname: NO_NAME_MARKER };
}
