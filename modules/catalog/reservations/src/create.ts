/**
 * Create Reservation (POST /books/{id}/reservations)
 *
 * Any signed-in user may reserve an active book. A request body, if one
 * is sent, is ignored.
 */

import { authorize, created, reject, respond } from '@book-reservations/shared';
import type { RequestContext, StructuredResponse } from '@book-reservations/shared';
import { createReservation } from './lifecycle';
import { toReservationResponse } from './mapper';
import type { ReservationsDeps } from './types';

export async function handleCreateReservation(
    bookId: string,
    ctx: RequestContext,
    deps: ReservationsDeps
): Promise<StructuredResponse> {
    const access = authorize(ctx.identity, 'reservation:create');
    if (!access.ok) {
        return reject(ctx, access.error, { operation: 'reservation:create', resourceId: bookId });
    }
    const principal = access.value;

    const result = await createReservation(deps, bookId, principal);
    if (!result.ok) {
        ctx.logger.info('Reservation refused, book unavailable', { bookId });
        return reject(ctx, result.error);
    }

    const reservation = result.value;
    ctx.auditLogger.reservationCreated(
        { type: 'USER', sub: principal.id },
        { reservationId: reservation.id, bookId: reservation.bookId, ownerId: reservation.userId }
    );

    return respond(ctx, created(toReservationResponse(reservation, { includeUserId: true })));
}
