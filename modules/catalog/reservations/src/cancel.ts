/**
 * Cancel Reservation (DELETE /books/{id}/reservations/{rid})
 *
 * Owner or admin. The reservation stays stored with state 'cancelled';
 * cancelling it again is a 404.
 */

import { authorize, reject, respond, success } from '@book-reservations/shared';
import type { RequestContext, StructuredResponse } from '@book-reservations/shared';
import { cancelReservation, getReservationForBook } from './lifecycle';
import { toReservationResponse } from './mapper';
import type { ReservationsDeps } from './types';

export async function handleCancelReservation(
    bookId: string,
    reservationId: string,
    ctx: RequestContext,
    deps: ReservationsDeps
): Promise<StructuredResponse> {
    const access = authorize(ctx.identity, 'reservation:cancel');
    if (!access.ok) {
        return reject(ctx, access.error, { operation: 'reservation:cancel', resourceId: reservationId });
    }

    const found = await getReservationForBook(deps.reservations, bookId, reservationId);
    if (!found.ok) {
        return reject(ctx, found.error);
    }

    const owner = authorize(ctx.identity, 'reservation:cancel', { ownerId: found.value.userId });
    if (!owner.ok) {
        return reject(ctx, owner.error, { operation: 'reservation:cancel', resourceId: reservationId });
    }

    const result = await cancelReservation(deps.reservations, reservationId);
    if (!result.ok) {
        ctx.logger.info('Reservation not cancellable', { reservationId, state: found.value.state });
        return reject(ctx, result.error);
    }

    const cancelled = result.value;
    ctx.auditLogger.reservationCancelled(
        { type: 'USER', sub: owner.value.id },
        { reservationId: cancelled.id, bookId: cancelled.bookId, ownerId: cancelled.userId }
    );

    return respond(ctx, success(toReservationResponse(cancelled, { includeUserId: false })));
}
