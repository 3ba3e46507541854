/**
 * Read Reservations
 *
 * - GET /books/{id}/reservations/{rid}: owner or admin; 404 before 403
 * - GET /reservations?user_id=: scoped to the caller unless admin
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import { authorize, reject, reservationListScope, respond, success } from '@book-reservations/shared';
import type { RequestContext, StructuredResponse } from '@book-reservations/shared';
import { getReservationForBook, listReservations } from './lifecycle';
import { toReservationResponse } from './mapper';
import type { ReservationsDeps } from './types';

export async function handleReadReservation(
    bookId: string,
    reservationId: string,
    ctx: RequestContext,
    deps: ReservationsDeps
): Promise<StructuredResponse> {
    const access = authorize(ctx.identity, 'reservation:read');
    if (!access.ok) {
        return reject(ctx, access.error, { operation: 'reservation:read', resourceId: reservationId });
    }

    const found = await getReservationForBook(deps.reservations, bookId, reservationId);
    if (!found.ok) {
        return reject(ctx, found.error);
    }
    const reservation = found.value;

    const owner = authorize(ctx.identity, 'reservation:read', { ownerId: reservation.userId });
    if (!owner.ok) {
        return reject(ctx, owner.error, { operation: 'reservation:read', resourceId: reservationId });
    }

    return respond(ctx, success(toReservationResponse(reservation, { includeUserId: false })));
}

export async function handleListReservations(
    event: APIGatewayProxyEventV2,
    ctx: RequestContext,
    deps: ReservationsDeps
): Promise<StructuredResponse> {
    const access = authorize(ctx.identity, 'reservation:list');
    if (!access.ok) {
        return reject(ctx, access.error, { operation: 'reservation:list' });
    }

    const requestedUserId = event.queryStringParameters?.user_id || undefined;
    const filter = reservationListScope(access.value, requestedUserId);
    const reservations = await listReservations(deps.reservations, filter);

    return respond(
        ctx,
        success(reservations.map(reservation => toReservationResponse(reservation, { includeUserId: true })))
    );
}
