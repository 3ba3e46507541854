/**
 * Book Reservations - Lambda Handler
 *
 * Endpoints:
 * - POST /books/:id/reservations - Reserve a book (any signed-in user)
 * - GET /books/:id/reservations/:rid - Read reservation (owner or admin)
 * - DELETE /books/:id/reservations/:rid - Cancel reservation (owner or admin)
 * - GET /reservations?user_id= - List reservations (own; admins may pick a user or see all)
 *
 * A missing reservation is 404 even for callers who could not have read
 * it; the ownership check runs only once it is found.
 *
 * @module catalog/reservations
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    createLogger,
    createRequestContext,
    createStorageAdapter,
    getBaseEnvConfig,
    handleUnexpected,
    methodNotAllowed,
    respond,
} from '@book-reservations/shared';
import type { RequestContext, StructuredResponse } from '@book-reservations/shared';
import type { ReservationsDeps } from './types';
import { handleCreateReservation } from './create';
import { handleListReservations, handleReadReservation } from './read';
import { handleCancelReservation } from './cancel';

export type { ReservationResponse, ReservationsDeps } from './types';
export { deriveReservationName } from './names';
export type { ReservationName } from './names';
export { toReservationResponse } from './mapper';
export { createReservation, getReservationForBook, cancelReservation, listReservations } from './lifecycle';

// =============================================================================
// Dependencies (Singleton)
// =============================================================================

let defaultDeps: ReservationsDeps | null = null;

function getDefaultDeps(): ReservationsDeps {
    if (!defaultDeps) {
        const storage = createStorageAdapter();
        defaultDeps = {
            books: storage,
            reservations: storage,
            users: storage,
            sessions: storage,
            config: getBaseEnvConfig(),
        };
    }
    return defaultDeps;
}

// =============================================================================
// Routing
// =============================================================================

function route(
    event: APIGatewayProxyEventV2,
    ctx: RequestContext,
    deps: ReservationsDeps
): Promise<StructuredResponse> | StructuredResponse {
    const method = event.requestContext.http.method;
    const bookId = event.pathParameters?.id;
    const reservationId = event.pathParameters?.rid;

    // /books/{id}/reservations/{rid}
    if (bookId && reservationId) {
        switch (method) {
            case 'GET':
                return handleReadReservation(bookId, reservationId, ctx, deps);
            case 'DELETE':
                return handleCancelReservation(bookId, reservationId, ctx, deps);
            default:
                return respond(ctx, methodNotAllowed(method, ['GET', 'DELETE']));
        }
    }

    // /books/{id}/reservations
    if (bookId) {
        return method === 'POST'
            ? handleCreateReservation(bookId, ctx, deps)
            : respond(ctx, methodNotAllowed(method, ['POST']));
    }

    // /reservations
    return method === 'GET'
        ? handleListReservations(event, ctx, deps)
        : respond(ctx, methodNotAllowed(method, ['GET']));
}

// =============================================================================
// Lambda Handler
// =============================================================================

export function createReservationsHandler(
    resolveDeps: () => ReservationsDeps = getDefaultDeps
): (event: APIGatewayProxyEventV2, context: Context) => Promise<StructuredResponse> {
    return async (event, context) => {
        const logger = createLogger(event, context);
        let cookies: string[] = [];

        try {
            const deps = resolveDeps();
            const ctx = await createRequestContext(event, context, {
                users: deps.users,
                sessions: deps.sessions,
                session: deps.config.session,
            });
            cookies = ctx.cookies;

            logger.info('Reservations request received', {
                method: event.requestContext.http.method,
                path: event.requestContext.http.path,
            });

            return await route(event, ctx, deps);
        } catch (err) {
            return handleUnexpected(logger, err, cookies);
        }
    };
}

export const handler = createReservationsHandler();
