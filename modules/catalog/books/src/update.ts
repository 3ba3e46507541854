/**
 * Update Book (PUT /books/{id})
 *
 * Editors and admins only. Replaces title, author and synopsis of an
 * active book; the id and links never change.
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import { authorize, parseJsonBody, reject, respond, success } from '@book-reservations/shared';
import type { RequestContext, StructuredResponse } from '@book-reservations/shared';
import { updateBook } from './lifecycle';
import { toBookResponse } from './mapper';
import type { BooksDeps } from './types';

export async function handleUpdateBook(
    bookId: string,
    event: APIGatewayProxyEventV2,
    ctx: RequestContext,
    deps: BooksDeps
): Promise<StructuredResponse> {
    const access = authorize(ctx.identity, 'book:update');
    if (!access.ok) {
        return reject(ctx, access.error, { operation: 'book:update', resourceId: bookId });
    }
    const principal = access.value;

    const body = parseJsonBody(event);
    if (!body.ok) {
        return reject(ctx, body.error);
    }

    const result = await updateBook(deps.books, bookId, body.value);
    if (!result.ok) {
        return reject(ctx, result.error);
    }

    const book = result.value;
    ctx.auditLogger.bookUpdated({ type: 'USER', sub: principal.id }, { bookId: book.id, title: book.title });

    return respond(ctx, success(toBookResponse(book, ctx.baseUrl)));
}
