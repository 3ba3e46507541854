/**
 * Create Book (POST /books)
 *
 * Editors and admins only. The body must be a JSON object carrying string
 * title, author and synopsis; other keys are ignored.
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import { authorize, created, parseJsonBody, reject, respond } from '@book-reservations/shared';
import type { RequestContext, StructuredResponse } from '@book-reservations/shared';
import { createBook } from './lifecycle';
import { toBookResponse } from './mapper';
import type { BooksDeps } from './types';

export async function handleCreateBook(
    event: APIGatewayProxyEventV2,
    ctx: RequestContext,
    deps: BooksDeps
): Promise<StructuredResponse> {
    const access = authorize(ctx.identity, 'book:create');
    if (!access.ok) {
        return reject(ctx, access.error, { operation: 'book:create' });
    }
    const principal = access.value;

    const body = parseJsonBody(event);
    if (!body.ok) {
        return reject(ctx, body.error);
    }

    const result = await createBook(deps.books, body.value);
    if (!result.ok) {
        ctx.logger.info('Book payload rejected', { violations: [...result.error.violations] });
        return reject(ctx, result.error);
    }

    const book = result.value;
    ctx.auditLogger.bookCreated({ type: 'USER', sub: principal.id }, { bookId: book.id, title: book.title });

    return respond(ctx, created(toBookResponse(book, ctx.baseUrl)));
}
