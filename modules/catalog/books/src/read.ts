/**
 * Read Books (GET /books, GET /books/{id})
 *
 * Public. Soft-deleted books are invisible to both.
 */

import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import { parsePagination, reject, respond, success } from '@book-reservations/shared';
import type { RequestContext, StructuredResponse } from '@book-reservations/shared';
import { getBook, listBooks } from './lifecycle';
import { toBookListResponse, toBookResponse } from './mapper';
import type { BooksDeps } from './types';

/**
 * GET /books?offset=&limit=
 */
export async function handleListBooks(
    event: APIGatewayProxyEventV2,
    ctx: RequestContext,
    deps: BooksDeps
): Promise<StructuredResponse> {
    const window = parsePagination(event.queryStringParameters);
    if (!window.ok) {
        return reject(ctx, window.error);
    }

    const page = await listBooks(deps.books, window.value);
    return respond(ctx, success(toBookListResponse(page.items, page.totalCount, window.value, ctx.baseUrl)));
}

/**
 * GET /books/{id}
 */
export async function handleReadBook(
    bookId: string,
    ctx: RequestContext,
    deps: BooksDeps
): Promise<StructuredResponse> {
    const result = await getBook(deps.books, bookId);
    if (!result.ok) {
        ctx.logger.info('Book not found', { bookId });
        return reject(ctx, result.error);
    }

    return respond(ctx, success(toBookResponse(result.value, ctx.baseUrl)));
}
