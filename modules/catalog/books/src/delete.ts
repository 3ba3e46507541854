/**
 * Delete Book (DELETE /books/{id})
 *
 * Admins only. Soft delete: the item stays in the table with
 * state 'deleted' so existing reservations keep their book reference.
 * Deleting a book twice is a 404 the second time.
 */

import { authorize, noContent, reject, respond } from '@book-reservations/shared';
import type { RequestContext, StructuredResponse } from '@book-reservations/shared';
import { deleteBook } from './lifecycle';
import type { BooksDeps } from './types';

export async function handleDeleteBook(
    bookId: string,
    ctx: RequestContext,
    deps: BooksDeps
): Promise<StructuredResponse> {
    const access = authorize(ctx.identity, 'book:delete');
    if (!access.ok) {
        return reject(ctx, access.error, { operation: 'book:delete', resourceId: bookId });
    }
    const principal = access.value;

    const result = await deleteBook(deps.books, bookId);
    if (!result.ok) {
        return reject(ctx, result.error);
    }

    const book = result.value;
    ctx.auditLogger.bookDeleted({ type: 'USER', sub: principal.id }, { bookId: book.id, title: book.title });

    return respond(ctx, noContent());
}
