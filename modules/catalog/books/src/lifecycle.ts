/**
 * Book Lifecycle
 *
 * State machine: active -> deleted (terminal, no undelete).
 *
 * Nothing here knows about HTTP. Expected failures come back as Result
 * values; storage failures throw.
 */

import {
    ErrorMessages,
    NotFoundError,
    fail,
    generateId,
    ok,
    paginate,
    validateBookPayload,
} from '@book-reservations/shared';
import type { BookStore, InvalidInputError, PageWindow, Result } from '@book-reservations/shared';
import type { BookItem } from '../../../shared_types/schema';
import { bookLinks } from './mapper';

export interface BookPage {
    items: BookItem[];
    totalCount: number;
}

function bookNotFound(): NotFoundError {
    return new NotFoundError(ErrorMessages.BOOK_NOT_FOUND);
}

export async function createBook(
    store: Pick<BookStore, 'createBook'>,
    payload: unknown
): Promise<Result<BookItem, InvalidInputError>> {
    const fields = validateBookPayload(payload);
    if (!fields.ok) {
        return fields;
    }

    const id = generateId();
    const book = await store.createBook({ id, ...fields.value, links: bookLinks(id) });
    return ok(book);
}

export async function getBook(
    store: Pick<BookStore, 'getActiveBook'>,
    bookId: string
): Promise<Result<BookItem, NotFoundError>> {
    const book = await store.getActiveBook(bookId);
    return book ? ok(book) : fail(bookNotFound());
}

/**
 * One page of active books plus the total across all pages.
 */
export async function listBooks(
    store: Pick<BookStore, 'listActiveBooks'>,
    window: PageWindow
): Promise<BookPage> {
    const books = await store.listActiveBooks();
    return {
        items: paginate(books, window),
        totalCount: books.length,
    };
}

/**
 * Replace title, author and synopsis of an active book and regenerate its links.
 * The payload is validated before the book is looked at.
 */
export async function updateBook(
    store: Pick<BookStore, 'updateActiveBook'>,
    bookId: string,
    payload: unknown
): Promise<Result<BookItem, InvalidInputError | NotFoundError>> {
    const fields = validateBookPayload(payload);
    if (!fields.ok) {
        return fields;
    }

    const book = await store.updateActiveBook(bookId, fields.value, bookLinks(bookId));
    return book ? ok(book) : fail(bookNotFound());
}

/**
 * Soft delete. A missing or already deleted book is NotFound, every time.
 */
export async function deleteBook(
    store: Pick<BookStore, 'softDeleteBook'>,
    bookId: string,
    deletedAt: string = new Date().toISOString()
): Promise<Result<BookItem, NotFoundError>> {
    const book = await store.softDeleteBook(bookId, deletedAt);
    return book ? ok(book) : fail(bookNotFound());
}
