/**
 * Book Response Mapper
 *
 * Projects stored BookItems onto the wire format. Stored links are
 * relative; they are resolved against the request's scheme and host here.
 */

import { absoluteUrl } from '@book-reservations/shared';
import type { BookItem, BookLinks } from '../../../shared_types/schema';
import type { BookListResponse, BookResponse } from './types';

/**
 * Relative link paths for a book id.
 */
export function bookLinks(bookId: string): BookLinks {
    const self = `/books/${encodeURIComponent(bookId)}`;
    return {
        self,
        reservations: `${self}/reservations`,
        reviews: `${self}/reviews`,
    };
}

export function toBookResponse(book: BookItem, baseUrl: string): BookResponse {
    return {
        id: book.id,
        title: book.title,
        author: book.author,
        synopsis: book.synopsis,
        links: {
            self: absoluteUrl(baseUrl, book.links.self),
            reservations: absoluteUrl(baseUrl, book.links.reservations),
            reviews: absoluteUrl(baseUrl, book.links.reviews),
        },
    };
}

export function toBookListResponse(
    page: readonly BookItem[],
    totalCount: number,
    window: { offset: number; limit: number },
    baseUrl: string
): BookListResponse {
    return {
        total_count: totalCount,
        offset: window.offset,
        limit: window.limit,
        items: page.map(book => toBookResponse(book, baseUrl)),
    };
}
