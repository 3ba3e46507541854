/**
 * Book Catalogue Types
 *
 * Wire shapes for the /books endpoints and the dependencies the handler
 * is built from.
 */

import type { BaseEnvConfig, BookStore, SessionStore, UserStore } from '@book-reservations/shared';

// =============================================================================
// Responses
// =============================================================================

export interface BookLinksResponse {
    /** Absolute URL of the book */
    self: string;
    reservations: string;
    reviews: string;
}

/**
 * A book as returned to clients. Never carries `state` or storage keys.
 */
export interface BookResponse {
    id: string;
    title: string;
    author: string;
    synopsis: string;
    links: BookLinksResponse;
}

export interface BookListResponse {
    /** Number of non-deleted books, independent of the page window */
    total_count: number;
    offset: number;
    limit: number;
    items: BookResponse[];
}

// =============================================================================
// Handler Dependencies
// =============================================================================

export interface BooksDeps {
    books: BookStore;
    users: Pick<UserStore, 'getUser'>;
    sessions: Pick<SessionStore, 'getSession' | 'deleteSession'>;
    config: BaseEnvConfig;
}
