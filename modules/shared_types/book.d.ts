/**
 * Book Reservations - Book Entity Types
 *
 * Key Pattern:
 *   PK: BOOK#<id>
 *   SK: METADATA
 *   GSI1PK: BOOKS
 *   GSI1SK: BOOK#<created_at> (catalogue listing in creation order)
 */

import type { BaseItem } from './base';

export type BookState = 'active' | 'deleted';

/** Relative link paths. Resolved to absolute URLs only in responses. */
export interface BookLinks {
    self: string;
    reservations: string;
    reviews: string;
}

export interface BookItem extends BaseItem {
    /** PK pattern: BOOK#<id> */
    PK: `BOOK#${string}`;
    SK: 'METADATA';
    entityType: 'BOOK';

    /** Book identifier (UUID), immutable */
    id: string;
    title: string;
    author: string;
    synopsis: string;
    links: BookLinks;

    /** Absent on legacy items; treated as 'active' */
    state?: BookState;

    /** ISO 8601 timestamp of the soft delete */
    deletedAt?: string;
}
