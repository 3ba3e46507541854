/**
 * Book Reservations - Validation Module
 *
 * @module validation
 */

export {
    validateBookPayload,
    REQUIRED_BOOK_FIELDS,
} from './book-payload';

export {
    parsePagination,
    paginate,
} from './pagination';

export type { PageWindow } from './pagination';
