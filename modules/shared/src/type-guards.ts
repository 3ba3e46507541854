/**
 * Book Reservations - Type Guards
 *
 * Runtime type guards for DynamoDB entity discrimination.
 * Items come back from the Document client as untyped attribute maps;
 * these guards narrow them to the Single Table Design entity types.
 *
 * Each guard validates:
 * - entityType discriminator matches expected value
 * - PK prefix matches expected pattern
 * - SK value matches expected value for the entity type
 *
 * @see https://www.typescriptlang.org/docs/handbook/2/narrowing.html#using-type-predicates
 */

import type {
    EntityType,
    SKValue,
    UserItem,
    SubjectLinkItem,
    BookItem,
    ReservationItem,
    SessionItem,
    LoginStateItem,
} from '../../shared_types/schema';
import { KeyPrefixes } from './constants';

function hasKeyPattern(item: object, entityType: EntityType, prefix: string, sk: SKValue): boolean {
    const pk: unknown = Reflect.get(item, 'PK');
    return (
        Reflect.get(item, 'entityType') === entityType &&
        typeof pk === 'string' &&
        pk.startsWith(prefix) &&
        Reflect.get(item, 'SK') === sk
    );
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Key Pattern: PK=USER#<id>, SK=PROFILE
 */
export function isUserItem(item: object): item is UserItem {
    return hasKeyPattern(item, 'USER', KeyPrefixes.USER, 'PROFILE');
}

/**
 * Key Pattern: PK=SUBJECT#<sub>, SK=METADATA
 */
export function isSubjectLinkItem(item: object): item is SubjectLinkItem {
    return (
        hasKeyPattern(item, 'SUBJECT_LINK', KeyPrefixes.SUBJECT, 'METADATA') &&
        typeof Reflect.get(item, 'userId') === 'string'
    );
}

/**
 * Key Pattern: PK=BOOK#<id>, SK=METADATA
 */
export function isBookItem(item: object): item is BookItem {
    return hasKeyPattern(item, 'BOOK', KeyPrefixes.BOOK, 'METADATA');
}

/**
 * Key Pattern: PK=RESERVATION#<id>, SK=METADATA
 */
export function isReservationItem(item: object): item is ReservationItem {
    return hasKeyPattern(item, 'RESERVATION', KeyPrefixes.RESERVATION, 'METADATA');
}

/**
 * Key Pattern: PK=SESSION#<id>, SK=METADATA
 */
export function isSessionItem(item: object): item is SessionItem {
    return hasKeyPattern(item, 'SESSION', KeyPrefixes.SESSION, 'METADATA');
}

/**
 * Key Pattern: PK=LOGIN_STATE#<state>, SK=METADATA
 */
export function isLoginStateItem(item: object): item is LoginStateItem {
    return hasKeyPattern(item, 'LOGIN_STATE', KeyPrefixes.LOGIN_STATE, 'METADATA');
}

/** Soft-deleted books stay in the table but are never served. */
export function isActiveBook(book: BookItem): boolean {
    return book.state !== 'deleted';
}
