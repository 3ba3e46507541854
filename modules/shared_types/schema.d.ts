/**
 * Book Reservations - DynamoDB Schema Types
 *
 * Single Table Design interfaces for all entities.
 *
 * Key Patterns:
 *   - User:        PK=USER#<id>            SK=PROFILE
 *   - SubjectLink: PK=SUBJECT#<sub>        SK=METADATA
 *   - Book:        PK=BOOK#<id>            SK=METADATA
 *   - Reservation: PK=RESERVATION#<id>     SK=METADATA
 *   - Session:     PK=SESSION#<id>         SK=METADATA
 *   - LoginState:  PK=LOGIN_STATE#<state>  SK=METADATA
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

export type {
    PKPrefix,
    SKValue,
    EntityType,
    BaseItem,
} from './base';

export type { UserItem, UserProfile, UserRole, SubjectLinkItem } from './user';

export type { BookItem, BookLinks, BookState } from './book';

export type { ReservationItem, ReservationState } from './reservation';

export type { SessionItem, LoginStateItem, SessionCookieConfig } from './session';

import type { UserItem, SubjectLinkItem } from './user';
import type { BookItem } from './book';
import type { ReservationItem } from './reservation';
import type { SessionItem, LoginStateItem } from './session';

export type CatalogueItem =
    | UserItem
    | SubjectLinkItem
    | BookItem
    | ReservationItem
    | SessionItem
    | LoginStateItem;
