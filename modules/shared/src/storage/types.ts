/**
 * Book Reservations - Storage Types
 *
 * Store interfaces the lifecycle code depends on. StorageAdapter implements
 * all of them against DynamoDB; tests substitute in-memory stores.
 *
 * @module storage/types
 */

import type {
    BookItem,
    BookLinks,
    LoginStateItem,
    ReservationItem,
    SessionItem,
    UserItem,
    UserProfile,
} from '../../../shared_types/schema';

// =============================================================================
// Storage Adapter Configuration
// =============================================================================

export interface StorageAdapterConfig {
    /** DynamoDB table name (injected from environment) */
    tableName: string;
    /** AWS region (optional, defaults to environment) */
    region?: string;
    /** Override for local endpoints such as DynamoDB Local */
    endpoint?: string;
}

// =============================================================================
// Inputs
// =============================================================================

/** Editable book fields. */
export interface BookFields {
    title: string;
    author: string;
    synopsis: string;
}

export interface NewBook extends BookFields {
    id: string;
    links: BookLinks;
}

export interface NewReservation {
    id: string;
    bookId: string;
    userId: string;
    forenames: string;
    surname: string;
    reservedAt: string;
}

export interface ReservationFilter {
    /** Restrict to one owner. Omitted means every reservation. */
    userId?: string;
}

/** Verified claims from the identity provider. */
export interface ProviderProfile extends UserProfile {
    /** OIDC `sub` */
    subject: string;
    email?: string;
}

export interface NewSession {
    sessionId: string;
    userId: string;
    ttlSeconds: number;
    userAgent?: string;
    ipAddress?: string;
}

export interface NewLoginState {
    state: string;
    nonce: string;
    codeVerifier: string;
    ttlSeconds: number;
}

export interface UpsertUserResult {
    user: UserItem;
    /** True when this sign-in provisioned the account */
    created: boolean;
}

// =============================================================================
// Store Interfaces
// =============================================================================

export interface UserStore {
    getUser(userId: string): Promise<UserItem | null>;
    getUserBySubject(subject: string): Promise<UserItem | null>;
    /**
     * Link a provider identity to a user, creating the user with the default
     * roles on first sign-in. Existing roles are never changed.
     */
    upsertUserFromProfile(profile: ProviderProfile, newUserId: string): Promise<UpsertUserResult>;
}

export interface BookStore {
    createBook(book: NewBook): Promise<BookItem>;
    /** Returns null for missing and soft-deleted books. */
    getActiveBook(bookId: string): Promise<BookItem | null>;
    /** Active books in creation order. */
    listActiveBooks(): Promise<BookItem[]>;
    /** Conditional on the book being active; null otherwise. */
    updateActiveBook(bookId: string, fields: BookFields, links: BookLinks): Promise<BookItem | null>;
    /** Conditional on the book being active; null otherwise. */
    softDeleteBook(bookId: string, deletedAt: string): Promise<BookItem | null>;
}

export interface ReservationStore {
    createReservation(reservation: NewReservation): Promise<ReservationItem | null>;
    getReservation(reservationId: string): Promise<ReservationItem | null>;
    /** Ordered by reservedAt. */
    listReservations(filter: ReservationFilter): Promise<ReservationItem[]>;
    /** Conditional on the reservation being in state `reserved`; null otherwise. */
    cancelReservation(reservationId: string, cancelledAt: string): Promise<ReservationItem | null>;
}

export interface SessionStore {
    getSession(sessionId: string): Promise<SessionItem | null>;
    createSession(session: NewSession): Promise<SessionItem>;
    deleteSession(sessionId: string): Promise<void>;
    saveLoginState(loginState: NewLoginState): Promise<LoginStateItem>;
    /** Single use: deletes the state and returns it, or null if absent or expired. */
    consumeLoginState(state: string): Promise<LoginStateItem | null>;
}
