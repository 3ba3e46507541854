/**
 * Book Reservations - Constants
 *
 * Centralized constants for the catalogue and reservation services.
 * Runtime configuration (table name, cookie settings, provider endpoints)
 * comes from environment variables; everything here is fixed.
 */

// =============================================================================
// Roles
// =============================================================================

export const Roles = {
    /** Default role granted on first sign-in */
    VIEWER: 'viewer',
    /** May create and update books */
    EDITOR: 'editor',
    /** Full access, including deletes and other users' reservations */
    ADMIN: 'admin',
} as const;

export type Role = typeof Roles[keyof typeof Roles];

export const DEFAULT_ROLES: readonly Role[] = [Roles.VIEWER];

// =============================================================================
// Resource States
// =============================================================================

export const BookStates = {
    ACTIVE: 'active',
    DELETED: 'deleted',
} as const;

export const ReservationStates = {
    RESERVED: 'reserved',
    CANCELLED: 'cancelled',
} as const;

// =============================================================================
// DynamoDB Key Prefixes
// =============================================================================

export const KeyPrefixes = {
    USER: 'USER#',
    SUBJECT: 'SUBJECT#',
    BOOK: 'BOOK#',
    RESERVATION: 'RESERVATION#',
    SESSION: 'SESSION#',
    LOGIN_STATE: 'LOGIN_STATE#',
} as const;

/** GSI1 partition holding every book, ordered by creation time */
export const BOOKS_PARTITION = 'BOOKS';

/** GSI1 partition holding pending login states */
export const LOGIN_STATES_PARTITION = 'LOGIN_STATES';

export const GSI1_INDEX_NAME = 'GSI1';

// =============================================================================
// Pagination
// =============================================================================

export const Pagination = {
    DEFAULT_OFFSET: 0,
    DEFAULT_LIMIT: 20,
    MAX_LIMIT: 100,
} as const;

// =============================================================================
// Reservation Name Markers
// =============================================================================

/** Stored when the owner's profile carries neither name nor email */
export const UNKNOWN_USER_MARKER = 'unknown user';

/** Stored as surname when no name claim is available */
export const NO_NAME_MARKER = 'no name provided';

// =============================================================================
// Session Defaults
// =============================================================================

export const SessionDefaults = {
    COOKIE_NAME: '__Host-sid',
    TTL_SECONDS: 86400,
    /** Lifetime of the state kept between login redirect and callback */
    LOGIN_STATE_TTL_SECONDS: 600,
} as const;

// =============================================================================
// Routes
// =============================================================================

export const LOGIN_PATH = '/auth/login';
