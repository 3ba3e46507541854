/**
 * Book Reservations - Audit Schema
 *
 * Structured logging interfaces for security-relevant events.
 * All audit events are JSON-formatted for CloudWatch.
 */

// =============================================================================
// Audit Actions
// =============================================================================

export type AuditAction =
    | 'LOGIN_SUCCESS'
    | 'LOGIN_FAILURE'
    | 'LOGOUT'
    | 'USER_PROVISIONED'
    | 'ACCESS_DENIED'
    // Catalogue
    | 'BOOK_CREATED'
    | 'BOOK_UPDATED'
    | 'BOOK_DELETED'
    // Reservations
    | 'RESERVATION_CREATED'
    | 'RESERVATION_CANCELLED';

// =============================================================================
// Actor Types
// =============================================================================

/**
 * Represents the entity performing the audited action.
 */
export type AuditActor =
    | { type: 'USER'; sub: string }
    | { type: 'SYSTEM'; process?: string }
    | { type: 'ANONYMOUS' };

// =============================================================================
// Audit Log Entry
// =============================================================================

/**
 * @example
 * ```typescript
 * const entry: AuditLogEntry = {
 *   level: 'AUDIT',
 *   timestamp: '2024-01-15T10:30:00.000Z',
 *   requestId: 'abc123-def456-ghi789',
 *   action: 'BOOK_DELETED',
 *   ip: '192.168.1.1',
 *   actor: { type: 'USER', sub: 'user-uuid-here' },
 *   details: { bookId: 'book-uuid-here', title: 'Example' }
 * };
 * ```
 */
export interface AuditLogEntry {
    /** Always 'AUDIT', to separate audit entries from operational logs */
    level: 'AUDIT';

    /** ISO 8601 UTC timestamp */
    timestamp: string;

    /** Filled from the logger context when omitted */
    requestId?: string;

    action: AuditAction;

    /** Filled from the logger context when omitted */
    ip?: string;

    actor: AuditActor;

    /** Structure varies by action type */
    details: Record<string, unknown>;
}

// =============================================================================
// Action-Specific Detail Types
// =============================================================================

export interface LoginDetails {
    method: 'oidc';
    email?: string;
    reason?: string;
}

export interface AccessDeniedDetails {
    operation: string;
    reason: 'missing_role' | 'not_owner';
    resourceId?: string;
}

export interface BookAuditDetails {
    bookId: string;
    title: string;
}

export interface ReservationAuditDetails {
    reservationId: string;
    bookId: string;
    ownerId: string;
}

// =============================================================================
// Logger Contract
// =============================================================================

export interface AuditLogger {
    log(entry: Omit<AuditLogEntry, 'level' | 'timestamp'>): void;
}
