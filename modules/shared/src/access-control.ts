/**
 * Book Reservations - Access Control
 *
 * Pure decision functions over a resolved Identity. Nothing here reads
 * storage: callers fetch the resource first (so a missing resource is a
 * 404, never a 403) and pass its owner in.
 *
 * | Operation           | Authenticated | Roles           | Ownership      |
 * |---------------------|---------------|-----------------|----------------|
 * | book:read           | no            |                 |                |
 * | book:create/update  | yes           | admin or editor |                |
 * | book:delete         | yes           | admin           |                |
 * | reservation:create  | yes           |                 |                |
 * | reservation:read    | yes           |                 | owner or admin |
 * | reservation:cancel  | yes           |                 | owner or admin |
 * | reservation:list    | yes           |                 | scoped         |
 */

import { Roles } from './constants';
import type { Role } from './constants';
import { ErrorMessages } from './errors/error-messages';
import { ForbiddenError, UnauthenticatedError } from './errors/api-errors';
import { fail, ok } from './errors/result';
import type { Result } from './errors/result';
import type { Identity, Principal } from './identity';
import type { ReservationFilter } from './storage/types';

// =============================================================================
// Operations
// =============================================================================

export type PublicOperation = 'book:read';

export type GatedOperation =
    | 'book:create'
    | 'book:update'
    | 'book:delete'
    | 'reservation:create'
    | 'reservation:read'
    | 'reservation:cancel'
    | 'reservation:list';

export type Operation = PublicOperation | GatedOperation;

interface Gate {
    /** Any one of these roles suffices. Omitted means any authenticated caller. */
    roles?: readonly Role[];
    /** Checked only when the resource is supplied */
    ownerOrAdmin?: boolean;
}

const GATES: Readonly<Record<GatedOperation, Gate>> = {
    'book:create': { roles: [Roles.ADMIN, Roles.EDITOR] },
    'book:update': { roles: [Roles.ADMIN, Roles.EDITOR] },
    'book:delete': { roles: [Roles.ADMIN] },
    'reservation:create': {},
    'reservation:read': { ownerOrAdmin: true },
    'reservation:cancel': { ownerOrAdmin: true },
    'reservation:list': {},
};

export interface OwnedResource {
    ownerId: string;
}

export type AccessError = UnauthenticatedError | ForbiddenError;

// =============================================================================
// Predicates
// =============================================================================

export function requireAuthenticated(identity: Identity): Result<Principal, UnauthenticatedError> {
    if (identity.status !== 'authenticated') {
        return fail(new UnauthenticatedError());
    }
    return ok(identity.principal);
}

/**
 * Passes iff the principal holds at least one of the allowed roles.
 */
export function requireAnyRole(principal: Principal, allowed: Iterable<string>): Result<void, ForbiddenError> {
    for (const role of allowed) {
        if (principal.roles.has(role)) {
            return ok(undefined);
        }
    }
    return fail(new ForbiddenError(ErrorMessages.MISSING_ROLE, 'missing_role'));
}

export function isAdmin(principal: Principal): boolean {
    return principal.roles.has(Roles.ADMIN);
}

export function requireOwnerOrAdmin(principal: Principal, ownerId: string): Result<void, ForbiddenError> {
    if (isAdmin(principal) || principal.id === ownerId) {
        return ok(undefined);
    }
    return fail(new ForbiddenError(ErrorMessages.NOT_OWNER, 'not_owner'));
}

// =============================================================================
// Composed Gate
// =============================================================================

/**
 * Decide whether the caller may perform an operation.
 *
 * Ownership-gated operations are authorized in two steps: once before the
 * resource is fetched (authentication and roles), then again with the
 * fetched resource.
 *
 * @example
 * ```typescript
 * const access = authorize(identity, 'reservation:cancel');
 * if (!access.ok) return errorResponse(access.error);
 * const reservation = await reservations.getReservation(id);
 * if (!reservation) return notFound(...);
 * const owner = authorize(identity, 'reservation:cancel', { ownerId: reservation.userId });
 * ```
 */
export function authorize(identity: Identity, operation: PublicOperation): Result<Principal | null, never>;
export function authorize(
    identity: Identity,
    operation: GatedOperation,
    resource?: OwnedResource
): Result<Principal, AccessError>;
export function authorize(
    identity: Identity,
    operation: Operation,
    resource?: OwnedResource
): Result<Principal | null, AccessError> {
    if (operation === 'book:read') {
        return ok(identity.status === 'authenticated' ? identity.principal : null);
    }

    const authenticated = requireAuthenticated(identity);
    if (!authenticated.ok) {
        return authenticated;
    }
    const principal = authenticated.value;
    const gate = GATES[operation];

    if (gate.roles) {
        const roleCheck = requireAnyRole(principal, gate.roles);
        if (!roleCheck.ok) {
            return roleCheck;
        }
    }

    if (gate.ownerOrAdmin && resource) {
        const ownerCheck = requireOwnerOrAdmin(principal, resource.ownerId);
        if (!ownerCheck.ok) {
            return ownerCheck;
        }
    }

    return ok(principal);
}

/**
 * Compute the listing filter. Admins may ask for one user's reservations
 * or, with no user_id, everyone's. Everyone else sees only their own,
 * whatever they asked for.
 */
export function reservationListScope(principal: Principal, requestedUserId?: string): ReservationFilter {
    if (isAdmin(principal)) {
        return requestedUserId ? { userId: requestedUserId } : {};
    }
    return { userId: principal.id };
}
