/**
 * Book Reservations - User Entity Types
 *
 * Accounts linked to the external identity provider.
 *
 * Key Pattern:
 *   PK: USER#<id>
 *   SK: PROFILE
 *   GSI1PK: SUBJECT#<external_subject_id>
 *   GSI1SK: USER
 *
 * Subject links claim a provider subject for exactly one user:
 *   PK: SUBJECT#<external_subject_id>
 *   SK: METADATA
 *   GSI1PK: USER#<id>
 *   GSI1SK: SUBJECT#<external_subject_id>
 */

import type { BaseItem } from './base';

// =============================================================================
// User Profile
// =============================================================================

/** Name claims captured from the identity provider at sign-in. */
export interface UserProfile {
    /** Full display name (OIDC `name`) */
    displayName?: string;
    /** Given/first name (OIDC `given_name`) */
    givenName?: string;
    /** Family/last name (OIDC `family_name`) */
    familyName?: string;
}

export type UserRole = 'viewer' | 'editor' | 'admin';

// =============================================================================
// User Entity
// =============================================================================

export interface UserItem extends BaseItem {
    /** PK pattern: USER#<id> */
    PK: `USER#${string}`;
    SK: 'PROFILE';
    entityType: 'USER';

    /** Internal user identifier (UUID) */
    id: string;

    /** Stable subject identifier issued by the identity provider */
    externalSubjectId: string;

    /** Email claim, when the provider released one */
    email?: string;

    profile: UserProfile;

    /** Granted roles. Defaults to ['viewer'] on first sign-in. */
    roles: string[];

    /** ISO 8601 timestamp of the most recent sign-in */
    lastLoginAt: string;
}

// =============================================================================
// Subject Link
// =============================================================================

/** Written together with the user on first sign-in; its key makes the subject unique. */
export interface SubjectLinkItem extends BaseItem {
    PK: `SUBJECT#${string}`;
    SK: 'METADATA';
    entityType: 'SUBJECT_LINK';

    subject: string;
    userId: string;
}
