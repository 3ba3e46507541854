/**
 * Book Reservations - Base DynamoDB Schema Types
 *
 * Foundation interfaces for Single Table Design.
 * All entity types extend BaseItem for consistent key structure.
 *
 * Key Design:
 * - PK (Partition Key): Entity-specific prefix pattern (e.g., BOOK#<id>)
 * - SK (Sort Key): Entity type identifier (PROFILE, METADATA)
 * - GSI1: Secondary access patterns (user by subject, reservations by owner)
 *
 * TTL Strategy:
 * - Short-lived entities (sessions, login states): TTL set to expiration time
 * - Long-lived entities (users, books, reservations): No TTL
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

// =============================================================================
// Key Pattern Prefixes (Strict Typing)
// =============================================================================

/** Partition Key prefixes for each entity type */
export type PKPrefix =
    | `USER#${string}`
    | `SUBJECT#${string}`
    | `BOOK#${string}`
    | `RESERVATION#${string}`
    | `SESSION#${string}`
    | `LOGIN_STATE#${string}`;

/** Sort Key values */
export type SKValue = 'PROFILE' | 'METADATA';

// =============================================================================
// Entity Type Discriminators
// =============================================================================

export type EntityType =
    | 'USER'
    | 'SUBJECT_LINK'
    | 'BOOK'
    | 'RESERVATION'
    | 'SESSION'
    | 'LOGIN_STATE';

// =============================================================================
// Base Item Interface
// =============================================================================

/**
 * Base interface for all DynamoDB items in the Single Table Design.
 */
export interface BaseItem {
    /** Partition Key - Entity-specific prefix pattern */
    PK: string;
    /** Sort Key - Entity type identifier */
    SK: SKValue;
    /** GSI1 Partition Key - For reverse lookups and queries */
    GSI1PK: string;
    /** GSI1 Sort Key - For range queries on GSI1 */
    GSI1SK: string;
    /** TTL for automatic expiration (Unix epoch seconds). Optional for long-lived entities. */
    ttl?: number;
    /** Entity type discriminator for type guards */
    entityType: EntityType;
    /** ISO 8601 creation timestamp */
    createdAt: string;
    /** ISO 8601 last update timestamp */
    updatedAt: string;
}
