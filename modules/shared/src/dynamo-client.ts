/**
 * Book Reservations - DynamoDB Storage Adapter
 *
 * Implements the Single Table Design pattern for all catalogue entities.
 * Uses typed interfaces from shared_types/schema.d.ts.
 *
 * Key Patterns:
 *   - User:         PK=USER#<id>             SK=PROFILE
 *   - Book:         PK=BOOK#<id>             SK=METADATA
 *   - Reservation:  PK=RESERVATION#<id>      SK=METADATA
 *   - Session:      PK=SESSION#<id>          SK=METADATA
 *   - LoginState:   PK=LOGIN_STATE#<state>   SK=METADATA
 *
 * GSI1 Patterns:
 *   - User by subject:        GSI1PK=SUBJECT#<sub>   GSI1SK=USER
 *   - Books by creation:      GSI1PK=BOOKS           GSI1SK=BOOK#<timestamp>#<id>
 *   - Reservations by owner:  GSI1PK=USER#<id>       GSI1SK=RESERVATION#<timestamp>#<id>
 *   - Sessions by owner:      GSI1PK=USER#<id>       GSI1SK=SESSION#<timestamp>
 *
 * Configuration:
 *   - TABLE_NAME: Injected via environment variable
 *   - DYNAMODB_ENDPOINT: Optional, for DynamoDB Local
 *   - Region: Uses AWS SDK default (Lambda execution role region)
 *
 * One Document client is created per table and reused across warm
 * invocations.
 *
 * @see https://www.alexdebrie.com/posts/dynamodb-single-table/
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';

import type {
    BookItem,
    BookLinks,
    LoginStateItem,
    ReservationItem,
    SessionItem,
    UserItem,
} from '../../shared_types/schema';

import type {
    BookFields,
    BookStore,
    NewBook,
    NewLoginState,
    NewReservation,
    NewSession,
    ProviderProfile,
    ReservationFilter,
    ReservationStore,
    SessionStore,
    StorageAdapterConfig,
    UpsertUserResult,
    UserStore,
} from './storage/types';
import * as userOps from './storage/user-operations';
import * as bookOps from './storage/book-operations';
import * as reservationOps from './storage/reservation-operations';
import * as sessionOps from './storage/session-operations';

export type { StorageAdapterConfig } from './storage/types';

// =============================================================================
// Document Client
// =============================================================================

/**
 * Build a Document client with the marshalling options every operation
 * relies on (undefined attributes are dropped, numbers come back native).
 */
export function createDocumentClient(config: Omit<StorageAdapterConfig, 'tableName'> = {}): DynamoDBDocumentClient {
    const dynamoClient = new DynamoDBClient({
        region: config.region,
        endpoint: config.endpoint,
        // Calls are made once; see storage/faults.ts
        maxAttempts: 1,
    });

    return DynamoDBDocumentClient.from(dynamoClient, {
        marshallOptions: {
            removeUndefinedValues: true,
            convertClassInstanceToMap: true,
        },
        unmarshallOptions: {
            wrapNumbers: false,
        },
    });
}

// =============================================================================
// Storage Adapter Class
// =============================================================================

/**
 * StorageAdapter provides typed access to the DynamoDB Single Table and
 * implements every store interface the handlers depend on.
 */
export class StorageAdapter implements UserStore, BookStore, ReservationStore, SessionStore {
    private readonly client: DynamoDBDocumentClient;
    private readonly tableName: string;

    constructor(config: StorageAdapterConfig, client?: DynamoDBDocumentClient) {
        this.tableName = config.tableName;
        this.client = client ?? createDocumentClient(config);
    }

    // -------------------------------------------------------------------------
    // User Operations
    // -------------------------------------------------------------------------

    async getUser(userId: string): Promise<UserItem | null> {
        return userOps.getUser(this.client, this.tableName, userId);
    }

    async getUserBySubject(subject: string): Promise<UserItem | null> {
        return userOps.getUserBySubject(this.client, this.tableName, subject);
    }

    async upsertUserFromProfile(profile: ProviderProfile, newUserId: string): Promise<UpsertUserResult> {
        return userOps.upsertUserFromProfile(this.client, this.tableName, profile, newUserId);
    }

    // -------------------------------------------------------------------------
    // Book Operations
    // -------------------------------------------------------------------------

    async createBook(book: NewBook): Promise<BookItem> {
        return bookOps.createBook(this.client, this.tableName, book);
    }

    async getActiveBook(bookId: string): Promise<BookItem | null> {
        return bookOps.getActiveBook(this.client, this.tableName, bookId);
    }

    async listActiveBooks(): Promise<BookItem[]> {
        return bookOps.listActiveBooks(this.client, this.tableName);
    }

    async updateActiveBook(bookId: string, fields: BookFields, links: BookLinks): Promise<BookItem | null> {
        return bookOps.updateActiveBook(this.client, this.tableName, bookId, fields, links);
    }

    async softDeleteBook(bookId: string, deletedAt: string): Promise<BookItem | null> {
        return bookOps.softDeleteBook(this.client, this.tableName, bookId, deletedAt);
    }

    // -------------------------------------------------------------------------
    // Reservation Operations
    // -------------------------------------------------------------------------

    async createReservation(reservation: NewReservation): Promise<ReservationItem | null> {
        return reservationOps.createReservation(this.client, this.tableName, reservation);
    }

    async getReservation(reservationId: string): Promise<ReservationItem | null> {
        return reservationOps.getReservation(this.client, this.tableName, reservationId);
    }

    async listReservations(filter: ReservationFilter): Promise<ReservationItem[]> {
        return reservationOps.listReservations(this.client, this.tableName, filter);
    }

    async cancelReservation(reservationId: string, cancelledAt: string): Promise<ReservationItem | null> {
        return reservationOps.cancelReservation(this.client, this.tableName, reservationId, cancelledAt);
    }

    // -------------------------------------------------------------------------
    // Session Operations
    // -------------------------------------------------------------------------

    async getSession(sessionId: string): Promise<SessionItem | null> {
        return sessionOps.getSession(this.client, this.tableName, sessionId);
    }

    async createSession(session: NewSession): Promise<SessionItem> {
        return sessionOps.createSession(this.client, this.tableName, session);
    }

    async deleteSession(sessionId: string): Promise<void> {
        return sessionOps.deleteSession(this.client, this.tableName, sessionId);
    }

    async saveLoginState(loginState: NewLoginState): Promise<LoginStateItem> {
        return sessionOps.saveLoginState(this.client, this.tableName, loginState);
    }

    async consumeLoginState(state: string): Promise<LoginStateItem | null> {
        return sessionOps.consumeLoginState(this.client, this.tableName, state);
    }
}

// =============================================================================
// Factory Function
// =============================================================================

const adapters = new Map<string, StorageAdapter>();

/**
 * Get the StorageAdapter for the configured table.
 *
 * Reads TABLE_NAME (and DYNAMODB_ENDPOINT, if set) from the environment.
 * The adapter and its connection pool are created once per table and
 * shared by every handler in the same Lambda container.
 *
 * @throws Error if TABLE_NAME environment variable is not set
 *
 * @example
 * ```typescript
 * const storage = createStorageAdapter();
 * const book = await storage.getActiveBook(bookId);
 * ```
 */
export function createStorageAdapter(env: NodeJS.ProcessEnv = process.env): StorageAdapter {
    const tableName = env.TABLE_NAME;

    if (!tableName) {
        throw new Error(
            'TABLE_NAME environment variable is required. ' +
            'Ensure the Lambda function is configured with the DynamoDB table name.'
        );
    }

    const existing = adapters.get(tableName);
    if (existing) {
        return existing;
    }

    const adapter = new StorageAdapter({ tableName, endpoint: env.DYNAMODB_ENDPOINT });
    adapters.set(tableName, adapter);
    return adapter;
}
