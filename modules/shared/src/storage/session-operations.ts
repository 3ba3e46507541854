/**
 * Book Reservations - Session Storage Operations
 *
 * DynamoDB operations for browser sessions and pending login states.
 *
 * Key Patterns:
 *   Session:     PK=SESSION#<id>        SK=METADATA  GSI1PK=USER#<user_id>  GSI1SK=SESSION#<timestamp>
 *   Login state: PK=LOGIN_STATE#<state> SK=METADATA  GSI1PK=LOGIN_STATES    GSI1SK=<timestamp>
 *
 * Lifecycle:
 *   1. /auth/login saves a login state (state, nonce, PKCE verifier)
 *   2. /auth/callback consumes it exactly once and creates a session
 *   3. Every request resolves the session cookie through getSession
 *   4. /auth/logout deletes the session; TTL removes abandoned ones
 *
 * DynamoDB TTL deletion lags by up to 48 hours, so reads also compare the
 * ttl attribute against the clock.
 *
 * @module storage/session-operations
 */

import {
    DynamoDBDocumentClient,
    DeleteCommand,
    GetCommand,
    PutCommand,
} from '@aws-sdk/lib-dynamodb';
import type { LoginStateItem, SessionItem } from '../../../shared_types/schema';
import { KeyPrefixes, LOGIN_STATES_PARTITION } from '../constants';
import { isLoginStateItem, isSessionItem } from '../type-guards';
import { isConditionalCheckFailed, withStorageFaults } from './faults';
import type { NewLoginState, NewSession } from './types';

function epochSeconds(): number {
    return Math.floor(Date.now() / 1000);
}

// =============================================================================
// Sessions
// =============================================================================

/**
 * Retrieve a session by its id.
 *
 * @returns SessionItem, or null if not found or past its ttl
 */
export async function getSession(
    client: DynamoDBDocumentClient,
    tableName: string,
    sessionId: string
): Promise<SessionItem | null> {
    const result = await withStorageFaults(async () => {
        return client.send(
            new GetCommand({
                TableName: tableName,
                Key: {
                    PK: `${KeyPrefixes.SESSION}${sessionId}`,
                    SK: 'METADATA',
                },
            })
        );
    });

    if (!result.Item || !isSessionItem(result.Item)) {
        return null;
    }

    if (result.Item.ttl <= epochSeconds()) {
        return null;
    }

    return result.Item;
}

export async function createSession(
    client: DynamoDBDocumentClient,
    tableName: string,
    session: NewSession
): Promise<SessionItem> {
    const now = new Date().toISOString();
    const item: SessionItem = {
        PK: `SESSION#${session.sessionId}`,
        SK: 'METADATA',
        GSI1PK: `${KeyPrefixes.USER}${session.userId}`,
        GSI1SK: `${KeyPrefixes.SESSION}${now}`,
        entityType: 'SESSION',
        sessionId: session.sessionId,
        userId: session.userId,
        ttl: epochSeconds() + session.ttlSeconds,
        userAgent: session.userAgent,
        ipAddress: session.ipAddress,
        createdAt: now,
        updatedAt: now,
    };

    await withStorageFaults(async () => {
        return client.send(
            new PutCommand({
                TableName: tableName,
                Item: item,
                ConditionExpression: 'attribute_not_exists(PK)',
            })
        );
    });

    return item;
}

export async function deleteSession(
    client: DynamoDBDocumentClient,
    tableName: string,
    sessionId: string
): Promise<void> {
    await withStorageFaults(async () => {
        return client.send(
            new DeleteCommand({
                TableName: tableName,
                Key: {
                    PK: `${KeyPrefixes.SESSION}${sessionId}`,
                    SK: 'METADATA',
                },
            })
        );
    });
}

// =============================================================================
// Login States
// =============================================================================

export async function saveLoginState(
    client: DynamoDBDocumentClient,
    tableName: string,
    loginState: NewLoginState
): Promise<LoginStateItem> {
    const now = new Date().toISOString();
    const item: LoginStateItem = {
        PK: `LOGIN_STATE#${loginState.state}`,
        SK: 'METADATA',
        GSI1PK: LOGIN_STATES_PARTITION,
        GSI1SK: now,
        entityType: 'LOGIN_STATE',
        state: loginState.state,
        nonce: loginState.nonce,
        codeVerifier: loginState.codeVerifier,
        ttl: epochSeconds() + loginState.ttlSeconds,
        createdAt: now,
        updatedAt: now,
    };

    await withStorageFaults(async () => {
        return client.send(
            new PutCommand({
                TableName: tableName,
                Item: item,
                ConditionExpression: 'attribute_not_exists(PK)',
            })
        );
    });

    return item;
}

/**
 * Delete a login state and return what it held.
 * The conditional delete makes the state single-use under concurrent
 * callbacks, and rejects states past their ttl.
 *
 * @returns LoginStateItem, or null if absent, expired or already consumed
 */
export async function consumeLoginState(
    client: DynamoDBDocumentClient,
    tableName: string,
    state: string
): Promise<LoginStateItem | null> {
    try {
        const result = await withStorageFaults(async () => {
            return client.send(
                new DeleteCommand({
                    TableName: tableName,
                    Key: {
                        PK: `${KeyPrefixes.LOGIN_STATE}${state}`,
                        SK: 'METADATA',
                    },
                    ConditionExpression: 'attribute_exists(PK) AND #ttl > :now',
                    ExpressionAttributeNames: { '#ttl': 'ttl' },
                    ExpressionAttributeValues: { ':now': epochSeconds() },
                    ReturnValues: 'ALL_OLD',
                })
            );
        });

        const consumed = result.Attributes;
        return consumed && isLoginStateItem(consumed) ? consumed : null;
    } catch (error) {
        if (isConditionalCheckFailed(error)) {
            return null;
        }
        throw error;
    }
}
