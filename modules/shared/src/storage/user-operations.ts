/**
 * Book Reservations - User Storage Operations
 *
 * DynamoDB operations for user entities.
 *
 * Key Pattern:
 *   PK: USER#<id>
 *   SK: PROFILE
 *   GSI1PK: SUBJECT#<external_subject_id>
 *   GSI1SK: USER
 *
 * Each provider subject is claimed by a SUBJECT#<sub> link item written in
 * the same transaction as the user, so two first sign-ins for one subject
 * cannot both provision an account.
 *
 * @module storage/user-operations
 */

import { DynamoDBDocumentClient, GetCommand, TransactWriteCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import type { SubjectLinkItem, UserItem, UserProfile } from '../../../shared_types/schema';
import { DEFAULT_ROLES, KeyPrefixes } from '../constants';
import { isSubjectLinkItem, isUserItem } from '../type-guards';
import { isConditionalCheckFailed, transactionConditionFailed, withStorageFaults } from './faults';
import type { ProviderProfile, UpsertUserResult } from './types';

/**
 * Retrieve a user by internal id.
 *
 * @returns UserItem or null if not found
 */
export async function getUser(
    client: DynamoDBDocumentClient,
    tableName: string,
    userId: string
): Promise<UserItem | null> {
    const result = await withStorageFaults(async () => {
        return client.send(
            new GetCommand({
                TableName: tableName,
                Key: {
                    PK: `${KeyPrefixes.USER}${userId}`,
                    SK: 'PROFILE',
                },
                ConsistentRead: true,
            })
        );
    });

    if (!result.Item || !isUserItem(result.Item)) {
        return null;
    }

    return result.Item;
}

async function getSubjectLink(
    client: DynamoDBDocumentClient,
    tableName: string,
    subject: string
): Promise<SubjectLinkItem | null> {
    const result = await withStorageFaults(async () => {
        return client.send(
            new GetCommand({
                TableName: tableName,
                Key: {
                    PK: `${KeyPrefixes.SUBJECT}${subject}`,
                    SK: 'METADATA',
                },
                ConsistentRead: true,
            })
        );
    });

    if (!result.Item || !isSubjectLinkItem(result.Item)) {
        return null;
    }

    return result.Item;
}

/**
 * Find a user by the provider's subject identifier through its link item.
 */
export async function getUserBySubject(
    client: DynamoDBDocumentClient,
    tableName: string,
    subject: string
): Promise<UserItem | null> {
    const link = await getSubjectLink(client, tableName, subject);
    return link ? getUser(client, tableName, link.userId) : null;
}

/**
 * Create or refresh the user linked to a provider identity.
 *
 * Known subjects get their email, profile and lastLoginAt refreshed; roles
 * are left alone. Unknown subjects are provisioned with the default roles.
 * When a concurrent sign-in claims the subject first, its user is
 * refreshed instead.
 */
export async function upsertUserFromProfile(
    client: DynamoDBDocumentClient,
    tableName: string,
    profile: ProviderProfile,
    newUserId: string
): Promise<UpsertUserResult> {
    const now = new Date().toISOString();
    const claims: UserProfile = {
        displayName: profile.displayName,
        givenName: profile.givenName,
        familyName: profile.familyName,
    };

    const link = await getSubjectLink(client, tableName, profile.subject);
    if (link) {
        const refreshed = await refreshLinkedUser(client, tableName, link, claims, profile.email, now);
        if (refreshed) {
            return { user: refreshed, created: false };
        }
        // Link left behind by a removed user; claim it for the new one
    }

    const user: UserItem = {
        PK: `USER#${newUserId}`,
        SK: 'PROFILE',
        GSI1PK: `${KeyPrefixes.SUBJECT}${profile.subject}`,
        GSI1SK: 'USER',
        entityType: 'USER',
        id: newUserId,
        externalSubjectId: profile.subject,
        email: profile.email,
        profile: claims,
        roles: [...DEFAULT_ROLES],
        lastLoginAt: now,
        createdAt: now,
        updatedAt: now,
    };
    const newLink: SubjectLinkItem = {
        PK: `SUBJECT#${profile.subject}`,
        SK: 'METADATA',
        GSI1PK: `${KeyPrefixes.USER}${newUserId}`,
        GSI1SK: `${KeyPrefixes.SUBJECT}${profile.subject}`,
        entityType: 'SUBJECT_LINK',
        subject: profile.subject,
        userId: newUserId,
        createdAt: now,
        updatedAt: now,
    };

    try {
        await withStorageFaults(async () => {
            return client.send(
                new TransactWriteCommand({
                    TransactItems: [
                        {
                            Put: {
                                TableName: tableName,
                                Item: user,
                                ConditionExpression: 'attribute_not_exists(PK)',
                            },
                        },
                        {
                            Put: {
                                TableName: tableName,
                                Item: newLink,
                                ConditionExpression: link
                                    ? 'attribute_not_exists(PK) OR userId = :staleUserId'
                                    : 'attribute_not_exists(PK)',
                                ...(link ? { ExpressionAttributeValues: { ':staleUserId': link.userId } } : {}),
                            },
                        },
                    ],
                })
            );
        });
    } catch (error) {
        if (!transactionConditionFailed(error, 1)) {
            throw error;
        }

        // Another sign-in claimed the subject first
        const claimed = await getSubjectLink(client, tableName, profile.subject);
        const refreshed = claimed
            ? await refreshLinkedUser(client, tableName, claimed, claims, profile.email, now)
            : null;
        if (!refreshed) {
            throw error;
        }
        return { user: refreshed, created: false };
    }

    return { user, created: true };
}

async function refreshLinkedUser(
    client: DynamoDBDocumentClient,
    tableName: string,
    link: SubjectLinkItem,
    claims: UserProfile,
    email: string | undefined,
    now: string
): Promise<UserItem | null> {
    const existing = await getUser(client, tableName, link.userId);
    return existing ? refreshUser(client, tableName, existing, claims, email, now) : null;
}

async function refreshUser(
    client: DynamoDBDocumentClient,
    tableName: string,
    existing: UserItem,
    claims: UserProfile,
    email: string | undefined,
    now: string
): Promise<UserItem | null> {
    try {
        const result = await withStorageFaults(async () => {
            return client.send(
                new UpdateCommand({
                    TableName: tableName,
                    Key: { PK: existing.PK, SK: 'PROFILE' },
                    UpdateExpression: email
                        ? 'SET profile = :profile, lastLoginAt = :now, updatedAt = :now, email = :email'
                        : 'SET profile = :profile, lastLoginAt = :now, updatedAt = :now REMOVE email',
                    ConditionExpression: 'attribute_exists(PK)',
                    ExpressionAttributeValues: {
                        ':profile': claims,
                        ':now': now,
                        ...(email ? { ':email': email } : {}),
                    },
                    ReturnValues: 'ALL_NEW',
                })
            );
        });

        const updated = result.Attributes;
        return updated && isUserItem(updated) ? updated : null;
    } catch (error) {
        if (isConditionalCheckFailed(error)) {
            return null;
        }
        throw error;
    }
}
