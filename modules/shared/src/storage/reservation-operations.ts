/**
 * Book Reservations - Reservation Storage Operations
 *
 * Key Pattern:
 *   PK: RESERVATION#<id>
 *   SK: METADATA
 *   GSI1PK: USER#<user_id>
 *   GSI1SK: RESERVATION#<reserved_at>#<id>
 *
 * Lifecycle:
 *   1. Created in state reserved, in one transaction with a check that the
 *      book is still active
 *   2. Cancelled once, by a conditional update (reserved -> cancelled)
 *
 * @module storage/reservation-operations
 */

import {
    DynamoDBDocumentClient,
    GetCommand,
    QueryCommand,
    ScanCommand,
    TransactWriteCommand,
    UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import type { ReservationItem } from '../../../shared_types/schema';
import { BookStates, GSI1_INDEX_NAME, KeyPrefixes, ReservationStates } from '../constants';
import { isReservationItem } from '../type-guards';
import { ACTIVE_CONDITION } from './book-operations';
import { isConditionalCheckFailed, transactionConditionFailed, withStorageFaults } from './faults';
import type { NewReservation, ReservationFilter } from './types';

/**
 * Save a new reservation in state reserved.
 *
 * The write is a transaction with a condition check on the book, so a book
 * deleted after the caller looked it up cannot gain a reservation.
 *
 * @returns The reservation, or null if the book is absent or deleted
 */
export async function createReservation(
    client: DynamoDBDocumentClient,
    tableName: string,
    reservation: NewReservation
): Promise<ReservationItem | null> {
    const now = new Date().toISOString();
    const item: ReservationItem = {
        PK: `RESERVATION#${reservation.id}`,
        SK: 'METADATA',
        GSI1PK: `${KeyPrefixes.USER}${reservation.userId}`,
        GSI1SK: `${KeyPrefixes.RESERVATION}${reservation.reservedAt}#${reservation.id}`,
        entityType: 'RESERVATION',
        id: reservation.id,
        bookId: reservation.bookId,
        userId: reservation.userId,
        forenames: reservation.forenames,
        surname: reservation.surname,
        state: ReservationStates.RESERVED,
        reservedAt: reservation.reservedAt,
        createdAt: now,
        updatedAt: now,
    };

    try {
        await withStorageFaults(async () => {
            return client.send(
                new TransactWriteCommand({
                    TransactItems: [
                        {
                            ConditionCheck: {
                                TableName: tableName,
                                Key: {
                                    PK: `${KeyPrefixes.BOOK}${reservation.bookId}`,
                                    SK: 'METADATA',
                                },
                                ConditionExpression: ACTIVE_CONDITION,
                                ExpressionAttributeNames: { '#state': 'state' },
                                ExpressionAttributeValues: { ':active': BookStates.ACTIVE },
                            },
                        },
                        {
                            Put: {
                                TableName: tableName,
                                Item: item,
                                ConditionExpression: 'attribute_not_exists(PK)',
                            },
                        },
                    ],
                })
            );
        });
    } catch (error) {
        // Book absent or deleted
        if (transactionConditionFailed(error, 0)) {
            return null;
        }
        throw error;
    }

    return item;
}

/**
 * Retrieve a reservation in any state.
 */
export async function getReservation(
    client: DynamoDBDocumentClient,
    tableName: string,
    reservationId: string
): Promise<ReservationItem | null> {
    const result = await withStorageFaults(async () => {
        return client.send(
            new GetCommand({
                TableName: tableName,
                Key: {
                    PK: `${KeyPrefixes.RESERVATION}${reservationId}`,
                    SK: 'METADATA',
                },
                ConsistentRead: true,
            })
        );
    });

    if (!result.Item || !isReservationItem(result.Item)) {
        return null;
    }

    return result.Item;
}

/**
 * List reservations, optionally for one owner.
 *
 * Owner listings query GSI1; the unrestricted listing scans for the
 * RESERVATION entity type. Both are returned ordered by reservedAt.
 */
export async function listReservations(
    client: DynamoDBDocumentClient,
    tableName: string,
    filter: ReservationFilter
): Promise<ReservationItem[]> {
    const reservations: ReservationItem[] = [];
    let lastEvaluatedKey: Record<string, unknown> | undefined;

    do {
        const result = await withStorageFaults(async () => {
            if (filter.userId !== undefined) {
                return client.send(
                    new QueryCommand({
                        TableName: tableName,
                        IndexName: GSI1_INDEX_NAME,
                        KeyConditionExpression: 'GSI1PK = :pk AND begins_with(GSI1SK, :sk)',
                        ExpressionAttributeValues: {
                            ':pk': `${KeyPrefixes.USER}${filter.userId}`,
                            ':sk': KeyPrefixes.RESERVATION,
                        },
                        ScanIndexForward: true,
                        ExclusiveStartKey: lastEvaluatedKey,
                    })
                );
            }

            return client.send(
                new ScanCommand({
                    TableName: tableName,
                    FilterExpression: 'entityType = :type',
                    ExpressionAttributeValues: { ':type': 'RESERVATION' },
                    ExclusiveStartKey: lastEvaluatedKey,
                })
            );
        });

        for (const item of result.Items ?? []) {
            if (isReservationItem(item)) {
                reservations.push(item);
            }
        }

        lastEvaluatedKey = result.LastEvaluatedKey;
    } while (lastEvaluatedKey);

    // Scan order is arbitrary
    return reservations.sort((a, b) => a.reservedAt.localeCompare(b.reservedAt));
}

/**
 * Move a reservation from reserved to cancelled.
 *
 * @returns The cancelled reservation, or null if it is absent or was
 *   already cancelled
 */
export async function cancelReservation(
    client: DynamoDBDocumentClient,
    tableName: string,
    reservationId: string,
    cancelledAt: string
): Promise<ReservationItem | null> {
    try {
        const result = await withStorageFaults(async () => {
            return client.send(
                new UpdateCommand({
                    TableName: tableName,
                    Key: {
                        PK: `${KeyPrefixes.RESERVATION}${reservationId}`,
                        SK: 'METADATA',
                    },
                    UpdateExpression: 'SET #state = :cancelled, cancelledAt = :cancelledAt, updatedAt = :cancelledAt',
                    ConditionExpression: 'attribute_exists(PK) AND #state = :reserved',
                    ExpressionAttributeNames: { '#state': 'state' },
                    ExpressionAttributeValues: {
                        ':cancelled': ReservationStates.CANCELLED,
                        ':reserved': ReservationStates.RESERVED,
                        ':cancelledAt': cancelledAt,
                    },
                    ReturnValues: 'ALL_NEW',
                })
            );
        });

        const cancelled = result.Attributes;
        return cancelled && isReservationItem(cancelled) ? cancelled : null;
    } catch (error) {
        if (isConditionalCheckFailed(error)) {
            return null;
        }
        throw error;
    }
}
