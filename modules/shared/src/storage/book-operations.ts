/**
 * Book Reservations - Book Storage Operations
 *
 * Key Pattern:
 *   PK: BOOK#<id>
 *   SK: METADATA
 *   GSI1PK: BOOKS
 *   GSI1SK: BOOK#<created_at>#<id>
 *
 * Deletes are soft: the item stays with state=deleted and drops out of every
 * read. Updates and deletes are conditional on the book still being active,
 * so a concurrent delete can never be undone by a late update.
 *
 * @module storage/book-operations
 */

import {
    DynamoDBDocumentClient,
    GetCommand,
    PutCommand,
    QueryCommand,
    UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import type { BookItem, BookLinks } from '../../../shared_types/schema';
import { BOOKS_PARTITION, BookStates, GSI1_INDEX_NAME, KeyPrefixes } from '../constants';
import { isActiveBook, isBookItem } from '../type-guards';
import { isConditionalCheckFailed, withStorageFaults } from './faults';
import type { BookFields, NewBook } from './types';

/** Matches items with no state attribute as well as state=active */
export const ACTIVE_CONDITION = 'attribute_exists(PK) AND (attribute_not_exists(#state) OR #state = :active)';

/**
 * Save a new book in state active.
 */
export async function createBook(
    client: DynamoDBDocumentClient,
    tableName: string,
    book: NewBook
): Promise<BookItem> {
    const now = new Date().toISOString();
    const item: BookItem = {
        PK: `BOOK#${book.id}`,
        SK: 'METADATA',
        GSI1PK: BOOKS_PARTITION,
        GSI1SK: `${KeyPrefixes.BOOK}${now}#${book.id}`,
        entityType: 'BOOK',
        id: book.id,
        title: book.title,
        author: book.author,
        synopsis: book.synopsis,
        links: book.links,
        state: BookStates.ACTIVE,
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
 * Retrieve a book by id.
 *
 * @returns BookItem, or null if absent or soft-deleted
 */
export async function getActiveBook(
    client: DynamoDBDocumentClient,
    tableName: string,
    bookId: string
): Promise<BookItem | null> {
    const result = await withStorageFaults(async () => {
        return client.send(
            new GetCommand({
                TableName: tableName,
                Key: {
                    PK: `${KeyPrefixes.BOOK}${bookId}`,
                    SK: 'METADATA',
                },
                ConsistentRead: true,
            })
        );
    });

    if (!result.Item || !isBookItem(result.Item) || !isActiveBook(result.Item)) {
        return null;
    }

    return result.Item;
}

/**
 * List all active books in creation order, following pagination on GSI1.
 */
export async function listActiveBooks(
    client: DynamoDBDocumentClient,
    tableName: string
): Promise<BookItem[]> {
    const books: BookItem[] = [];
    let lastEvaluatedKey: Record<string, unknown> | undefined;

    do {
        const result = await withStorageFaults(async () => {
            return client.send(
                new QueryCommand({
                    TableName: tableName,
                    IndexName: GSI1_INDEX_NAME,
                    KeyConditionExpression: 'GSI1PK = :pk',
                    FilterExpression: 'attribute_not_exists(#state) OR #state = :active',
                    ExpressionAttributeNames: { '#state': 'state' },
                    ExpressionAttributeValues: {
                        ':pk': BOOKS_PARTITION,
                        ':active': BookStates.ACTIVE,
                    },
                    ScanIndexForward: true,
                    ExclusiveStartKey: lastEvaluatedKey,
                })
            );
        });

        for (const item of result.Items ?? []) {
            if (isBookItem(item)) {
                books.push(item);
            }
        }

        lastEvaluatedKey = result.LastEvaluatedKey;
    } while (lastEvaluatedKey);

    return books;
}

/**
 * Replace the editable fields of an active book and rewrite its links.
 *
 * @returns The updated book, or null if the book is absent or deleted
 */
export async function updateActiveBook(
    client: DynamoDBDocumentClient,
    tableName: string,
    bookId: string,
    fields: BookFields,
    links: BookLinks
): Promise<BookItem | null> {
    try {
        const result = await withStorageFaults(async () => {
            return client.send(
                new UpdateCommand({
                    TableName: tableName,
                    Key: {
                        PK: `${KeyPrefixes.BOOK}${bookId}`,
                        SK: 'METADATA',
                    },
                    UpdateExpression:
                        'SET title = :title, author = :author, synopsis = :synopsis, links = :links, updatedAt = :now',
                    ConditionExpression: ACTIVE_CONDITION,
                    ExpressionAttributeNames: { '#state': 'state' },
                    ExpressionAttributeValues: {
                        ':title': fields.title,
                        ':author': fields.author,
                        ':synopsis': fields.synopsis,
                        ':links': links,
                        ':now': new Date().toISOString(),
                        ':active': BookStates.ACTIVE,
                    },
                    ReturnValues: 'ALL_NEW',
                })
            );
        });

        const updated = result.Attributes;
        return updated && isBookItem(updated) ? updated : null;
    } catch (error) {
        // Absent or already deleted
        if (isConditionalCheckFailed(error)) {
            return null;
        }
        throw error;
    }
}

/**
 * Mark an active book as deleted.
 *
 * @returns The deleted book, or null if it was absent or already deleted
 */
export async function softDeleteBook(
    client: DynamoDBDocumentClient,
    tableName: string,
    bookId: string,
    deletedAt: string
): Promise<BookItem | null> {
    try {
        const result = await withStorageFaults(async () => {
            return client.send(
                new UpdateCommand({
                    TableName: tableName,
                    Key: {
                        PK: `${KeyPrefixes.BOOK}${bookId}`,
                        SK: 'METADATA',
                    },
                    UpdateExpression: 'SET #state = :deleted, deletedAt = :deletedAt, updatedAt = :deletedAt',
                    ConditionExpression: ACTIVE_CONDITION,
                    ExpressionAttributeNames: { '#state': 'state' },
                    ExpressionAttributeValues: {
                        ':deleted': BookStates.DELETED,
                        ':deletedAt': deletedAt,
                        ':active': BookStates.ACTIVE,
                    },
                    ReturnValues: 'ALL_NEW',
                })
            );
        });

        const deleted = result.Attributes;
        return deleted && isBookItem(deleted) ? deleted : null;
    } catch (error) {
        if (isConditionalCheckFailed(error)) {
            return null;
        }
        throw error;
    }
}
