/**
 * Book Catalogue - Lambda Handler
 *
 * Endpoints:
 * - POST /books - Create book (admin, editor)
 * - GET /books - List active books, paginated (public)
 * - GET /books/:id - Read book (public)
 * - PUT /books/:id - Replace book fields (admin, editor)
 * - DELETE /books/:id - Soft delete book (admin)
 *
 * Unauthenticated callers of gated endpoints are redirected to the login
 * route; callers without the role get 403.
 *
 * @module catalog/books
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    createLogger,
    createRequestContext,
    createStorageAdapter,
    getBaseEnvConfig,
    handleUnexpected,
    methodNotAllowed,
    respond,
} from '@book-reservations/shared';
import type { RequestContext, StructuredResponse } from '@book-reservations/shared';
import type { BooksDeps } from './types';
import { handleCreateBook } from './create';
import { handleListBooks, handleReadBook } from './read';
import { handleUpdateBook } from './update';
import { handleDeleteBook } from './delete';

export type { BookResponse, BookListResponse, BookLinksResponse, BooksDeps } from './types';
export { bookLinks, toBookResponse, toBookListResponse } from './mapper';
export { createBook, getBook, listBooks, updateBook, deleteBook } from './lifecycle';
export type { BookPage } from './lifecycle';

// =============================================================================
// Dependencies (Singleton)
// =============================================================================

let defaultDeps: BooksDeps | null = null;

/**
 * Build the production dependencies once per container.
 *
 * @throws Error if TABLE_NAME or SESSION_TTL_SECONDS is missing or malformed
 */
function getDefaultDeps(): BooksDeps {
    if (!defaultDeps) {
        const storage = createStorageAdapter();
        defaultDeps = {
            books: storage,
            users: storage,
            sessions: storage,
            config: getBaseEnvConfig(),
        };
    }
    return defaultDeps;
}

// =============================================================================
// Routing
// =============================================================================

const COLLECTION_METHODS = ['GET', 'POST'] as const;
const ITEM_METHODS = ['GET', 'PUT', 'DELETE'] as const;

function route(
    event: APIGatewayProxyEventV2,
    ctx: RequestContext,
    deps: BooksDeps
): Promise<StructuredResponse> | StructuredResponse {
    const method = event.requestContext.http.method;
    const bookId = event.pathParameters?.id;

    if (!bookId) {
        switch (method) {
            case 'GET':
                return handleListBooks(event, ctx, deps);
            case 'POST':
                return handleCreateBook(event, ctx, deps);
            default:
                return respond(ctx, methodNotAllowed(method, COLLECTION_METHODS));
        }
    }

    switch (method) {
        case 'GET':
            return handleReadBook(bookId, ctx, deps);
        case 'PUT':
            return handleUpdateBook(bookId, event, ctx, deps);
        case 'DELETE':
            return handleDeleteBook(bookId, ctx, deps);
        default:
            return respond(ctx, methodNotAllowed(method, ITEM_METHODS));
    }
}

// =============================================================================
// Lambda Handler
// =============================================================================

/**
 * Build the handler over a dependency source. Tests pass in-memory stores;
 * production resolves DynamoDB and environment configuration lazily.
 */
export function createBooksHandler(
    resolveDeps: () => BooksDeps = getDefaultDeps
): (event: APIGatewayProxyEventV2, context: Context) => Promise<StructuredResponse> {
    return async (event, context) => {
        const logger = createLogger(event, context);
        let cookies: string[] = [];

        try {
            const deps = resolveDeps();
            const ctx = await createRequestContext(event, context, {
                users: deps.users,
                sessions: deps.sessions,
                session: deps.config.session,
            });
            cookies = ctx.cookies;

            logger.info('Books request received', {
                method: event.requestContext.http.method,
                path: event.requestContext.http.path,
            });

            return await route(event, ctx, deps);
        } catch (err) {
            return handleUnexpected(logger, err, cookies);
        }
    };
}

export const handler = createBooksHandler();
