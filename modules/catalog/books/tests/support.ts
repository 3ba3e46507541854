/**
 * Shared setup for the book catalogue tests.
 */

import { InMemoryStorage, buildEvent, lambdaContext } from '@book-reservations/shared/testing';
import type { SeedUser, TestEventOptions } from '@book-reservations/shared/testing';
import type { StructuredResponse } from '@book-reservations/shared';
import type { SessionCookieConfig } from '../../../shared_types/schema';
import { bookLinks, createBooksHandler } from '../src/index';
import type { BookListResponse, BookResponse } from '../src/index';

export const SESSION_CONFIG: SessionCookieConfig = { name: '__Host-sid', ttlSeconds: 3600 };

export const EDITOR: SeedUser = { id: 'editor-1', roles: ['editor'] };
export const ADMIN: SeedUser = { id: 'admin-1', roles: ['admin'] };
export const VIEWER: SeedUser = { id: 'viewer-1', roles: ['viewer'] };

export function setup() {
  const storage = new InMemoryStorage();
  const handler = createBooksHandler(() => ({
    books: storage,
    users: storage,
    sessions: storage,
    config: { tableName: 'test-table', session: SESSION_CONFIG },
  }));

  const invoke = (options: TestEventOptions): Promise<StructuredResponse> =>
    handler(buildEvent(options), lambdaContext());

  const signIn = async (seed: SeedUser): Promise<string[]> => {
    const sessionId = await storage.signIn(seed);
    return [`${SESSION_CONFIG.name}=${sessionId}`];
  };

  const seedBook = async (id: string, title = `Title ${id}`) =>
    storage.createBook({
      id,
      title,
      author: `Author ${id}`,
      synopsis: `Synopsis ${id}`,
      links: bookLinks(id),
    });

  return { storage, handler, invoke, signIn, seedBook };
}

export function readBook(response: StructuredResponse): BookResponse {
  const book: BookResponse = JSON.parse(response.body ?? '');
  return book;
}

export function readBookList(response: StructuredResponse): BookListResponse {
  const list: BookListResponse = JSON.parse(response.body ?? '');
  return list;
}
