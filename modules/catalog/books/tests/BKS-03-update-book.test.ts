/**
 * BKS-03: Update Book
 *
 * PUT /books/{id} replaces title, author and synopsis of an active book.
 * Validation runs before the lookup; deleted books are not found.
 */

import { describe, it, expect } from 'vitest';
import { auditEntries, captureLogs, header, jsonBody } from '@book-reservations/shared/testing';
import { ADMIN, EDITOR, VIEWER, readBook, setup } from './support';

const REVISED = { title: 'Persuasion', author: 'Jane Austen', synopsis: 'Second chances' };

function put(id: string) {
  return { method: 'PUT', path: `/books/${id}`, pathParameters: { id } };
}

describe('BKS-03: Update book', () => {
  it('replaces the editable fields and keeps the id', async () => {
    captureLogs();
    const { invoke, signIn, seedBook, storage } = setup();
    await seedBook('book-1', 'Emma');
    const cookies = await signIn(EDITOR);

    const response = await invoke({ ...put('book-1'), cookies, body: REVISED });

    expect(response.statusCode).toBe(200);
    expect(readBook(response)).toEqual({
      id: 'book-1',
      ...REVISED,
      links: {
        self: 'https://api.example.com/books/book-1',
        reservations: 'https://api.example.com/books/book-1/reservations',
        reviews: 'https://api.example.com/books/book-1/reviews',
      },
    });
    expect(storage.books.get('book-1')).toMatchObject({ ...REVISED, state: 'active' });
  });

  it('regenerates stale stored links', async () => {
    captureLogs();
    const { invoke, signIn, seedBook, storage } = setup();
    const seeded = await seedBook('book-1');
    storage.books.set('book-1', {
      ...seeded,
      links: { self: '/old/book-1', reservations: '/old/book-1/reservations', reviews: '/old/book-1/reviews' },
    });
    const cookies = await signIn(EDITOR);

    const response = await invoke({ ...put('book-1'), cookies, body: REVISED });

    expect(response.statusCode).toBe(200);
    expect(storage.books.get('book-1')?.links).toEqual({
      self: '/books/book-1',
      reservations: '/books/book-1/reservations',
      reviews: '/books/book-1/reviews',
    });
    expect(readBook(response).links.self).toBe('https://api.example.com/books/book-1');
  });

  it('is visible to a following read', async () => {
    captureLogs();
    const { invoke, signIn, seedBook } = setup();
    await seedBook('book-1');
    const cookies = await signIn(ADMIN);

    await invoke({ ...put('book-1'), cookies, body: REVISED });
    const read = await invoke({ method: 'GET', path: '/books/book-1', pathParameters: { id: 'book-1' } });

    expect(readBook(read).title).toBe('Persuasion');
  });

  it('audits the update', async () => {
    const logs = captureLogs();
    const { invoke, signIn, seedBook } = setup();
    await seedBook('book-1');
    const cookies = await signIn(EDITOR);

    await invoke({ ...put('book-1'), cookies, body: REVISED });

    expect(auditEntries(logs())).toMatchObject([
      {
        action: 'BOOK_UPDATED',
        actor: { type: 'USER', sub: 'editor-1' },
        details: { bookId: 'book-1', title: 'Persuasion' },
      },
    ]);
  });

  it('answers 404 for an unknown book', async () => {
    captureLogs();
    const { invoke, signIn } = setup();
    const cookies = await signIn(EDITOR);

    const response = await invoke({ ...put('missing'), cookies, body: REVISED });

    expect(response.statusCode).toBe(404);
    expect(jsonBody(response)).toEqual({ code: 404, name: 'Not Found', description: 'Book not found' });
  });

  it('answers 404 for a deleted book and leaves it deleted', async () => {
    captureLogs();
    const { invoke, signIn, seedBook, storage } = setup();
    await seedBook('book-1', 'Emma');
    await storage.softDeleteBook('book-1', '2025-01-01T00:00:00.000Z');
    const cookies = await signIn(EDITOR);

    const response = await invoke({ ...put('book-1'), cookies, body: REVISED });

    expect(response.statusCode).toBe(404);
    expect(storage.books.get('book-1')).toMatchObject({ title: 'Emma', state: 'deleted' });
  });

  it('validates the payload before looking the book up', async () => {
    captureLogs();
    const { invoke, signIn } = setup();
    const cookies = await signIn(EDITOR);

    const response = await invoke({ ...put('missing'), cookies, body: { title: 'Only a title' } });

    expect(response.statusCode).toBe(400);
    expect(jsonBody(response)).toEqual({ error: 'Missing required fields: synopsis, author' });
  });

  it('rejects a non-JSON content type with 415', async () => {
    captureLogs();
    const { invoke, signIn, seedBook } = setup();
    await seedBook('book-1');
    const cookies = await signIn(EDITOR);

    const response = await invoke({
      ...put('book-1'),
      cookies,
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: 'title=Persuasion',
    });

    expect(response.statusCode).toBe(415);
  });

  it('accepts a vendor JSON media type with parameters', async () => {
    captureLogs();
    const { invoke, signIn, seedBook } = setup();
    await seedBook('book-1');
    const cookies = await signIn(EDITOR);

    const response = await invoke({
      ...put('book-1'),
      cookies,
      headers: { 'content-type': 'application/vnd.books+json; charset=utf-8' },
      body: REVISED,
    });

    expect(response.statusCode).toBe(200);
  });
});

describe('BKS-03: Update book access', () => {
  it('redirects an anonymous caller to the login route', async () => {
    captureLogs();
    const { invoke, seedBook } = setup();
    await seedBook('book-1');

    const response = await invoke({ ...put('book-1'), body: REVISED });

    expect(response.statusCode).toBe(302);
    expect(header(response, 'Location')).toBe('/auth/login');
  });

  it('forbids a viewer and records the book id', async () => {
    const logs = captureLogs();
    const { invoke, signIn, seedBook } = setup();
    await seedBook('book-1');
    const cookies = await signIn(VIEWER);

    const response = await invoke({ ...put('book-1'), cookies, body: REVISED });

    expect(response.statusCode).toBe(403);
    expect(auditEntries(logs())).toMatchObject([
      {
        action: 'ACCESS_DENIED',
        details: { operation: 'book:update', reason: 'missing_role', resourceId: 'book-1' },
      },
    ]);
  });
});
