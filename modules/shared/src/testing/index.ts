/**
 * Book Reservations - Test Support
 *
 * In-process stand-ins for DynamoDB and API Gateway. Imported by tests
 * through `@book-reservations/shared/testing`; never by handler code.
 */

export { InMemoryStorage } from './in-memory-storage';

export type { SeedUser } from './in-memory-storage';

export { buildEvent, lambdaContext, jsonBody, header } from './events';

export type { TestEventOptions } from './events';

export { captureLogs, auditEntries } from './logs';

export type { LoggedEntry } from './logs';
