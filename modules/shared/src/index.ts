/**
 * Book Reservations - Shared Utilities
 *
 * Central export for all shared modules used across Lambda functions.
 *
 * Modules:
 * - Storage Adapter: DynamoDB Single Table Design operations
 * - Identity & Access Control: session → principal, operation gates
 * - Audit Logger: structured JSON logging to CloudWatch
 * - Response Helpers: HTTP response formatting and error mapping
 * - Validation: book payloads and pagination
 * - Crypto: identifiers, secure random values, PKCE
 * - Errors: typed error taxonomy and Result values
 * - Type Guards: Runtime type discrimination for DynamoDB entities
 */

// =============================================================================
// Storage Adapter
// =============================================================================

export {
    StorageAdapter,
    createStorageAdapter,
    createDocumentClient,
} from './dynamo-client';

export type { StorageAdapterConfig } from './dynamo-client';

export type {
    BookFields,
    NewBook,
    NewReservation,
    ReservationFilter,
    ProviderProfile,
    NewSession,
    NewLoginState,
    UpsertUserResult,
    UserStore,
    BookStore,
    ReservationStore,
    SessionStore,
} from './storage/types';

// Re-export modular storage operations for direct use
export * as storage from './storage';

// =============================================================================
// Configuration
// =============================================================================

export { getBaseEnvConfig } from './config';

export type { BaseEnvConfig } from './config';

// =============================================================================
// Identity & Access Control
// =============================================================================

export {
    resolvePrincipal,
    resolveRequestIdentity,
    invalidateStaleSession,
    principalFromUser,
    actorOf,
} from './identity';

export type {
    Principal,
    Identity,
    Authenticated,
    LoggedOut,
    RequestIdentity,
    IdentityDeps,
} from './identity';

export {
    authorize,
    requireAuthenticated,
    requireAnyRole,
    requireOwnerOrAdmin,
    isAdmin,
    reservationListScope,
} from './access-control';

export type {
    Operation,
    PublicOperation,
    GatedOperation,
    OwnedResource,
    AccessError,
} from './access-control';

export {
    parseCookies,
    getSessionIdFromCookie,
    buildSessionCookieHeader,
    buildClearSessionCookieHeader,
} from './session';

export {
    createRequestContext,
    respond,
    reject,
    handleUnexpected,
} from './request-context';

export type { RequestContext, IdentityStores } from './request-context';

// =============================================================================
// Audit Logger
// =============================================================================

export {
    AuditLogger,
    Logger,
    withContext,
    createLogger,
    describeError,
} from './audit-logger';

export type { AuditContext, LogLevel } from './audit-logger';

// =============================================================================
// HTTP Request & Response Helpers
// =============================================================================

export {
    parseJsonBody,
    isJsonContentType,
    requestBaseUrl,
    absoluteUrl,
    sourceIp,
    INVALID_JSON_BODY,
} from './http';

export type { JsonObject } from './http';

export {
    success,
    created,
    noContent,
    redirect,
    loginRedirect,
    badRequest,
    forbidden,
    notFound,
    methodNotAllowed,
    serverError,
    error,
    invalidRequest,
    errorResponse,
    withHeaders,
    withCookies,
} from './response';

export type { StructuredResponse, StatusErrorBody, OAuthErrorBody } from './response';

// =============================================================================
// Errors
// =============================================================================

export {
    HttpStatus,
    ErrorMessages,
    ApiError,
    InvalidInputError,
    UnauthenticatedError,
    ForbiddenError,
    NotFoundError,
    BookUnavailableError,
    StorageUnavailableError,
    UnexpectedError,
    toApiError,
    ok,
    fail,
} from './errors';

export type {
    HttpStatusCode,
    ApiErrorKind,
    Ok,
    Err,
    Result,
} from './errors';

// =============================================================================
// Validation
// =============================================================================

export {
    validateBookPayload,
    REQUIRED_BOOK_FIELDS,
    parsePagination,
    paginate,
} from './validation';

export type { PageWindow } from './validation';

// =============================================================================
// Cryptographic Utilities
// =============================================================================

export {
    generateId,
    generateSecureRandom,
    generateCodeVerifier,
    generateCodeChallenge,
    base64UrlEncode,
} from './crypto';

// =============================================================================
// Constants
// =============================================================================

export {
    Roles,
    DEFAULT_ROLES,
    BookStates,
    ReservationStates,
    KeyPrefixes,
    BOOKS_PARTITION,
    LOGIN_STATES_PARTITION,
    GSI1_INDEX_NAME,
    Pagination,
    UNKNOWN_USER_MARKER,
    NO_NAME_MARKER,
    SessionDefaults,
    LOGIN_PATH,
} from './constants';

export type { Role } from './constants';

// =============================================================================
// Type Guards
// =============================================================================

export {
    isUserItem,
    isSubjectLinkItem,
    isBookItem,
    isReservationItem,
    isSessionItem,
    isLoginStateItem,
    isActiveBook,
} from './type-guards';
