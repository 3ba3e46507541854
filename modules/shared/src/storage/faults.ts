/**
 * Book Reservations - DynamoDB Fault Translation
 *
 * Storage calls are made once. Throttling, 5xx responses and failures to
 * reach the table surface as StorageUnavailableError on the first
 * occurrence; a conditional write may already have been applied when its
 * reply is lost, so repeating it could misreport the outcome.
 *
 * Everything else (failed conditions, cancelled transactions, validation
 * errors) is rethrown untouched for the operation to interpret.
 */

import { StorageUnavailableError } from '../errors/api-errors';

// =============================================================================
// Error Classification
// =============================================================================

const SERVICE_FAULT_NAMES = new Set([
    'ProvisionedThroughputExceededException',
    'ThrottlingException',
    'RequestLimitExceeded',
    'InternalServerError',
    'ServiceUnavailable',
    'TransactionConflictException',
]);

const SERVICE_FAULT_STATUS_CODES = new Set([429, 500, 502, 503, 504]);

/** SDK and socket-level failures meaning the table could not be reached at all */
const UNREACHABLE_ERROR_NAMES = new Set([
    'TimeoutError',
    'NetworkingError',
    'CredentialsProviderError',
    'ResourceNotFoundException',
]);

const UNREACHABLE_ERROR_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'ETIMEDOUT',
    'EAI_AGAIN',
]);

function readProperty(error: object, key: string): unknown {
    return Reflect.get(error, key);
}

/**
 * Throttling or a server-side failure reported by DynamoDB.
 */
export function isServiceFault(error: unknown): boolean {
    if (!error || typeof error !== 'object') {
        return false;
    }

    const name = readProperty(error, 'name');
    if (typeof name === 'string' && SERVICE_FAULT_NAMES.has(name)) {
        return true;
    }

    // $metadata is set on AWS SDK v3 service exceptions
    const metadata = readProperty(error, '$metadata');
    if (metadata && typeof metadata === 'object') {
        const status = readProperty(metadata, 'httpStatusCode');
        if (typeof status === 'number' && SERVICE_FAULT_STATUS_CODES.has(status)) {
            return true;
        }
    }

    // SDK v3 sets $retryable to an object ({ throttling }) on transient faults
    const retryable = readProperty(error, '$retryable');
    return retryable === true || (typeof retryable === 'object' && retryable !== null);
}

/**
 * Determine if an error means the storage backend could not be reached.
 */
export function isUnreachableError(error: unknown): boolean {
    if (!error || typeof error !== 'object') {
        return false;
    }

    const name = readProperty(error, 'name');
    if (typeof name === 'string' && UNREACHABLE_ERROR_NAMES.has(name)) {
        return true;
    }

    const code = readProperty(error, 'code');
    return typeof code === 'string' && UNREACHABLE_ERROR_CODES.has(code);
}

/**
 * Check for the exception DynamoDB raises when a ConditionExpression fails.
 */
export function isConditionalCheckFailed(error: unknown): boolean {
    return error instanceof Error && error.name === 'ConditionalCheckFailedException';
}

/**
 * For a cancelled TransactWriteItems call, whether the item at `index`
 * failed its condition. Reasons are listed in request order.
 */
export function transactionConditionFailed(error: unknown, index: number): boolean {
    if (!(error instanceof Error) || error.name !== 'TransactionCanceledException') {
        return false;
    }

    const reasons = readProperty(error, 'CancellationReasons');
    if (!Array.isArray(reasons)) {
        return false;
    }

    const reason: unknown = reasons[index];
    return typeof reason === 'object' && reason !== null && readProperty(reason, 'Code') === 'ConditionalCheckFailed';
}

// =============================================================================
// Wrapper
// =============================================================================

/**
 * Execute a storage call once, translating backend faults.
 *
 * @example
 * ```typescript
 * const result = await withStorageFaults(() => client.send(new GetCommand({ ... })));
 * ```
 */
export async function withStorageFaults<T>(operation: () => Promise<T>): Promise<T> {
    try {
        return await operation();
    } catch (error) {
        if (isServiceFault(error) || isUnreachableError(error)) {
            throw new StorageUnavailableError({ cause: error });
        }
        throw error;
    }
}
