/**
 * Book Reservations - Pagination Parameters
 */

import { Pagination } from '../constants';
import { InvalidInputError } from '../errors/api-errors';
import { fail, ok } from '../errors/result';
import type { Result } from '../errors/result';

export interface PageWindow {
    offset: number;
    limit: number;
}

const NON_NEGATIVE_INTEGER = /^\d+$/;

function parseParam(name: string, raw: string | undefined, fallback: number, violations: string[]): number {
    if (raw === undefined) {
        return fallback;
    }
    if (!NON_NEGATIVE_INTEGER.test(raw)) {
        violations.push(`Query parameter ${name} must be a non-negative integer`);
        return fallback;
    }
    return parseInt(raw, 10);
}

/**
 * Read `offset` and `limit` from a query string map.
 * Absent values take the defaults; malformed values and limits above the
 * maximum are rejected together.
 */
export function parsePagination(
    query: Record<string, string | undefined> | undefined
): Result<PageWindow, InvalidInputError> {
    const violations: string[] = [];
    const offset = parseParam('offset', query?.offset, Pagination.DEFAULT_OFFSET, violations);
    const limit = parseParam('limit', query?.limit, Pagination.DEFAULT_LIMIT, violations);

    if (limit > Pagination.MAX_LIMIT) {
        violations.push(`Query parameter limit must not exceed ${Pagination.MAX_LIMIT}`);
    }

    if (violations.length > 0) {
        return fail(new InvalidInputError(violations));
    }

    return ok({ offset, limit });
}

/**
 * Slice one page out of the full ordered list.
 */
export function paginate<T>(items: readonly T[], window: PageWindow): T[] {
    return items.slice(window.offset, window.offset + window.limit);
}
