/**
 * Book Reservations - Book Payload Validation
 *
 * Create and update share one contract: `title`, `synopsis` and `author`
 * are required strings. Every violation is reported, not just the first.
 * Keys outside these three are ignored.
 */

import { ErrorMessages } from '../errors/error-messages';
import { InvalidInputError } from '../errors/api-errors';
import { fail, ok } from '../errors/result';
import type { Result } from '../errors/result';
import type { BookFields } from '../storage/types';

/** Order in which absent fields are reported */
export const REQUIRED_BOOK_FIELDS = ['title', 'synopsis', 'author'] as const;

export function validateBookPayload(payload: unknown): Result<BookFields, InvalidInputError> {
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
        return fail(new InvalidInputError(ErrorMessages.PAYLOAD_MUST_BE_OBJECT));
    }

    const missing: string[] = [];
    const violations: string[] = [];
    const values: Partial<BookFields> = {};

    for (const field of REQUIRED_BOOK_FIELDS) {
        if (!Object.hasOwn(payload, field)) {
            missing.push(field);
            continue;
        }

        const value: unknown = Reflect.get(payload, field);
        if (typeof value !== 'string') {
            violations.push(`Field ${field} must be a string`);
            continue;
        }
        values[field] = value;
    }

    if (missing.length > 0) {
        violations.unshift(`${ErrorMessages.MISSING_FIELDS_PREFIX}${missing.join(', ')}`);
    }

    const { title, synopsis, author } = values;
    if (violations.length > 0 || title === undefined || synopsis === undefined || author === undefined) {
        return fail(new InvalidInputError(violations));
    }

    return ok({ title, author, synopsis });
}
