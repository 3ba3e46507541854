/**
 * Book Reservations - Audit Logger
 *
 * Structured JSON logging to CloudWatch.
 * Implements the AuditLogger interface from shared_types/audit.d.ts.
 *
 * - Audit events (level AUDIT) record who changed the catalogue, who
 *   reserved what, sign-ins and denied access attempts
 * - Operational events go through Logger with DEBUG/INFO/WARN/ERROR levels
 * - Request context (requestId, IP) is captured for traceability
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type {
    AccessDeniedDetails,
    AuditActor,
    AuditLogEntry,
    AuditLogger as IAuditLogger,
    BookAuditDetails,
    LoginDetails,
    ReservationAuditDetails,
} from '../../shared_types/audit';
import { sourceIp } from './http';

// =============================================================================
// Request Context Interface
// =============================================================================

export interface AuditContext {
    /** AWS Request ID for tracing */
    requestId: string;
    /** Source IP address */
    ip: string;
    userAgent?: string;
}

// =============================================================================
// Audit Logger Implementation
// =============================================================================

/**
 * All output goes to console (which Lambda routes to CloudWatch).
 */
export class AuditLogger implements IAuditLogger {
    private readonly context: AuditContext;

    constructor(context: AuditContext) {
        this.context = context;
    }

    log(
        entry: Omit<AuditLogEntry, 'level' | 'timestamp'>
    ): void {
        const logEntry: AuditLogEntry = {
            level: 'AUDIT',
            timestamp: new Date().toISOString(),
            requestId: entry.requestId || this.context.requestId,
            action: entry.action,
            ip: entry.ip || this.context.ip,
            actor: entry.actor,
            details: entry.details,
        };

        console.log(JSON.stringify(logEntry));
    }

    // ---------------------------------------------------------------------------
    // Convenience Methods
    // ---------------------------------------------------------------------------

    loginSuccess(actor: AuditActor, details: LoginDetails): void {
        this.audit('LOGIN_SUCCESS', actor, { ...details });
    }

    loginFailure(details: LoginDetails & { reason: string }): void {
        this.audit('LOGIN_FAILURE', { type: 'ANONYMOUS' }, { ...details });
    }

    logout(actor: AuditActor): void {
        this.audit('LOGOUT', actor, {});
    }

    /**
     * First sign-in of a provider subject created a user.
     */
    userProvisioned(actor: AuditActor, details: { userId: string; roles: string[] }): void {
        this.audit('USER_PROVISIONED', actor, { ...details });
    }

    accessDenied(actor: AuditActor, details: AccessDeniedDetails): void {
        this.audit('ACCESS_DENIED', actor, { ...details });
    }

    bookCreated(actor: AuditActor, details: BookAuditDetails): void {
        this.audit('BOOK_CREATED', actor, { ...details });
    }

    bookUpdated(actor: AuditActor, details: BookAuditDetails): void {
        this.audit('BOOK_UPDATED', actor, { ...details });
    }

    bookDeleted(actor: AuditActor, details: BookAuditDetails): void {
        this.audit('BOOK_DELETED', actor, { ...details });
    }

    reservationCreated(actor: AuditActor, details: ReservationAuditDetails): void {
        this.audit('RESERVATION_CREATED', actor, { ...details });
    }

    reservationCancelled(actor: AuditActor, details: ReservationAuditDetails): void {
        this.audit('RESERVATION_CANCELLED', actor, { ...details });
    }

    /**
     * Log a generic audit event.
     * Use this for actions that don't have a dedicated convenience method.
     */
    audit(
        action: AuditLogEntry['action'],
        actor: AuditActor,
        details: Record<string, unknown>
    ): void {
        this.log({
            requestId: this.context.requestId,
            action,
            ip: this.context.ip,
            actor,
            details,
        });
    }
}

// =============================================================================
// Helper Functions
// =============================================================================

function requestIdOf(event: APIGatewayProxyEventV2, lambdaContext?: Context): string {
    return (
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        event.headers?.['x-request-id'] ||
        'unknown'
    );
}

/**
 * Extract audit context from an API Gateway HTTP API v2 request.
 *
 * @example
 * ```typescript
 * export const handler = async (event: APIGatewayProxyEventV2, context: Context) => {
 *   const auditLogger = withContext(event, context);
 *   auditLogger.bookDeleted({ type: 'USER', sub: principal.id }, { bookId, title });
 * };
 * ```
 */
export function withContext(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): AuditLogger {
    return new AuditLogger({
        requestId: requestIdOf(event, lambdaContext),
        ip: sourceIp(event),
        userAgent: event.headers?.['user-agent'],
    });
}

// =============================================================================
// General Logger (Non-Audit Structured Logging)
// =============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
    level: LogLevel;
    timestamp: string;
    requestId: string;
    message: string;
    data?: Record<string, unknown>;
}

/**
 * General-purpose structured logger for non-audit events.
 */
export class Logger {
    private readonly requestId: string;

    constructor(requestId: string) {
        this.requestId = requestId;
    }

    private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            timestamp: new Date().toISOString(),
            requestId: this.requestId,
            message,
            ...(data && { data }),
        };

        console.log(JSON.stringify(entry));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.write('DEBUG', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write('INFO', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write('WARN', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write('ERROR', message, data);
    }
}

export function createLogger(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): Logger {
    return new Logger(requestIdOf(event, lambdaContext));
}

/**
 * Flatten an unknown thrown value for the `data` field of a log entry.
 */
export function describeError(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
        return {
            errorName: error.name,
            errorMessage: error.message,
            stack: error.stack,
            ...(error.cause !== undefined ? { cause: describeError(error.cause) } : {}),
        };
    }
    return { errorMessage: String(error) };
}
