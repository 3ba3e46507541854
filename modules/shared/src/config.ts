/**
 * Book Reservations - Environment Configuration
 *
 * Settings shared by every handler. Modules with extra settings (the OIDC
 * client) read them in their own getEnvConfig and extend this.
 */

import type { SessionCookieConfig } from '../../shared_types/schema';
import { SessionDefaults } from './constants';

export interface BaseEnvConfig {
    tableName: string;
    session: SessionCookieConfig;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw === '') {
        return fallback;
    }

    const value = parseInt(raw, 10);
    if (isNaN(value) || value <= 0 || String(value) !== raw.trim()) {
        throw new Error(`${name} must be a positive integer`);
    }
    return value;
}

/**
 * Read TABLE_NAME, SESSION_COOKIE_NAME and SESSION_TTL_SECONDS.
 *
 * @throws Error if TABLE_NAME is missing or SESSION_TTL_SECONDS is malformed
 */
export function getBaseEnvConfig(env: NodeJS.ProcessEnv = process.env): BaseEnvConfig {
    const tableName = env.TABLE_NAME;

    if (!tableName) throw new Error('TABLE_NAME environment variable is required');

    return {
        tableName,
        session: {
            name: env.SESSION_COOKIE_NAME || SessionDefaults.COOKIE_NAME,
            ttlSeconds: parsePositiveInt('SESSION_TTL_SECONDS', env.SESSION_TTL_SECONDS, SessionDefaults.TTL_SECONDS),
        },
    };
}
