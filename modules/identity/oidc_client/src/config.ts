/**
 * OIDC Client - Environment Configuration
 *
 * Read once per container and cached for warm starts.
 */

import { getBaseEnvConfig } from '@book-reservations/shared';
import type { OidcEnvConfig } from './types';

const DEFAULTS = {
    POST_LOGOUT_REDIRECT: '/',
} as const;

/**
 * @throws Error if the variable is missing or empty
 */
function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
    const value = env[name];
    if (!value) {
        throw new Error(`Missing required environment variable: ${name}`);
    }
    return value;
}

function optionalEnv(env: NodeJS.ProcessEnv, name: string, defaultValue: string): string {
    return env[name] || defaultValue;
}

let configCache: OidcEnvConfig | null = null;

/**
 * Load TABLE_NAME, the session settings and the OIDC_* variables.
 *
 * @throws Error if a required variable is missing
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): OidcEnvConfig {
    if (configCache) {
        return configCache;
    }

    configCache = {
        ...getBaseEnvConfig(env),
        issuer: requireEnv(env, 'OIDC_ISSUER'),
        clientId: requireEnv(env, 'OIDC_CLIENT_ID'),
        clientSecret: requireEnv(env, 'OIDC_CLIENT_SECRET'),
        redirectUri: requireEnv(env, 'OIDC_REDIRECT_URI'),
        postLogoutRedirect: optionalEnv(env, 'POST_LOGOUT_REDIRECT', DEFAULTS.POST_LOGOUT_REDIRECT),
    };

    return configCache;
}

/**
 * Clear configuration cache (useful for testing).
 */
export function clearConfigCache(): void {
    configCache = null;
}
