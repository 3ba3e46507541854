/**
 * OIDC Client - Production Dependencies
 *
 * One storage adapter and one provider client per container.
 */

import { createStorageAdapter } from '@book-reservations/shared';
import { getEnvConfig } from './config';
import { OidcProvider } from './provider';
import type { OidcDeps } from './types';

let defaultDeps: OidcDeps | null = null;

/**
 * @throws Error if required environment variables are missing
 */
export function getDefaultDeps(): OidcDeps {
    if (!defaultDeps) {
        const config = getEnvConfig();
        const storage = createStorageAdapter();
        defaultDeps = {
            users: storage,
            sessions: storage,
            provider: new OidcProvider(config),
            config,
        };
    }
    return defaultDeps;
}
