/**
 * Earthdata Login session for ASF downloads
 *
 * Two credential forms are accepted:
 * - a bearer token (EDL_TOKEN), checked locally for JWT shape and expiry
 * - a username/password pair, exchanged for a bearer token at Earthdata Login
 *
 * Authentication happens once, before any transfer; a failure aborts the command.
 */

import jwt from 'jsonwebtoken';
import { isAxiosError, type AxiosInstance } from 'axios';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import type { AsfCredentials } from '../../config/env.js';
import { createChildLogger } from '../../utils/logger.js';
import { AuthenticationError, getErrorMessage } from '../../types/errors.js';

export const EDL_TOKEN_URL = 'https://urs.earthdata.nasa.gov/api/users/find_or_create_token';

const log = createChildLogger({ component: 'EarthdataSession' });

export interface AuthenticatedSession {
    readonly method: AsfCredentials['kind'];
    readonly bearerToken: string;
    /** ISO timestamp, when known */
    readonly expiresAt?: string;
}

export interface EarthdataSessionOptions {
    client?: AxiosInstance;
    tokenUrl?: string;
    now?: () => Date;
}

interface EdlTokenResponse {
    access_token: string;
    expiration_date?: string;
}

function isEdlTokenResponse(value: unknown): value is EdlTokenResponse {
    return (
        typeof value === 'object' &&
        value !== null &&
        'access_token' in value &&
        typeof value.access_token === 'string' &&
        value.access_token.length > 0
    );
}

export class EarthdataSession {
    private client: AxiosInstance;
    private tokenUrl: string;
    private now: () => Date;
    private session: AuthenticatedSession | null = null;

    constructor(private readonly credentials: AsfCredentials, options: EarthdataSessionOptions = {}) {
        this.client = options.client ?? createHttpClient({ timeout: HTTP_TIMEOUTS.STANDARD });
        this.tokenUrl = options.tokenUrl ?? EDL_TOKEN_URL;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Authenticate with the configured credential form
     * @throws {AuthenticationError} If the credentials are rejected or unusable
     */
    async authenticate(signal?: AbortSignal): Promise<AuthenticatedSession> {
        log.info({ method: this.credentials.kind }, 'Starting ASF authentication');

        const session = this.credentials.kind === 'token'
            ? this.authenticateWithToken(this.credentials.token)
            : await this.authenticateWithPassword(this.credentials.username, this.credentials.password, signal);

        this.session = session;
        log.info({ method: session.method, expiresAt: session.expiresAt }, 'ASF authentication successful');
        return session;
    }

    /**
     * Authorization headers for archive downloads
     * @throws {AuthenticationError} If authenticate() has not succeeded yet
     */
    authorizationHeaders(): Record<string, string> {
        if (!this.session) {
            throw new AuthenticationError('Earthdata session is not authenticated');
        }
        return { Authorization: `Bearer ${this.session.bearerToken}` };
    }

    private authenticateWithToken(token: string): AuthenticatedSession {
        const payload = jwt.decode(token, { json: true });
        if (!payload) {
            throw new AuthenticationError('EDL_TOKEN does not appear to be a valid JWT');
        }

        if (typeof payload.exp === 'number') {
            const expiresAt = new Date(payload.exp * 1000);
            if (expiresAt.getTime() <= this.now().getTime()) {
                throw new AuthenticationError(`EDL_TOKEN expired at ${expiresAt.toISOString()}`, {
                    expiresAt: expiresAt.toISOString(),
                });
            }
            return { method: 'token', bearerToken: token, expiresAt: expiresAt.toISOString() };
        }

        return { method: 'token', bearerToken: token };
    }

    private async authenticateWithPassword(
        username: string,
        password: string,
        signal?: AbortSignal
    ): Promise<AuthenticatedSession> {
        log.debug({ username }, 'Authenticating with username/password');
        try {
            const response = await this.client.post<unknown>(this.tokenUrl, undefined, {
                auth: { username, password },
                signal,
            });
            if (!isEdlTokenResponse(response.data)) {
                throw new AuthenticationError('Earthdata Login response has no access_token');
            }
            return {
                method: 'password',
                bearerToken: response.data.access_token,
                expiresAt: response.data.expiration_date,
            };
        } catch (error) {
            if (error instanceof AuthenticationError) {
                throw error;
            }
            if (isAxiosError(error) && (error.response?.status === 401 || error.response?.status === 403)) {
                throw new AuthenticationError('Earthdata Login rejected the username/password', {
                    status: error.response.status,
                });
            }
            throw new AuthenticationError(`Authentication error: ${getErrorMessage(error)}`);
        }
    }
}
