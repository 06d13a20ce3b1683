/**
 * Access token resolution
 * Explicit token, then OAuth client credentials, then the legacy API key
 */
import { z } from 'zod';
import { logger } from '../observability/logger.js';
import { DEFAULT_TIMEOUT_MS, USER_AGENT, toHttpError } from '../fetchers/http.js';

export const OAUTH_TOKEN_URL = 'https://api.challonge.com/oauth/token';

export class CredentialError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CredentialError';
    }
}

export interface CredentialSources {
    accessToken: string | null;
    clientId: string | null;
    clientSecret: string | null;
    apiKey: string | null;
}

export type CredentialSource = 'access-token' | 'oauth' | 'api-key';

export interface ResolvedCredential {
    token: string;
    source: CredentialSource;
}

export interface TokenRequestOptions {
    tokenUrl?: string;
    timeoutMs?: number;
}

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().optional(),
});

/**
 * Exchange client credentials for an OAuth access token
 */
export async function requestAccessToken(
    clientId: string,
    clientSecret: string,
    options: TokenRequestOptions = {}
): Promise<string> {
    const tokenUrl = options.tokenUrl ?? OAUTH_TOKEN_URL;

    const response = await fetch(tokenUrl, {
        method: 'POST',
        headers: {
            'Accept': 'application/json',
            'Content-Type': 'application/x-www-form-urlencoded',
            'User-Agent': USER_AGENT,
        },
        body: new URLSearchParams({
            grant_type: 'client_credentials',
            client_id: clientId,
            client_secret: clientSecret,
        }).toString(),
        signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });

    if (!response.ok) {
        throw await toHttpError(response, tokenUrl);
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
        throw new CredentialError('OAuth token response missing access_token');
    }

    logger.debug('OAuth access token obtained', { expiresIn: parsed.data.expires_in });
    return parsed.data.access_token;
}

/**
 * Resolve the bearer credential for API calls
 */
export async function resolveAccessToken(
    sources: CredentialSources,
    options: TokenRequestOptions = {}
): Promise<ResolvedCredential> {
    if (sources.accessToken) {
        return { token: sources.accessToken, source: 'access-token' };
    }

    if (sources.clientId && sources.clientSecret) {
        logger.info('Requesting OAuth access token with client credentials');
        const token = await requestAccessToken(sources.clientId, sources.clientSecret, options);
        return { token, source: 'oauth' };
    }

    if (sources.apiKey) {
        return { token: sources.apiKey, source: 'api-key' };
    }

    throw new CredentialError(
        'Challonge OAuth credentials are required. Provide CHALLONGE_ACCESS_TOKEN or client ' +
        'credentials via environment variables or CLI flags.'
    );
}
