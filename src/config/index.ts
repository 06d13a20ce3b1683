/**
 * Configuration module with Zod schema validation
 * Merges CLI flags, the process environment and an optional env file
 */
import { readFile } from 'fs/promises';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';

export const DEFAULT_COMMUNITY = 'fabco';
export const DEFAULT_BASE_URL = 'https://api.challonge.com/v2';
export const DEFAULT_ENV_FILE = '.env';

export type Env = Record<string, string | undefined>;

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const paginationModeSchema = z.enum(['meta', 'legacy']);

export type LogLevel = z.infer<typeof logLevelSchema>;
export type PaginationMode = z.infer<typeof paginationModeSchema>;

const COMMUNITY_ID_MESSAGE =
    'CHALLONGE_COMMUNITY_ID is required. Provide --community-id or set it in the env.';

// Custom validators
const urlSchema = z.string().url('Must be a valid URL');
const positiveIntSchema = z.coerce.number().int().positive();
const delaySchema = z.coerce.number().int().min(0);
const optionalSecretSchema = z.string().min(1).nullable().default(null);

const configSchema = z
    .object({
        // Credentials, resolved by the auth module
        accessToken: optionalSecretSchema,
        clientId: optionalSecretSchema,
        clientSecret: optionalSecretSchema,
        apiKey: optionalSecretSchema,

        // Query
        community: z.string().min(1).default(DEFAULT_COMMUNITY),
        communityId: z
            .string({ required_error: COMMUNITY_ID_MESSAGE })
            .min(1, COMMUNITY_ID_MESSAGE),
        year: positiveIntSchema.default(() => new Date().getFullYear()),
        output: z.string().min(1).nullable().default(null),

        // HTTP
        baseUrl: urlSchema.default(DEFAULT_BASE_URL),
        perPage: positiveIntSchema.default(200),
        requestTimeoutMs: positiveIntSchema.default(30000),
        paginationMode: paginationModeSchema.default('meta'),

        // Retry tuning
        retryMaxAttempts: positiveIntSchema.default(3),
        retryBaseDelayMs: delaySchema.default(1000),
        retryMaxDelayMs: delaySchema.default(5000),

        logLevel: logLevelSchema.default('info'),
    })
    .transform((cfg) => ({
        ...cfg,
        output: cfg.output ?? defaultOutputPath(cfg.community, cfg.year),
    }));

export type Config = z.infer<typeof configSchema>;
type ConfigKey = keyof z.input<typeof configSchema>;

/**
 * Values supplied on the command line; they win over the environment
 */
export interface CliOverrides {
    accessToken?: string;
    clientId?: string;
    clientSecret?: string;
    community?: string;
    communityId?: string;
    year?: string;
    output?: string;
    paginationMode?: string;
}

const ENV_VARS: Record<ConfigKey, string> = {
    accessToken: 'CHALLONGE_ACCESS_TOKEN',
    clientId: 'CHALLONGE_CLIENT_ID',
    clientSecret: 'CHALLONGE_CLIENT_SECRET',
    apiKey: 'CHALLONGE_API_KEY',
    community: 'CHALLONGE_COMMUNITY',
    communityId: 'CHALLONGE_COMMUNITY_ID',
    year: 'CHALLONGE_YEAR',
    output: 'CHALLONGE_OUTPUT',
    baseUrl: 'CHALLONGE_BASE_URL',
    perPage: 'CHALLONGE_PER_PAGE',
    requestTimeoutMs: 'REQUEST_TIMEOUT_MS',
    paginationMode: 'PAGINATION_MODE',
    retryMaxAttempts: 'RETRY_MAX_ATTEMPTS',
    retryBaseDelayMs: 'RETRY_BASE_DELAY_MS',
    retryMaxDelayMs: 'RETRY_MAX_DELAY_MS',
    logLevel: 'LOG_LEVEL',
};

export class ConfigError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Configuration Error\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
        this.name = 'ConfigError';
    }
}

export function defaultOutputPath(community: string, year: number): string {
    return `tournaments_${community}_${year}.csv`;
}

function isConfigKey(key: unknown): key is ConfigKey {
    return typeof key === 'string' && Object.prototype.hasOwnProperty.call(ENV_VARS, key);
}

function presentOrUndefined(value: string | undefined): string | undefined {
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
}

/**
 * Read an env file without touching process.env.
 * A missing file yields an empty record.
 */
export async function loadEnvFile(path: string): Promise<Env> {
    try {
        return parseDotenv(await readFile(path));
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return {};
        }
        throw error;
    }
}

/**
 * Map CLI flags and environment variables to a raw config object
 */
function mapInputToConfig(cli: CliOverrides, env: Env): Record<ConfigKey, string | undefined> {
    const fromEnv = (key: ConfigKey) => presentOrUndefined(env[ENV_VARS[key]]);
    const pick = (key: ConfigKey & keyof CliOverrides) =>
        presentOrUndefined(cli[key]) ?? fromEnv(key);

    return {
        accessToken: pick('accessToken'),
        clientId: pick('clientId'),
        clientSecret: pick('clientSecret'),
        apiKey: fromEnv('apiKey'),
        community: pick('community'),
        communityId: pick('communityId'),
        year: pick('year'),
        output: pick('output'),
        baseUrl: fromEnv('baseUrl'),
        perPage: fromEnv('perPage'),
        requestTimeoutMs: fromEnv('requestTimeoutMs'),
        paginationMode: pick('paginationMode'),
        retryMaxAttempts: fromEnv('retryMaxAttempts'),
        retryBaseDelayMs: fromEnv('retryBaseDelayMs'),
        retryMaxDelayMs: fromEnv('retryMaxDelayMs'),
        logLevel: fromEnv('logLevel'),
    };
}

/**
 * Validate configuration. Throws ConfigError listing every invalid field.
 */
export function buildConfig(cli: CliOverrides, env: Env): Config {
    const result = configSchema.safeParse(mapInputToConfig(cli, env));

    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map((issue) => {
                const key = issue.path[0];
                const name = isConfigKey(key) ? ENV_VARS[key] : issue.path.join('.');
                return issue.message.startsWith(name) ? issue.message : `${name}: ${issue.message}`;
            })
        );
    }

    return result.data;
}

/**
 * Redact sensitive values for logging
 */
export function getRedactedConfig(cfg: Config): Record<string, unknown> {
    return {
        accessToken: cfg.accessToken ? '[REDACTED]' : null,
        clientId: cfg.clientId ? '[CONFIGURED]' : null,
        clientSecret: cfg.clientSecret ? '[REDACTED]' : null,
        apiKey: cfg.apiKey ? '[REDACTED]' : null,
        community: cfg.community,
        communityId: cfg.communityId,
        year: cfg.year,
        output: cfg.output,
        baseUrl: cfg.baseUrl,
        perPage: cfg.perPage,
        paginationMode: cfg.paginationMode,
        requestTimeoutMs: cfg.requestTimeoutMs,
        retryMaxAttempts: cfg.retryMaxAttempts,
        logLevel: cfg.logLevel,
    };
}
