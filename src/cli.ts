/**
 * Command-line export flow
 * args → env file → config → credential → fetch → write
 */
import { parseArgs } from 'util';
import { resolveAccessToken } from './auth/token.js';
import {
    DEFAULT_COMMUNITY,
    DEFAULT_ENV_FILE,
    buildConfig,
    getRedactedConfig,
    loadEnvFile,
    type CliOverrides,
    type Env,
} from './config/index.js';
import { TournamentFetcher } from './fetchers/tournament.fetcher.js';
import { logger, setLogLevel } from './observability/logger.js';
import { writeCsv } from './writers/csv.writer.js';

export const USAGE = `Usage: tournament-export [options]

Download a community's tournaments for one year and export them to CSV.

Options:
  --env-file <path>         Env file with credentials (default: ${DEFAULT_ENV_FILE})
  -c, --community <name>    Community subdomain (default: ${DEFAULT_COMMUNITY})
  -i, --community-id <id>   Community identifier (or CHALLONGE_COMMUNITY_ID)
  --access-token <token>    OAuth access token (or CHALLONGE_ACCESS_TOKEN)
  --client-id <id>          OAuth client id (or CHALLONGE_CLIENT_ID)
  --client-secret <secret>  OAuth client secret (or CHALLONGE_CLIENT_SECRET)
  -y, --year <year>         Year to filter by start or creation date (default: current year)
  -o, --output <path>       CSV path (default: tournaments_<community>_<year>.csv)
  --pagination <mode>       meta | legacy (default: meta)
  -h, --help                Show this help
`;

export interface CliArgs {
    envFile: string;
    help: boolean;
    overrides: CliOverrides;
}

export interface ExportSummary {
    count: number;
    outputPath: string;
}

/**
 * Parse argv (without the node and script entries)
 */
export function parseCliArgs(argv: string[]): CliArgs {
    const { values } = parseArgs({
        args: argv,
        strict: true,
        allowPositionals: false,
        options: {
            'env-file': { type: 'string' },
            'community': { type: 'string', short: 'c' },
            'community-id': { type: 'string', short: 'i' },
            'access-token': { type: 'string' },
            'client-id': { type: 'string' },
            'client-secret': { type: 'string' },
            'year': { type: 'string', short: 'y' },
            'output': { type: 'string', short: 'o' },
            'pagination': { type: 'string' },
            'help': { type: 'boolean', short: 'h' },
        },
    });

    return {
        envFile: values['env-file'] ?? DEFAULT_ENV_FILE,
        help: values.help ?? false,
        overrides: {
            accessToken: values['access-token'],
            clientId: values['client-id'],
            clientSecret: values['client-secret'],
            community: values.community,
            communityId: values['community-id'],
            year: values.year,
            output: values.output,
            paginationMode: values.pagination,
        },
    };
}

/**
 * Run one export. Returns null when only help was requested.
 * Configuration and credential errors are raised before any request for tournaments.
 */
export async function runExport(argv: string[], processEnv: Env): Promise<ExportSummary | null> {
    const args = parseCliArgs(argv);
    if (args.help) {
        process.stdout.write(USAGE);
        return null;
    }

    // process environment wins over the env file
    const env: Env = { ...(await loadEnvFile(args.envFile)), ...processEnv };
    const config = buildConfig(args.overrides, env);
    setLogLevel(config.logLevel);
    logger.info('Configuration loaded', getRedactedConfig(config));

    const credential = await resolveAccessToken(config, { timeoutMs: config.requestTimeoutMs });
    logger.info('Credential resolved', { source: credential.source });

    const fetcher = new TournamentFetcher({
        accessToken: credential.token,
        community: config.community,
        communityId: config.communityId,
        year: config.year,
        baseUrl: config.baseUrl,
        perPage: config.perPage,
        requestTimeoutMs: config.requestTimeoutMs,
        paginationMode: config.paginationMode,
        retry: {
            maxAttempts: config.retryMaxAttempts,
            baseDelayMs: config.retryBaseDelayMs,
            maxDelayMs: config.retryMaxDelayMs,
        },
    });

    const tournaments = await fetcher.fetchTournaments();
    const count = await writeCsv(tournaments, config.output);

    return { count, outputPath: config.output };
}
