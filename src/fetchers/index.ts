/**
 * Fetcher entry point
 */
import { TournamentFetcher } from './tournament.fetcher.js';
import type { TournamentFetcherOptions } from './types.js';
import type { TournamentRecord } from '../normalizers/types.js';

/**
 * Fetch the canonical records for one community and year
 */
export async function fetchTournaments(options: TournamentFetcherOptions): Promise<TournamentRecord[]> {
    return new TournamentFetcher(options).fetchTournaments();
}

export { TournamentFetcher, DEFAULT_PER_PAGE } from './tournament.fetcher.js';
export {
    HttpError,
    DEFAULT_RETRY_POLICY,
    backoffDelay,
    getJsonWithRetry,
    isRetryableStatus,
} from './http.js';
export { nextPage, nextPageFromMeta, nextPageUntilEmpty } from './pagination.js';

// Re-export types
export * from './types.js';
