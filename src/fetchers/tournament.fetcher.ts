/**
 * Tournament Fetcher
 * Pages through a community's tournaments and keeps those of the target year
 */
import { v4 as uuid } from 'uuid';
import { DEFAULT_BASE_URL, type PaginationMode } from '../config/index.js';
import { createLogger, type Logger } from '../observability/logger.js';
import { normalizeEntries } from '../normalizers/index.js';
import type { TournamentRecord } from '../normalizers/types.js';
import { DEFAULT_RETRY_POLICY, DEFAULT_TIMEOUT_MS, USER_AGENT, getJsonWithRetry } from './http.js';
import { nextPage } from './pagination.js';
import {
    tournamentPageSchema,
    type FetchResult,
    type RetryPolicy,
    type TournamentFetcherOptions,
} from './types.js';

export const DEFAULT_PER_PAGE = 200;

export class TournamentFetcher {
    private readonly accessToken: string;
    private readonly communityId: string;
    private readonly year: number;
    private readonly baseUrl: string;
    private readonly perPage: number;
    private readonly timeoutMs: number;
    private readonly paginationMode: PaginationMode;
    private readonly retry: RetryPolicy;
    private readonly log: Logger;

    constructor(options: TournamentFetcherOptions) {
        if (!options.accessToken) {
            throw new Error('An access token is required to fetch tournaments');
        }
        if (!options.communityId) {
            throw new Error('A community id is required to fetch tournaments');
        }

        this.accessToken = options.accessToken;
        this.communityId = options.communityId;
        this.year = options.year;
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
        this.timeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.paginationMode = options.paginationMode ?? 'meta';
        this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
        this.log = createLogger({
            community: options.community,
            communityId: options.communityId,
            year: options.year,
            stage: 'fetch',
        });
    }

    /**
     * Canonical records for the target year, in page order then in-page order
     */
    async fetchTournaments(): Promise<TournamentRecord[]> {
        const result = await this.fetch();
        return result.records;
    }

    async fetch(): Promise<FetchResult> {
        const records: TournamentRecord[] = [];
        let skipped = 0;
        let totalFetched = 0;
        let pagesFetched = 0;
        let page: number | null = 1;

        this.log.info('Fetching tournaments', {
            perPage: this.perPage,
            paginationMode: this.paginationMode,
        });

        while (page !== null) {
            const pageLog = this.log.child({ page, requestId: uuid() });
            const payload = tournamentPageSchema.parse(await this.getPage(page, pageLog));
            const entries = payload.data ?? [];

            const { normalized, skipped: pageSkipped } = normalizeEntries(entries, this.year, pageLog);
            records.push(...normalized);
            skipped += pageSkipped;
            totalFetched += entries.length;
            pagesFetched++;

            pageLog.debug('Page processed', {
                entries: entries.length,
                kept: normalized.length,
            });

            page = nextPage(this.paginationMode, payload, page);
        }

        this.log.info('Tournaments fetched', {
            pagesFetched,
            totalFetched,
            kept: records.length,
            skipped,
        });

        return {
            records,
            metadata: { pagesFetched, totalFetched, skipped },
        };
    }

    /**
     * Request URL for one page
     */
    pageUrl(page: number): URL {
        const url = new URL(`${this.baseUrl}/communities/${encodeURIComponent(this.communityId)}/tournaments`);
        url.searchParams.set('state', 'all');
        url.searchParams.set('per_page', String(this.perPage));
        url.searchParams.set('page', String(page));
        return url;
    }

    private async getPage(page: number, log: Logger): Promise<unknown> {
        log.debug('Requesting tournament page');

        try {
            return await getJsonWithRetry(this.pageUrl(page), {
                headers: {
                    'Accept': 'application/json',
                    'Authorization': `Bearer ${this.accessToken}`,
                    'User-Agent': USER_AGENT,
                },
                timeoutMs: this.timeoutMs,
                retry: this.retry,
                logger: log,
            });
        } catch (error) {
            log.error('Failed to fetch tournament page', error);
            throw error;
        }
    }
}
