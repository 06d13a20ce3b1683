/**
 * Fetcher types and interfaces
 */
import { z } from 'zod';
import type { PaginationMode } from '../config/index.js';
import type { TournamentRecord } from '../normalizers/types.js';

/**
 * Raw tournament entry as returned by the API (JSON:API style)
 */
export type RawTournamentEntry = Record<string, unknown>;

/**
 * Attributes of a raw entry after id, timestamps and participant counts were merged in
 */
export type TournamentAttributes = Record<string, unknown>;

// Pagination counters are tolerated when absent or mistyped
const pageNumberSchema = z.number().int().nullish().catch(null);

export const paginationMetaSchema = z
    .object({
        current_page: pageNumberSchema,
        next_page: pageNumberSchema,
        total_pages: pageNumberSchema,
    })
    .passthrough();

export const tournamentPageSchema = z
    .object({
        data: z.array(z.unknown()).nullish(),
        links: z.record(z.unknown()).nullish().catch(null),
        meta: paginationMetaSchema.nullish().catch(null),
    })
    .passthrough();

export type PaginationMeta = z.infer<typeof paginationMetaSchema>;
export type TournamentPage = z.infer<typeof tournamentPageSchema>;

/**
 * Retry tuning for page requests
 */
export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
}

/**
 * Options for the tournament fetcher. The credential is passed in explicitly.
 */
export interface TournamentFetcherOptions {
    accessToken: string;
    communityId: string;
    year: number;
    community?: string;
    baseUrl?: string;
    perPage?: number;
    requestTimeoutMs?: number;
    paginationMode?: PaginationMode;
    retry?: Partial<RetryPolicy>;
}

/**
 * Fetch result for one export run
 */
export interface FetchResult {
    records: TournamentRecord[];
    metadata: {
        pagesFetched: number;
        totalFetched: number;
        skipped: number;
    };
}
