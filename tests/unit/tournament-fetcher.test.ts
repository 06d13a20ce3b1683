/**
 * Tournament Fetcher Tests
 * Pagination, year filtering and retry against a mocked global fetch
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/observability/logger.js', () => {
    const log = {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
        child: () => log,
    };
    return { logger: log, createLogger: () => log, setLogLevel: vi.fn() };
});

import { TournamentFetcher, fetchTournaments, HttpError } from '../../src/fetchers/index.js';
import { errorResponse, jsonResponse, pageOne, pageTwo } from '../fixtures/pages.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

const baseOptions = {
    accessToken: 'test-token',
    communityId: '123',
    year: 2024,
    retry: { baseDelayMs: 0, maxDelayMs: 0 },
};

function requestedUrl(call: number): string {
    return String(mockFetch.mock.calls[call][0]);
}

describe('TournamentFetcher', () => {
    beforeEach(() => {
        mockFetch.mockReset();
    });

    afterEach(() => {
        vi.clearAllMocks();
    });

    it('should page through results and keep the target year in page order', async () => {
        mockFetch
            .mockResolvedValueOnce(jsonResponse(pageOne))
            .mockResolvedValueOnce(jsonResponse(pageTwo));

        const tournaments = await new TournamentFetcher(baseOptions).fetchTournaments();

        expect(tournaments.map((t) => t.id)).toEqual(['1', '3']);
        expect(tournaments.map((t) => t.participants_count)).toEqual([16, 8]);
        expect(tournaments[0]).toEqual({
            id: '1',
            name: '2024 Event',
            url: 'event-2024',
            full_challonge_url: 'https://challonge.com/2024-event',
            state: 'complete',
            game_name: 'Flesh and Blood',
            participants_count: 16,
            created_at: '2024-02-01T10:00:00Z',
            started_at: '2024-03-01T12:00:00Z',
            completed_at: null,
        });
        expect(mockFetch).toHaveBeenCalledTimes(2);
        expect(requestedUrl(0)).toBe(
            'https://api.challonge.com/v2/communities/123/tournaments?state=all&per_page=200&page=1'
        );
        expect(requestedUrl(1)).toBe(
            'https://api.challonge.com/v2/communities/123/tournaments?state=all&per_page=200&page=2'
        );
    });

    it('should authenticate with a bearer header', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse(pageTwo));

        await new TournamentFetcher(baseOptions).fetchTournaments();

        const init = mockFetch.mock.calls[0][1];
        expect(init.headers).toMatchObject({
            'Accept': 'application/json',
            'Authorization': 'Bearer test-token',
        });
    });

    it('should report page and entry counts', async () => {
        mockFetch
            .mockResolvedValueOnce(jsonResponse(pageOne))
            .mockResolvedValueOnce(jsonResponse(pageTwo));

        const result = await new TournamentFetcher(baseOptions).fetch();

        expect(result.metadata).toEqual({ pagesFetched: 2, totalFetched: 3, skipped: 1 });
    });

    it('should stop when next_page exceeds total_pages', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse({
            data: pageOne.data,
            links: {},
            meta: { current_page: 1, next_page: 2, total_pages: 1 },
        }));

        const tournaments = await fetchTournaments(baseOptions);

        expect(tournaments).toHaveLength(1);
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should retry a 520 and continue with the same page', async () => {
        mockFetch
            .mockResolvedValueOnce(errorResponse(520))
            .mockResolvedValueOnce(jsonResponse(pageTwo));

        const tournaments = await fetchTournaments(baseOptions);

        expect(tournaments.map((t) => t.id)).toEqual(['3']);
        expect(mockFetch).toHaveBeenCalledTimes(2);
        expect(requestedUrl(1)).toBe(requestedUrl(0));
    });

    it('should issue exactly one request for a 4xx response', async () => {
        mockFetch.mockResolvedValue(errorResponse(403, 'forbidden'));

        await expect(fetchTournaments(baseOptions)).rejects.toBeInstanceOf(HttpError);
        expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should discard earlier pages when a later page fails', async () => {
        mockFetch
            .mockResolvedValueOnce(jsonResponse(pageOne))
            .mockResolvedValueOnce(errorResponse(401, 'expired'));

        await expect(fetchTournaments(baseOptions)).rejects.toMatchObject({ status: 401 });
        expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('should page until an empty page in legacy mode', async () => {
        mockFetch
            .mockResolvedValueOnce(jsonResponse({ data: pageOne.data }))
            .mockResolvedValueOnce(jsonResponse({ data: pageTwo.data }))
            .mockResolvedValueOnce(jsonResponse({ data: [] }));

        const tournaments = await fetchTournaments({ ...baseOptions, paginationMode: 'legacy' });

        expect(tournaments.map((t) => t.id)).toEqual(['1', '3']);
        expect(mockFetch).toHaveBeenCalledTimes(3);
        expect(requestedUrl(2)).toContain('page=3');
    });

    it('should treat a missing data list as an empty page', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse({ data: null, links: {}, meta: {} }));

        await expect(fetchTournaments(baseOptions)).resolves.toEqual([]);
    });

    it('should honour base URL and page size overrides', async () => {
        mockFetch.mockResolvedValueOnce(jsonResponse({ data: [] }));

        await fetchTournaments({ ...baseOptions, baseUrl: 'http://localhost:9999/v2/', perPage: 50 });

        expect(requestedUrl(0)).toBe(
            'http://localhost:9999/v2/communities/123/tournaments?state=all&per_page=50&page=1'
        );
    });

    it('should require a credential and a community id', () => {
        expect(() => new TournamentFetcher({ ...baseOptions, accessToken: '' })).toThrow(
            'An access token is required to fetch tournaments'
        );
        expect(() => new TournamentFetcher({ ...baseOptions, communityId: '' })).toThrow(
            'A community id is required to fetch tournaments'
        );
    });
});
