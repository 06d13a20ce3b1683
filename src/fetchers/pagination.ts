/**
 * Pagination strategies
 *
 * - meta:   follow meta.next_page, or links.next + current page + 1, bounded by total_pages
 * - legacy: keep incrementing the page number until a page comes back empty
 */
import type { PaginationMode } from '../config/index.js';
import type { TournamentPage } from './types.js';

/**
 * Next page number from pagination metadata, or null when there is none
 */
export function nextPageFromMeta(page: TournamentPage, currentPage: number): number | null {
    const metaCurrent = page.meta?.current_page ?? currentPage;

    const candidate = page.meta?.next_page || (page.links?.next ? metaCurrent + 1 : null);
    if (!candidate) return null;

    const totalPages = page.meta?.total_pages;
    if (totalPages && candidate > totalPages) return null;

    // never walk backwards or re-request the same page
    if (candidate <= currentPage) return null;

    return candidate;
}

/**
 * Next page number for the page-increment-until-empty API variant
 */
export function nextPageUntilEmpty(page: TournamentPage, currentPage: number): number | null {
    const data = page.data ?? [];
    return data.length === 0 ? null : currentPage + 1;
}

export function nextPage(
    mode: PaginationMode,
    page: TournamentPage,
    currentPage: number
): number | null {
    return mode === 'legacy'
        ? nextPageUntilEmpty(page, currentPage)
        : nextPageFromMeta(page, currentPage);
}
