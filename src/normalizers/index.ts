/**
 * Normalizer entry point
 * Extracts, year-filters and normalizes a page of raw entries
 */
import { logger as defaultLogger, type Logger } from '../observability/logger.js';
import { isInYear } from './dates.js';
import { extractAttributes, isRecord, normalizeTournament } from './tournament.normalizer.js';
import type { TournamentRecord } from './types.js';

/**
 * Result of normalization for a page
 */
export interface NormalizationResult {
    normalized: TournamentRecord[];
    skipped: number;
}

/**
 * Normalize the entries of one page, keeping API order.
 * Entries outside the target year are skipped, as are non-object entries.
 */
export function normalizeEntries(
    entries: readonly unknown[],
    year: number,
    log: Logger = defaultLogger
): NormalizationResult {
    const normalized: TournamentRecord[] = [];
    let skipped = 0;

    for (const entry of entries) {
        if (!isRecord(entry)) {
            log.warn('Skipping malformed tournament entry', { entryType: typeof entry });
            skipped++;
            continue;
        }

        const attributes = extractAttributes(entry);
        if (!isInYear(attributes, year)) {
            skipped++;
            continue;
        }

        normalized.push(normalizeTournament(attributes));
    }

    log.debug('Page normalization complete', {
        total: entries.length,
        normalized: normalized.length,
        skipped,
    });

    return { normalized, skipped };
}

// Re-export types and helpers
export * from './types.js';
export { parseDate, isInYear, type ParsedDate } from './dates.js';
export {
    extractAttributes,
    mergeTimestamps,
    normalizeTournament,
    resolveParticipantsCount,
} from './tournament.normalizer.js';
