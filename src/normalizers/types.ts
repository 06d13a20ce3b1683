/**
 * Normalizer types and interfaces
 */

/**
 * Canonical field order. The CSV header is emitted in this order.
 */
export const TOURNAMENT_FIELDS = [
    'id',
    'name',
    'url',
    'full_challonge_url',
    'state',
    'game_name',
    'participants_count',
    'created_at',
    'started_at',
    'completed_at',
] as const;

export type TournamentField = typeof TOURNAMENT_FIELDS[number];

export type CellValue = string | number | boolean | null;

/**
 * Flat tournament record ready for CSV export. Every field is always present.
 */
export type TournamentRecord = Record<TournamentField, CellValue>;

/**
 * Date fields checked by the year filter, in priority order.
 * starts_at is the legacy alias of started_at.
 */
export const YEAR_FILTER_FIELDS = ['started_at', 'starts_at', 'created_at'] as const;

/**
 * Fields backfilled from the nested timestamps mapping
 */
export const TIMESTAMP_FIELDS = ['created_at', 'started_at', 'completed_at', 'starts_at'] as const;
