/**
 * Tournament Normalizer
 * Flattens JSON:API tournament entries into the ten-column export record
 */
import { TIMESTAMP_FIELDS } from './types.js';
import type { CellValue, TournamentRecord } from './types.js';
import type { RawTournamentEntry, TournamentAttributes } from '../fetchers/types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk nested mappings, returning undefined as soon as a step is not a mapping
 */
function getPath(value: unknown, ...keys: string[]): unknown {
    let current = value;
    for (const key of keys) {
        if (!isRecord(current)) return undefined;
        current = current[key];
    }
    return current;
}

function isBlank(value: unknown): boolean {
    return value === undefined || value === null || value === '';
}

/**
 * Copy values from `attributes.timestamps` into absent top-level date fields.
 * Top-level values always win.
 */
export function mergeTimestamps(attributes: TournamentAttributes): void {
    const timestamps = attributes.timestamps;
    if (!isRecord(timestamps)) return;

    for (const key of TIMESTAMP_FIELDS) {
        if (isBlank(attributes[key]) && !isBlank(timestamps[key])) {
            attributes[key] = timestamps[key];
        }
    }
}

/**
 * Participant count from, in order: the attribute itself,
 * relationships.participants.count, .meta.count, .links.meta.count
 */
export function resolveParticipantsCount(
    attributes: TournamentAttributes,
    relationships: unknown
): unknown {
    const participants = getPath(relationships, 'participants');

    return attributes.participants_count
        ?? getPath(participants, 'count')
        ?? getPath(participants, 'meta', 'count')
        ?? getPath(participants, 'links', 'meta', 'count')
        ?? null;
}

/**
 * Build the attribute mapping for one raw entry. Never throws.
 */
export function extractAttributes(entry: RawTournamentEntry): TournamentAttributes {
    const attributes: TournamentAttributes = isRecord(entry.attributes) ? { ...entry.attributes } : {};

    if (isBlank(attributes.id)) {
        attributes.id = entry.id ?? null;
    }

    mergeTimestamps(attributes);
    attributes.participants_count = resolveParticipantsCount(attributes, entry.relationships);

    return attributes;
}

function toCell(value: unknown): CellValue {
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    return null;
}

/**
 * Project attributes onto the canonical record, in canonical field order
 */
export function normalizeTournament(attributes: TournamentAttributes): TournamentRecord {
    return {
        id: toCell(attributes.id),
        name: toCell(attributes.name),
        url: toCell(attributes.url),
        full_challonge_url: toCell(attributes.full_challonge_url),
        state: toCell(attributes.state),
        game_name: toCell(attributes.game_name),
        participants_count: toCell(attributes.participants_count),
        created_at: toCell(attributes.created_at),
        started_at: toCell(attributes.started_at),
        completed_at: toCell(attributes.completed_at),
    };
}
