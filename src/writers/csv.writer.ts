/**
 * CSV Writer
 * Serializes canonical tournament records with a fixed header
 */
import { writeFile } from 'fs/promises';
import { stringify } from 'csv-stringify/sync';
import { createLogger } from '../observability/logger.js';
import { TOURNAMENT_FIELDS, type TournamentRecord } from '../normalizers/types.js';

const log = createLogger({ stage: 'write' });

/**
 * CSV text: header row, then one row per record in input order.
 * Null values become empty cells.
 */
export function toCsv(records: Iterable<TournamentRecord>): string {
    const rows = Array.from(records);

    if (rows.length === 0) {
        return stringify([[...TOURNAMENT_FIELDS]], { record_delimiter: 'unix' });
    }

    return stringify(rows, {
        header: true,
        columns: [...TOURNAMENT_FIELDS],
        record_delimiter: 'unix',
        cast: {
            boolean: (value) => String(value),
        },
    });
}

/**
 * Write records to `outputPath`, replacing any existing file
 */
export async function writeCsv(records: Iterable<TournamentRecord>, outputPath: string): Promise<number> {
    const rows = Array.from(records);
    const csv = toCsv(rows);

    await writeFile(outputPath, csv, { encoding: 'utf8' });

    log.info('CSV written', { outputPath, rows: rows.length });
    return rows.length;
}
