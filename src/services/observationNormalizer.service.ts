// src/services/observationNormalizer.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { COLUMN_ALIASES, UNKNOWN_COUNTRY } from '../config/constants';
import { LoggingService } from './logging.service';
import {
    CANONICAL_COLUMNS,
    CanonicalColumn,
    COUNT_COLUMNS,
    ObservationTable,
    RawObservation,
    RawRecord,
    RawTable,
} from '../types/dataset.types';
import { cleanText, parseObservationDate, toCoordinate, toCount } from '../utils/dataset/coercion';

// Always present in a normalized table; counts are zero-filled, text gets its default.
const ALWAYS_PRESENT: ReadonlySet<CanonicalColumn> = new Set<CanonicalColumn>(['country', 'province_state', ...COUNT_COLUMNS]);

const canonicalName = (column: string): string => {
    const trimmed = column.trim();
    return Object.hasOwn(COLUMN_ALIASES, trimmed) ? COLUMN_ALIASES[trimmed] : trimmed;
};

const isCanonicalColumn = (column: string): column is CanonicalColumn =>
    CANONICAL_COLUMNS.some(canonical => canonical === column);

/**
 * Maps a heterogeneous raw table onto the canonical observation schema.
 * Coercion never throws: bad counts become 0, bad dates and coordinates become null.
 */
@singleton()
export class ObservationNormalizerService {
    private readonly serviceLogger: Logger;

    constructor(@inject(LoggingService) private loggingService: LoggingService) {
        this.serviceLogger = this.loggingService.getLogger('pipeline', { service: 'ObservationNormalizerService' });
    }

    public normalize(table: RawTable): ObservationTable {
        const sourceColumns = new Set(table.columns.map(canonicalName));
        const columns = CANONICAL_COLUMNS.filter(column => ALWAYS_PRESENT.has(column) || sourceColumns.has(column));
        const dropped = [...sourceColumns].filter(column => !isCanonicalColumn(column));

        const rows = table.rows.map(row => normalizeRow(renameColumns(row)));

        this.serviceLogger.debug(
            { rows: rows.length, columns, droppedColumns: dropped },
            'Normalized raw table.'
        );
        return { columns, rows };
    }
}

/**
 * Trims column names and applies the alias table. When several source columns map to
 * the same canonical name, the first one holding a value wins.
 */
export function renameColumns(row: RawRecord): RawRecord {
    const renamed: RawRecord = {};
    for (const [column, value] of Object.entries(row)) {
        const name = canonicalName(column);
        if (value !== undefined && renamed[name] === undefined) {
            renamed[name] = value;
        }
    }
    return renamed;
}

export function normalizeRow(row: RawRecord): RawObservation {
    return {
        country: cleanText(row.country) ?? UNKNOWN_COUNTRY,
        province_state: cleanText(row.province_state) ?? '',
        date: parseObservationDate(row.date),
        last_update: parseObservationDate(row.last_update),
        confirmed: toCount(row.confirmed),
        deaths: toCount(row.deaths),
        recovered: toCount(row.recovered),
        lat: toCoordinate(row.lat),
        lon: toCoordinate(row.lon),
    };
}
