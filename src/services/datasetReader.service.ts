// src/services/datasetReader.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { NoDataError } from '../errors/dataset.errors';
import { RawRecord, RawTable } from '../types/dataset.types';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import { findTabularFiles } from '../utils/dataset/tabularFiles';

@singleton()
export class DatasetReaderService {
    private readonly serviceLogger: Logger;

    constructor(
        @inject(ConfigService) private configService: ConfigService,
        @inject(LoggingService) private loggingService: LoggingService
    ) {
        this.serviceLogger = this.loggingService.getLogger('pipeline', { service: 'DatasetReaderService' });
    }

    /**
     * Parses every tabular file under `workingDir` and concatenates them.
     * Unreadable files are logged and skipped.
     *
     * @throws {NoDataError} When no file could be parsed.
     */
    public async readAll(workingDir: string = this.configService.dataset.dataDir): Promise<RawTable> {
        const logger = this.serviceLogger.child({ operation: 'readAll', workingDir });
        const files = await findTabularFiles(workingDir, this.configService.dataset.tabularExtension);

        const tables: RawTable[] = [];
        for (const file of files) {
            try {
                const content = await fs.promises.readFile(file, 'utf8');
                const table = parseCsv(content);
                tables.push(table);
                logger.debug({ file: path.relative(workingDir, file), rows: table.rows.length, columns: table.columns.length }, 'Parsed tabular file.');
            } catch (error: unknown) {
                const { message } = getErrorMessageAndStack(error);
                logger.warn({ file, errorMessage: message }, 'Skipping unreadable tabular file.');
            }
        }

        if (tables.length === 0) {
            logger.error({ filesSeen: files.length }, 'No tabular file could be parsed.');
            throw new NoDataError(workingDir, files.length);
        }

        const combined = concatTables(tables);
        logger.info({ filesParsed: tables.length, filesSkipped: files.length - tables.length, rows: combined.rows.length }, 'Dataset read.');
        return combined;
    }
}

/**
 * Parses one CSV document using its header row as column names.
 * Empty cells are left out of the record (missing, not empty string).
 * A document without a header row (e.g. an empty file) is rejected.
 */
export function parseCsv(content: string): RawTable {
    let header: string[] = [];
    const records: unknown = parse(content, {
        columns: (firstLine: string[]) => {
            header = firstLine;
            return firstLine;
        },
        bom: true,
        skip_empty_lines: true,
        relax_column_count_less: true,
    });

    if (header.length === 0) {
        throw new Error('CSV document has no header row.');
    }
    if (!Array.isArray(records)) {
        throw new Error('CSV parser did not return a list of records.');
    }

    const rows: RawRecord[] = [];
    for (const record of records) {
        if (!isStringRecord(record)) {
            throw new Error('CSV parser returned a malformed record.');
        }
        const row: RawRecord = {};
        for (const [column, value] of Object.entries(record)) {
            if (value !== undefined && value !== '') {
                row[column] = value;
            }
        }
        rows.push(row);
    }
    return { columns: header, rows };
}

/**
 * Concatenates tables, keeping the union of their columns in first-seen order.
 */
export function concatTables(tables: RawTable[]): RawTable {
    const columns: string[] = [];
    const seen = new Set<string>();
    const rows: RawRecord[] = [];

    for (const table of tables) {
        for (const column of table.columns) {
            if (!seen.has(column)) {
                seen.add(column);
                columns.push(column);
            }
        }
        for (const row of table.rows) {
            rows.push(row);
        }
    }
    return { columns, rows };
}

const isStringRecord = (value: unknown): value is Record<string, string | undefined> =>
    typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.values(value).every(cell => cell === undefined || typeof cell === 'string');
