/**
 * CSV directory provider
 *
 * Reads a cached dataset laid out as one CSV per table:
 *   field_samples.csv, sorting.csv, pinning.csv, expert_taxonomy.csv
 * With a datasetId the files are read from <baseDir>/<datasetId>.
 */

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import logger from '../../../utils/logger';
import { AppError } from '../../../middleware/errorHandler';
import { DatasetNotFoundError, InvalidQueryError } from '../errors';
import { mapCarabidTables, RawRow } from '../rowMapping';
import type { CarabidTables, DatasetQuery } from '../types';
import { CarabidDataProvider, filterTables } from './dataProvider';

export const TABLE_FILES = {
    fieldSamples: 'field_samples.csv',
    sortRecords: 'sorting.csv',
    pinRecords: 'pinning.csv',
    expertRecords: 'expert_taxonomy.csv',
} as const;

const DATASET_ID = /^[\w.-]+$/;

function isRawRow(value: unknown): value is RawRow {
    return typeof value === 'object' && value !== null;
}

export function parseCsv(content: string): RawRow[] {
    const records: unknown = parse(content.replace(/^\uFEFF/, ''), {
        columns: true,
        skip_empty_lines: true,
        relax_column_count: true,
        trim: true,
    });
    return Array.isArray(records) ? records.filter(isRawRow) : [];
}

// fs errors can come from another realm, so match on shape
function isMissingFile(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function readTable(dir: string, file: string, optional: boolean): Promise<RawRow[]> {
    const filePath = path.join(dir, file);
    try {
        const content = await fs.promises.readFile(filePath, 'utf-8');
        return parseCsv(content);
    } catch (error) {
        if (optional && isMissingFile(error)) {
            logger.debug(`${file} not found in ${dir}; treating it as empty`);
            return [];
        }
        throw error;
    }
}

export class FileCarabidDataProvider implements CarabidDataProvider {
    readonly name = 'file';

    constructor(readonly baseDir: string) {}

    resolveDir(datasetId?: string): string {
        if (!datasetId) return this.baseDir;
        if (!DATASET_ID.test(datasetId) || datasetId === '.' || datasetId === '..') {
            throw new InvalidQueryError(`Invalid datasetId "${datasetId}"`, { datasetId });
        }
        return path.join(this.baseDir, datasetId);
    }

    async loadTables(query: DatasetQuery = {}): Promise<CarabidTables> {
        const dir = this.resolveDir(query.datasetId);
        if (!fs.existsSync(dir)) {
            if (query.datasetId) throw new DatasetNotFoundError(query.datasetId);
            throw new AppError(`Data directory ${dir} does not exist`, 500);
        }

        const [fieldSamples, sortRecords, pinRecords, expertRecords] = await Promise.all([
            readTable(dir, TABLE_FILES.fieldSamples, false),
            readTable(dir, TABLE_FILES.sortRecords, false),
            readTable(dir, TABLE_FILES.pinRecords, true),
            readTable(dir, TABLE_FILES.expertRecords, true),
        ]);
        logger.info(
            `Loaded carabid tables from ${dir}: ${fieldSamples.length} field samples, ` +
            `${sortRecords.length} sort, ${pinRecords.length} pin, ${expertRecords.length} expert rows`
        );

        const tables = mapCarabidTables({ fieldSamples, sortRecords, pinRecords, expertRecords });
        return filterTables(tables, query);
    }
}
