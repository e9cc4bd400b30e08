/**
 * Count table export
 *
 * Serializes CountRow tables with a fixed column order:
 * - CSV (json2csv)
 * - Excel (xlsx), with an integrity summary sheet when a report is given
 * - JSON
 */

import fs from 'fs';
import path from 'path';
import { Parser } from 'json2csv';
import xlsx from 'xlsx';
import logger from '../../utils/logger';
import { AppError } from '../../middleware/errorHandler';
import { COUNT_TABLE_COLUMNS } from '../carabid/countAggregator';
import type { CountRow, IntegrityReport } from '../carabid/types';

export type CountTableFormat = 'csv' | 'xlsx' | 'json';

export const COUNT_TABLE_FORMATS: readonly CountTableFormat[] = ['csv', 'xlsx', 'json'];

export function isCountTableFormat(value: string): value is CountTableFormat {
    return COUNT_TABLE_FORMATS.some(format => format === value);
}

export function countTableToCsv(rows: readonly CountRow[]): string {
    const parser = new Parser<CountRow>({ fields: [...COUNT_TABLE_COLUMNS] });
    return parser.parse([...rows]);
}

export function countTableToXlsx(rows: readonly CountRow[], integrity?: IntegrityReport): Buffer {
    const workbook = xlsx.utils.book_new();

    const worksheet = xlsx.utils.json_to_sheet([...rows], { header: [...COUNT_TABLE_COLUMNS] });
    xlsx.utils.book_append_sheet(workbook, worksheet, 'counts');

    if (integrity) {
        const summary = xlsx.utils.json_to_sheet([{
            exportDate: new Date().toISOString(),
            countRows: rows.length,
            declaredTotal: integrity.declaredTotal,
            reconciledTotal: integrity.reconciledTotal,
            countedTotal: integrity.countedTotal,
            subsampleMismatches: integrity.subsampleMismatches.length,
        }]);
        xlsx.utils.book_append_sheet(workbook, summary, 'integrity');
    }

    const buffer: unknown = xlsx.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    if (!Buffer.isBuffer(buffer)) {
        throw new AppError('xlsx did not produce a buffer');
    }
    return buffer;
}

export function countTableToJson(rows: readonly CountRow[]): string {
    const ordered = rows.map(row => Object.fromEntries(COUNT_TABLE_COLUMNS.map(column => [column, row[column] ?? null])));
    return JSON.stringify(ordered, null, 2);
}

export function formatFromPath(filePath: string): CountTableFormat {
    const ext = path.extname(filePath).toLowerCase().replace('.', '');
    if (!isCountTableFormat(ext)) {
        throw new AppError(`Unsupported output format "${ext || filePath}" (expected ${COUNT_TABLE_FORMATS.join(', ')})`, 400);
    }
    return ext;
}

/**
 * Write a count table, picking the format from the file extension
 */
export async function writeCountTable(
    rows: readonly CountRow[],
    filePath: string,
    integrity?: IntegrityReport
): Promise<CountTableFormat> {
    const format = formatFromPath(filePath);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

    switch (format) {
        case 'csv':
            await fs.promises.writeFile(filePath, countTableToCsv(rows), 'utf-8');
            break;
        case 'xlsx':
            await fs.promises.writeFile(filePath, countTableToXlsx(rows, integrity));
            break;
        case 'json':
            await fs.promises.writeFile(filePath, countTableToJson(rows), 'utf-8');
            break;
    }

    logger.info(`Wrote ${rows.length} count rows to ${filePath}`);
    return format;
}

export default {
    countTableToCsv,
    countTableToXlsx,
    countTableToJson,
    writeCountTable,
};
