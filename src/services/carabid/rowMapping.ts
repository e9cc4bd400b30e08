/**
 * Row mapping for raw carabid tables
 *
 * Providers hand over loosely typed rows (CSV strings, Mongo documents).
 * These helpers coerce them into typed records and stop the run on rows
 * whose keys or dates cannot be trusted.
 */

import { toCalendarDate } from '../../utils/dates';
import { DataIntegrityError, CarabidTable } from './errors';
import type {
    CarabidTables,
    ExpertRecord,
    FieldSample,
    PinRecord,
    SortRecord,
} from './types';

export type RawRow = Record<string, unknown>;

export interface RawCarabidTables {
    fieldSamples: RawRow[];
    sortRecords: RawRow[];
    pinRecords: RawRow[];
    expertRecords: RawRow[];
}

const TRUTHY = ['true', 'y', 'yes', '1'];

function text(row: RawRow, ...fields: string[]): string | undefined {
    for (const field of fields) {
        const value = row[field];
        if (value === undefined || value === null) continue;
        const str = (value instanceof Date ? value.toISOString() : String(value)).trim();
        if (str.length > 0) return str;
    }
    return undefined;
}

function required(table: CarabidTable, rowIndex: number, row: RawRow, field: string, key?: string): string {
    const value = text(row, field);
    if (value === undefined) {
        throw new DataIntegrityError(`missing required field "${field}"`, { table, rowIndex, key, field });
    }
    return value;
}

function flag(row: RawRow, ...fields: string[]): boolean {
    for (const field of fields) {
        const value = row[field];
        if (typeof value === 'boolean') return value;
        if (typeof value === 'number') return value !== 0;
        if (typeof value === 'string' && value.trim() !== '') {
            return TRUTHY.includes(value.trim().toLowerCase());
        }
    }
    return false;
}

function requiredDate(rowIndex: number, row: RawRow, field: 'setDate' | 'collectDate', key: string): string {
    const raw = text(row, field);
    const date = toCalendarDate(raw);
    if (!date) {
        const reason = raw === undefined
            ? `missing required field "${field}"`
            : `unparseable ${field} "${raw}"`;
        throw new DataIntegrityError(reason, { table: 'fieldSamples', rowIndex, key, field });
    }
    return date;
}

export function mapFieldSamples(rows: RawRow[]): FieldSample[] {
    return rows.map((row, rowIndex) => {
        const sampleID = required('fieldSamples', rowIndex, row, 'sampleID');
        const collected = flag(row, 'collected', 'sampleCollected');

        // Uncollected traps often have no collectDate; they are filtered out later
        const setDate = collected
            ? requiredDate(rowIndex, row, 'setDate', sampleID)
            : toCalendarDate(text(row, 'setDate')) ?? '';
        const collectDate = collected
            ? requiredDate(rowIndex, row, 'collectDate', sampleID)
            : toCalendarDate(text(row, 'collectDate')) ?? '';

        return {
            sampleID,
            domainID: text(row, 'domainID') ?? '',
            siteID: required('fieldSamples', rowIndex, row, 'siteID', sampleID),
            plotID: text(row, 'plotID') ?? '',
            trapID: required('fieldSamples', rowIndex, row, 'trapID', sampleID),
            setDate,
            collectDate,
            eventID: text(row, 'eventID'),
            collected,
        };
    });
}

export function mapSortRecords(rows: RawRow[]): SortRecord[] {
    return rows.map((row, rowIndex) => {
        const subsampleID = required('sortRecords', rowIndex, row, 'subsampleID');
        const countRaw = text(row, 'individualCount');
        const individualCount = countRaw !== undefined && /^\d+$/.test(countRaw) ? Number(countRaw) : NaN;
        if (!Number.isInteger(individualCount) || individualCount < 1) {
            throw new DataIntegrityError(`individualCount must be a whole number of at least 1, got "${countRaw ?? ''}"`, {
                table: 'sortRecords',
                rowIndex,
                key: subsampleID,
                field: 'individualCount',
            });
        }

        return {
            sampleID: required('sortRecords', rowIndex, row, 'sampleID', subsampleID),
            subsampleID,
            sampleType: text(row, 'sampleType') ?? '',
            taxonID: required('sortRecords', rowIndex, row, 'taxonID', subsampleID),
            scientificName: text(row, 'scientificName'),
            taxonRank: text(row, 'taxonRank'),
            individualCount,
            identificationQualifier: text(row, 'identificationQualifier'),
        };
    });
}

export function mapPinRecords(rows: RawRow[]): PinRecord[] {
    return rows.map((row, rowIndex) => {
        const individualID = required('pinRecords', rowIndex, row, 'individualID');
        return {
            subsampleID: required('pinRecords', rowIndex, row, 'subsampleID', individualID),
            individualID,
            taxonID: required('pinRecords', rowIndex, row, 'taxonID', individualID),
            scientificName: text(row, 'scientificName'),
            taxonRank: text(row, 'taxonRank'),
            identificationQualifier: text(row, 'identificationQualifier'),
        };
    });
}

export function mapExpertRecords(rows: RawRow[]): ExpertRecord[] {
    return rows.map((row, rowIndex) => {
        const individualID = required('expertRecords', rowIndex, row, 'individualID');
        return {
            individualID,
            taxonID: required('expertRecords', rowIndex, row, 'taxonID', individualID),
            scientificName: text(row, 'scientificName'),
            taxonRank: text(row, 'taxonRank'),
            identificationQualifier: text(row, 'identificationQualifier'),
        };
    });
}

export function mapCarabidTables(raw: RawCarabidTables): CarabidTables {
    return {
        fieldSamples: mapFieldSamples(raw.fieldSamples),
        sortRecords: mapSortRecords(raw.sortRecords),
        pinRecords: mapPinRecords(raw.pinRecords),
        expertRecords: mapExpertRecords(raw.expertRecords),
    };
}
