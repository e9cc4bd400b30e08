/**
 * Carabid Data Storage Service
 * MongoDB-backed storage for the four raw carabid tables of a dataset
 */

import logger from '../../utils/logger';
import {
    FieldSample as FieldSampleModel,
    SortRecord as SortRecordModel,
    PinRecord as PinRecordModel,
    ExpertRecord as ExpertRecordModel,
} from '../../models/CarabidData';
import type { CarabidTables } from './types';

export interface StoredDatasetSummary {
    datasetId: string;
    fieldSamples: number;
    sites: string[];
}

export interface SavedDatasetCounts {
    fieldSamples: number;
    sortRecords: number;
    pinRecords: number;
    expertRecords: number;
}

function withRowIndex<T extends object>(rows: readonly T[], datasetId: string): Array<T & { datasetId: string; rowIndex: number }> {
    return rows.map((row, rowIndex) => ({ ...row, datasetId, rowIndex }));
}

/**
 * Replace a dataset's tables. Rows keep their order through `rowIndex`.
 */
export async function saveCarabidDataset(datasetId: string, tables: CarabidTables): Promise<SavedDatasetCounts> {
    await deleteCarabidDataset(datasetId);

    const counts: SavedDatasetCounts = {
        fieldSamples: tables.fieldSamples.length,
        sortRecords: tables.sortRecords.length,
        pinRecords: tables.pinRecords.length,
        expertRecords: tables.expertRecords.length,
    };

    if (counts.fieldSamples > 0) {
        await FieldSampleModel.insertMany(withRowIndex(tables.fieldSamples, datasetId), { ordered: false });
    }
    if (counts.sortRecords > 0) {
        await SortRecordModel.insertMany(withRowIndex(tables.sortRecords, datasetId), { ordered: false });
    }
    if (counts.pinRecords > 0) {
        await PinRecordModel.insertMany(withRowIndex(tables.pinRecords, datasetId), { ordered: false });
    }
    if (counts.expertRecords > 0) {
        await ExpertRecordModel.insertMany(withRowIndex(tables.expertRecords, datasetId), { ordered: false });
    }

    logger.info(`Saved carabid dataset ${datasetId}: ${JSON.stringify(counts)}`);
    return counts;
}

export async function deleteCarabidDataset(datasetId: string): Promise<number> {
    const results = await Promise.all([
        FieldSampleModel.deleteMany({ datasetId }),
        SortRecordModel.deleteMany({ datasetId }),
        PinRecordModel.deleteMany({ datasetId }),
        ExpertRecordModel.deleteMany({ datasetId }),
    ]);
    const deleted = results.reduce((sum, r) => sum + r.deletedCount, 0);
    if (deleted > 0) {
        logger.info(`Deleted ${deleted} rows of carabid dataset ${datasetId}`);
    }
    return deleted;
}

export async function listCarabidDatasets(): Promise<StoredDatasetSummary[]> {
    const rows = await FieldSampleModel.aggregate<{ _id: string; fieldSamples: number; sites: string[] }>([
        { $group: { _id: '$datasetId', fieldSamples: { $sum: 1 }, sites: { $addToSet: '$siteID' } } },
        { $sort: { _id: 1 } },
    ]);

    return rows.map(r => ({
        datasetId: r._id,
        fieldSamples: r.fieldSamples,
        sites: [...r.sites].sort(),
    }));
}

export default {
    saveCarabidDataset,
    deleteCarabidDataset,
    listCarabidDatasets,
};
