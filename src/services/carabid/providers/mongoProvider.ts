import type { FilterQuery } from 'mongoose';
import logger from '../../../utils/logger';
import {
    FieldSample as FieldSampleModel,
    SortRecord as SortRecordModel,
    PinRecord as PinRecordModel,
    ExpertRecord as ExpertRecordModel,
    IFieldSample,
} from '../../../models/CarabidData';
import { DatasetNotFoundError } from '../errors';
import { mapCarabidTables, RawRow } from '../rowMapping';
import type { CarabidTables, DatasetQuery } from '../types';
import { CarabidDataProvider, filterTables } from './dataProvider';

/**
 * Reads a dataset stored by saveCarabidDataset. Expects an open mongoose
 * connection; the caller owns connecting and disconnecting.
 */
export class MongoCarabidDataProvider implements CarabidDataProvider {
    readonly name = 'mongodb';

    constructor(readonly defaultDatasetId: string = 'default') {}

    async loadTables(query: DatasetQuery = {}): Promise<CarabidTables> {
        const datasetId = query.datasetId || this.defaultDatasetId;

        if (!(await FieldSampleModel.exists({ datasetId }))) {
            throw new DatasetNotFoundError(datasetId);
        }

        const sampleFilter: FilterQuery<IFieldSample> = { datasetId };
        if (query.siteIDs && query.siteIDs.length > 0) {
            sampleFilter.siteID = { $in: query.siteIDs };
        }

        const [fieldSamples, sortRecords, pinRecords, expertRecords] = await Promise.all([
            FieldSampleModel.find(sampleFilter).sort({ rowIndex: 1 }).lean<RawRow[]>().exec(),
            SortRecordModel.find({ datasetId }).sort({ rowIndex: 1 }).lean<RawRow[]>().exec(),
            PinRecordModel.find({ datasetId }).sort({ rowIndex: 1 }).lean<RawRow[]>().exec(),
            ExpertRecordModel.find({ datasetId }).sort({ rowIndex: 1 }).lean<RawRow[]>().exec(),
        ]);
        logger.debug(`Loaded carabid dataset ${datasetId} from MongoDB: ${fieldSamples.length} field samples`);

        return filterTables(
            mapCarabidTables({ fieldSamples, sortRecords, pinRecords, expertRecords }),
            query
        );
    }
}
