import type { CarabidTables, DatasetQuery } from '../types';
import { DatasetNotFoundError } from '../errors';
import { CarabidDataProvider, filterTables } from './dataProvider';

/** Tables held in memory, e.g. already parsed by the caller */
export class StaticCarabidDataProvider implements CarabidDataProvider {
    readonly name = 'static';

    constructor(
        private readonly tables: CarabidTables,
        readonly datasetId: string = 'default'
    ) {}

    async loadTables(query: DatasetQuery = {}): Promise<CarabidTables> {
        if (query.datasetId && query.datasetId !== this.datasetId) {
            throw new DatasetNotFoundError(query.datasetId);
        }
        return filterTables(this.tables, query);
    }
}
