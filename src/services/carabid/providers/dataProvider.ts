import type { CarabidTables, DatasetQuery, FieldSample } from '../types';

/**
 * Source of the four carabid tables. Providers own their I/O and caching;
 * the pipeline only asks for tables.
 */
export interface CarabidDataProvider {
    readonly name: string;
    loadTables(query?: DatasetQuery): Promise<CarabidTables>;
}

/** Site and collect-date filters applied to field samples */
export function matchesQuery(sample: FieldSample, query: DatasetQuery = {}): boolean {
    if (query.siteIDs && query.siteIDs.length > 0 && !query.siteIDs.includes(sample.siteID)) {
        return false;
    }
    if (query.startDate && sample.collectDate < query.startDate) return false;
    if (query.endDate && sample.collectDate > query.endDate) return false;
    return true;
}

export function filterTables(tables: CarabidTables, query: DatasetQuery = {}): CarabidTables {
    return {
        ...tables,
        fieldSamples: tables.fieldSamples.filter(s => matchesQuery(s, query)),
    };
}
