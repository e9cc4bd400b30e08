/**
 * Count Aggregator
 *
 * Collapses reconciled individuals into one count per trap collection and
 * taxon. Provenance columns (subsample, individual, identification source
 * and qualifier) are projected out before grouping.
 */

import { compositeKey } from '../../utils/tableOps';
import type { CountRow, ReconciledIndividual } from './types';

/** Output column order; downstream consumers rely on it */
export const COUNT_TABLE_COLUMNS = [
    'sampleID',
    'domainID',
    'siteID',
    'plotID',
    'trapID',
    'collectDate',
    'trappingDays',
    'boutID',
    'taxonID',
    'scientificName',
    'taxonRank',
    'count',
] as const satisfies ReadonlyArray<keyof CountRow>;

export function projectCountKey(row: ReconciledIndividual): Omit<CountRow, 'count'> {
    return {
        sampleID: row.sampleID,
        domainID: row.domainID,
        siteID: row.siteID,
        plotID: row.plotID,
        trapID: row.trapID,
        collectDate: row.collectDate,
        trappingDays: row.trappingDays,
        boutID: row.boutID,
        taxonID: row.taxonID,
        scientificName: row.scientificName,
        taxonRank: row.taxonRank,
    };
}

export function aggregateCounts(rows: readonly ReconciledIndividual[]): CountRow[] {
    const groups = new Map<string, CountRow>();

    for (const row of rows) {
        const key = projectCountKey(row);
        const id = compositeKey([
            key.sampleID,
            key.domainID,
            key.siteID,
            key.plotID,
            key.trapID,
            key.collectDate,
            key.trappingDays,
            key.boutID,
            key.taxonID,
            key.scientificName,
            key.taxonRank,
        ]);

        const existing = groups.get(id);
        if (existing) {
            existing.count += row.individualCount;
        } else {
            groups.set(id, { ...key, count: row.individualCount });
        }
    }

    return Array.from(groups.values());
}

export default { aggregateCounts, projectCountKey, COUNT_TABLE_COLUMNS };
