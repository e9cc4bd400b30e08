/**
 * Carabid Services Index
 */

// Sample normalization (trapping days, bouts)
import sampleNormalizer from './sampleNormalizer';
export { sampleNormalizer };
export { normalizeFieldSamples } from './sampleNormalizer';

// Identification merging (sort -> pin -> expert)
import identificationMerger from './identificationMerger';
export { identificationMerger };
export { mergeIdentifications, resolveIdentification, resolveTaxonomy } from './identificationMerger';
export type { SortedSubsample, MergeStats, MergeResult, ResolvedIdentification } from './identificationMerger';

// Count aggregation
import countAggregator from './countAggregator';
export { countAggregator };
export { aggregateCounts, COUNT_TABLE_COLUMNS } from './countAggregator';

export { checkCountConservation } from './integrityCheck';
export { reconcileCarabidCounts, CarabidCountPipeline } from './pipeline';
export type { PipelineOptions } from './pipeline';

// Data providers and storage
export type { CarabidDataProvider } from './providers/dataProvider';
export { StaticCarabidDataProvider } from './providers/staticProvider';
export { FileCarabidDataProvider } from './providers/fileProvider';
export { MongoCarabidDataProvider } from './providers/mongoProvider';
import dataStorage from './dataStorage';
export { dataStorage };

export { mapCarabidTables } from './rowMapping';
export * from './errors';
export type * from './types';
