/**
 * Carabid count pipeline
 *
 * field samples -> trapping records -> (join sorting) -> pin and expert
 * overrides -> counts per trap collection and taxon
 */

import logger from '../../utils/logger';
import { getPipelineConfig, PipelineConfig } from '../../config/pipeline';
import { normalizeFieldSamples } from './sampleNormalizer';
import { mergeIdentifications } from './identificationMerger';
import { aggregateCounts } from './countAggregator';
import { checkCountConservation } from './integrityCheck';
import { IntegrityViolationError } from './errors';
import type { CarabidDataProvider } from './providers/dataProvider';
import type { CarabidTables, DatasetQuery, IntegrityReport, PipelineResult } from './types';

export type PipelineOptions = Partial<PipelineConfig>;

function reportIntegrity(report: IntegrityReport, failOnViolation: boolean): void {
    if (report.ok) return;
    if (failOnViolation) {
        throw new IntegrityViolationError(report);
    }

    logger.warn(
        `Count conservation violated: ${report.declaredTotal} declared, ` +
        `${report.reconciledTotal} reconciled, ${report.countedTotal} counted`
    );
    for (const mismatch of report.subsampleMismatches) {
        logger.warn(
            `Subsample ${mismatch.subsampleID}: declared ${mismatch.declared}, reconciled ${mismatch.reconciled}`
        );
    }
}

/**
 * Pure pipeline over already-loaded tables.
 */
export function reconcileCarabidCounts(tables: CarabidTables, options: PipelineOptions = {}): PipelineResult {
    const config = { ...getPipelineConfig(), ...options };

    const trappingRecords = normalizeFieldSamples(tables.fieldSamples, {
        eventSeparatorPattern: config.eventSeparatorPattern,
    });

    const merged = mergeIdentifications(trappingRecords, tables, {
        admittedSampleTypes: config.admittedSampleTypes,
    });

    const counts = aggregateCounts(merged.reconciled);
    const integrity = checkCountConservation(merged.subsamples, merged.reconciled, counts);
    reportIntegrity(integrity, config.failOnIntegrityViolation);

    return {
        trappingRecords,
        reconciled: merged.reconciled,
        counts,
        integrity,
        stats: {
            fieldSamples: tables.fieldSamples.length,
            collectedSamples: trappingRecords.length,
            ...merged.stats,
            countRows: counts.length,
        },
    };
}

export class CarabidCountPipeline {
    constructor(
        private readonly provider: CarabidDataProvider,
        private readonly options: PipelineOptions = {}
    ) {}

    get providerName(): string {
        return this.provider.name;
    }

    async run(query: DatasetQuery = {}): Promise<PipelineResult> {
        const started = Date.now();
        const tables = await this.provider.loadTables(query);
        const result = reconcileCarabidCounts(tables, this.options);

        logger.info(
            `Carabid pipeline (${this.provider.name}) finished in ${Date.now() - started}ms: ` +
            `${result.stats.collectedSamples} collected samples, ${result.reconciled.length} reconciled rows, ` +
            `${result.counts.length} count rows`
        );
        return result;
    }
}

export default CarabidCountPipeline;
