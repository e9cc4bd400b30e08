/**
 * Identification Merger
 *
 * Reconciles the three identification tiers of the carabid protocol into
 * one identification per individual (or per residual group):
 *
 *   1. sort   - field technicians sort a trap's catch into subsamples
 *   2. pin    - a subset of each subsample is pinned and re-identified
 *   3. expert - taxonomists re-examine a subset of the pinned specimens
 *
 * Each unit collects candidate identifications pass by pass and the
 * highest-precedence candidate wins. A higher tier only overrides; it
 * never removes individuals or blanks a field a lower tier filled, so every
 * subsample keeps its declared count.
 *
 * An expert call on one pinned specimen is not carried over to the
 * un-pinned remainder of its subsample, even when they shared a sort-level
 * taxon. Subsamples can therefore end up split across several final taxa.
 */

import logger from '../../utils/logger';
import { distinctBy, groupBy, indexFirst } from '../../utils/tableOps';
import { DEFAULT_SAMPLE_TYPES } from '../../config/pipeline';
import type {
    ExpertRecord,
    Identification,
    IdentificationSource,
    PinRecord,
    ReconciledIndividual,
    SortRecord,
    TrappingRecord,
} from './types';

export const SOURCE_PRECEDENCE: Record<IdentificationSource, number> = {
    sort: 0,
    pin: 1,
    expert: 2,
};

export interface MergeOptions {
    admittedSampleTypes?: string[];
}

export interface SortedSubsample {
    trapping: TrappingRecord;
    sort: SortRecord;
}

export interface MergeStats {
    admittedSortRecords: number;
    droppedSortRecords: number;
    bycatchSortRecords: number;
    pinnedIndividuals: number;
    excludedExpertIndividuals: number;
    expertOverrides: number;
    residualRows: number;
}

export interface MergeResult {
    subsamples: SortedSubsample[];
    reconciled: ReconciledIndividual[];
    stats: MergeStats;
}

export interface ResolvedIdentification {
    source: IdentificationSource;
    taxonID: string;
    scientificName?: string;
    taxonRank?: string;
    identificationQualifier?: string;
}

interface IdentifiedUnit {
    subsample: SortedSubsample;
    individualID?: string;
    individualCount: number;
    candidates: Identification[];
}

function identify(source: IdentificationSource, record: SortRecord | PinRecord | ExpertRecord): Identification {
    return {
        source,
        taxon: {
            taxonID: record.taxonID,
            scientificName: record.scientificName,
            taxonRank: record.taxonRank,
        },
        identificationQualifier: record.identificationQualifier,
    };
}

/**
 * Pick the most authoritative identification. Among candidates of the same
 * tier the earliest one wins.
 */
export function resolveIdentification(candidates: readonly Identification[]): Identification {
    if (candidates.length === 0) {
        throw new Error('resolveIdentification needs at least one candidate');
    }
    return candidates.reduce((best, candidate) =>
        SOURCE_PRECEDENCE[candidate.source] > SOURCE_PRECEDENCE[best.source] ? candidate : best
    );
}

/** Individuals whose expert records disagree on taxonID */
export function findInconsistentExperts(expertRecords: readonly ExpertRecord[]): Set<string> {
    const inconsistent = new Set<string>();
    for (const [individualID, records] of groupBy(expertRecords, r => r.individualID)) {
        if (new Set(records.map(r => r.taxonID)).size > 1) {
            inconsistent.add(individualID);
        }
    }
    return inconsistent;
}

function isAdmitted(sampleType: string, admitted: ReadonlySet<string>): boolean {
    return admitted.has(sampleType.trim().toLowerCase());
}

/**
 * Pass 1: pair each admitted sort record with its trapping record.
 * Sort rows for samples that were not collected (or never recorded) drop out.
 */
export function joinSortRecords(
    trappingRecords: readonly TrappingRecord[],
    sortRecords: readonly SortRecord[],
    admittedSampleTypes: readonly string[] = DEFAULT_SAMPLE_TYPES
): { subsamples: SortedSubsample[]; dropped: number; bycatch: number } {
    const admitted = new Set(admittedSampleTypes.map(t => t.trim().toLowerCase()));
    const trappingBySample = indexFirst(trappingRecords, r => r.sampleID);

    const subsamples: SortedSubsample[] = [];
    let dropped = 0;
    let bycatch = 0;

    for (const sort of sortRecords) {
        if (!isAdmitted(sort.sampleType, admitted)) {
            bycatch++;
            continue;
        }
        const trapping = trappingBySample.get(sort.sampleID);
        if (!trapping) {
            dropped++;
            continue;
        }
        subsamples.push({ trapping, sort });
    }

    return { subsamples, dropped, bycatch };
}

/**
 * Pass 2: split each subsample into one unit per pinned individual plus a
 * residual unit for whatever was not pinned.
 */
function applyPins(subsamples: readonly SortedSubsample[], pinRecords: readonly PinRecord[]): IdentifiedUnit[] {
    const pinsBySubsample = groupBy(pinRecords, p => p.subsampleID);
    const units: IdentifiedUnit[] = [];

    for (const subsample of subsamples) {
        const sortIdentification = identify('sort', subsample.sort);
        const pins = distinctBy(pinsBySubsample.get(subsample.sort.subsampleID) ?? [], p => p.individualID);

        for (const pin of pins) {
            units.push({
                subsample,
                individualID: pin.individualID,
                individualCount: 1,
                candidates: [sortIdentification, identify('pin', pin)],
            });
        }

        const remainder = subsample.sort.individualCount - pins.length;
        if (pins.length === 0 || remainder > 0) {
            units.push({
                subsample,
                individualCount: pins.length === 0 ? subsample.sort.individualCount : remainder,
                candidates: [sortIdentification],
            });
        }
    }

    return units;
}

/** Pass 3: add the expert identification to pinned units that have one */
function applyExperts(
    units: IdentifiedUnit[],
    expertRecords: readonly ExpertRecord[],
    excluded: ReadonlySet<string>
): number {
    const experts = indexFirst(
        expertRecords.filter(r => !excluded.has(r.individualID)),
        r => r.individualID
    );

    let overrides = 0;
    for (const unit of units) {
        if (unit.individualID === undefined) continue;
        const expert = experts.get(unit.individualID);
        if (expert) {
            unit.candidates.push(identify('expert', expert));
            overrides++;
        }
    }
    return overrides;
}

/**
 * Fill each taxonomy field from the highest-ranked candidate that has it.
 * The winning candidate fixes taxonID and source; a blank name, rank or
 * qualifier on a higher tier leaves the lower tier's value in place.
 */
export function resolveTaxonomy(candidates: readonly Identification[]): ResolvedIdentification {
    const winner = resolveIdentification(candidates);
    const ranked = candidates
        .map((candidate, index) => ({ candidate, index }))
        .sort((a, b) => SOURCE_PRECEDENCE[b.candidate.source] - SOURCE_PRECEDENCE[a.candidate.source] || a.index - b.index)
        .map(({ candidate }) => candidate);
    const firstWith = (pick: (candidate: Identification) => string | undefined) =>
        ranked.map(pick).find(value => value !== undefined);

    return {
        source: winner.source,
        taxonID: winner.taxon.taxonID,
        scientificName: firstWith(c => c.taxon.scientificName),
        taxonRank: firstWith(c => c.taxon.taxonRank),
        identificationQualifier: firstWith(c => c.identificationQualifier),
    };
}

function toReconciled(unit: IdentifiedUnit): ReconciledIndividual {
    const { trapping, sort } = unit.subsample;
    const resolved = resolveTaxonomy(unit.candidates);
    return {
        ...trapping,
        subsampleID: sort.subsampleID,
        sampleType: sort.sampleType,
        individualID: unit.individualID,
        taxonID: resolved.taxonID,
        scientificName: resolved.scientificName,
        taxonRank: resolved.taxonRank,
        identificationQualifier: resolved.identificationQualifier,
        individualCount: unit.individualCount,
        identificationSource: resolved.source,
    };
}

export function mergeIdentifications(
    trappingRecords: readonly TrappingRecord[],
    tables: { sortRecords: readonly SortRecord[]; pinRecords: readonly PinRecord[]; expertRecords: readonly ExpertRecord[] },
    options: MergeOptions = {}
): MergeResult {
    const { subsamples, dropped, bycatch } = joinSortRecords(
        trappingRecords,
        tables.sortRecords,
        options.admittedSampleTypes
    );
    if (dropped > 0) {
        logger.debug(`${dropped} carabid sort records have no collected field sample and were skipped`);
    }

    const units = applyPins(subsamples, tables.pinRecords);

    const excluded = findInconsistentExperts(tables.expertRecords);
    if (excluded.size > 0) {
        logger.info(`Ignoring expert identifications for ${excluded.size} individuals with conflicting taxonIDs`);
    }
    const expertOverrides = applyExperts(units, tables.expertRecords, excluded);

    return {
        subsamples,
        reconciled: units.map(toReconciled),
        stats: {
            admittedSortRecords: subsamples.length,
            droppedSortRecords: dropped,
            bycatchSortRecords: bycatch,
            pinnedIndividuals: units.filter(u => u.individualID !== undefined).length,
            excludedExpertIndividuals: excluded.size,
            expertOverrides,
            residualRows: units.filter(u => u.individualID === undefined && u.individualCount < u.subsample.sort.individualCount).length,
        },
    };
}

export default {
    mergeIdentifications,
    joinSortRecords,
    resolveIdentification,
    resolveTaxonomy,
    findInconsistentExperts,
};
