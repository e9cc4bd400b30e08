/**
 * Carabid pitfall-trap record types
 *
 * Input tables arrive in field-protocol order: field samples, then the
 * sorting, pinning and expert-taxonomy tables that refine identifications.
 */

export interface FieldSample {
    sampleID: string;
    domainID: string;
    siteID: string;
    plotID: string;
    trapID: string;
    setDate: string;      // YYYY-MM-DD
    collectDate: string;  // YYYY-MM-DD
    eventID?: string;     // raw, punctuation varies by site
    collected: boolean;
}

export interface TrappingRecord {
    sampleID: string;
    domainID: string;
    siteID: string;
    plotID: string;
    trapID: string;
    collectDate: string;  // bout-resolved
    trappingDays: number;
    boutID: string;
}

export interface Taxon {
    taxonID: string;
    scientificName?: string;
    taxonRank?: string;
}

export interface SortRecord extends Taxon {
    sampleID: string;
    subsampleID: string;
    sampleType: string;
    individualCount: number;
    identificationQualifier?: string;
}

export interface PinRecord extends Taxon {
    subsampleID: string;
    individualID: string;
    identificationQualifier?: string;
}

export interface ExpertRecord extends Taxon {
    individualID: string;
    identificationQualifier?: string;
}

export interface CarabidTables {
    fieldSamples: FieldSample[];
    sortRecords: SortRecord[];
    pinRecords: PinRecord[];
    expertRecords: ExpertRecord[];
}

export type IdentificationSource = 'sort' | 'pin' | 'expert';

export interface Identification {
    source: IdentificationSource;
    taxon: Taxon;
    identificationQualifier?: string;
}

export interface ReconciledIndividual extends TrappingRecord {
    subsampleID: string;
    sampleType: string;
    individualID?: string;
    taxonID: string;
    scientificName?: string;
    taxonRank?: string;
    identificationQualifier?: string;
    individualCount: number;
    identificationSource: IdentificationSource;
}

export interface CountRow {
    sampleID: string;
    domainID: string;
    siteID: string;
    plotID: string;
    trapID: string;
    collectDate: string;
    trappingDays: number;
    boutID: string;
    taxonID: string;
    scientificName?: string;
    taxonRank?: string;
    count: number;
}

export interface SubsampleMismatch {
    subsampleID: string;
    declared: number;
    reconciled: number;
}

export interface IntegrityReport {
    ok: boolean;
    declaredTotal: number;
    reconciledTotal: number;
    countedTotal: number;
    subsampleMismatches: SubsampleMismatch[];
}

export interface PipelineStats {
    fieldSamples: number;
    collectedSamples: number;
    admittedSortRecords: number;
    droppedSortRecords: number;
    bycatchSortRecords: number;
    pinnedIndividuals: number;
    excludedExpertIndividuals: number;
    expertOverrides: number;
    residualRows: number;
    countRows: number;
}

export interface PipelineResult {
    trappingRecords: TrappingRecord[];
    reconciled: ReconciledIndividual[];
    counts: CountRow[];
    integrity: IntegrityReport;
    stats: PipelineStats;
}

export interface DatasetQuery {
    datasetId?: string;
    siteIDs?: string[];
    startDate?: string;
    endDate?: string;
}
