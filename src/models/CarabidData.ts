/**
 * Carabid Data MongoDB Models
 *
 * Raw pitfall-trap tables stored per dataset. `rowIndex` keeps the order the
 * rows were imported in; bout-date tie-breaks depend on it.
 */

import mongoose, { Schema, Document } from 'mongoose';

// ============================================
// FIELD SAMPLE MODEL
// ============================================
export interface IFieldSample extends Document {
    datasetId: string;
    rowIndex: number;
    sampleID: string;
    domainID?: string;
    siteID: string;
    plotID?: string;
    trapID: string;
    setDate?: string;
    collectDate?: string;
    eventID?: string;
    collected: boolean;
}

const FieldSampleSchema = new Schema<IFieldSample>({
    datasetId: { type: String, required: true, index: true },
    rowIndex: { type: Number, required: true },
    sampleID: { type: String, required: true },
    domainID: String,
    siteID: { type: String, required: true, index: true },
    plotID: String,
    trapID: { type: String, required: true },
    setDate: String,
    collectDate: String,
    eventID: String,
    collected: { type: Boolean, default: false },
}, { timestamps: true });

FieldSampleSchema.index({ datasetId: 1, rowIndex: 1 });
FieldSampleSchema.index({ datasetId: 1, sampleID: 1 });

export const FieldSample = mongoose.model<IFieldSample>('CarabidFieldSample', FieldSampleSchema);

// ============================================
// SORTING MODEL
// ============================================
export interface ISortRecord extends Document {
    datasetId: string;
    rowIndex: number;
    sampleID: string;
    subsampleID: string;
    sampleType?: string;
    taxonID: string;
    scientificName?: string;
    taxonRank?: string;
    individualCount: number;
    identificationQualifier?: string;
}

const SortRecordSchema = new Schema<ISortRecord>({
    datasetId: { type: String, required: true, index: true },
    rowIndex: { type: Number, required: true },
    sampleID: { type: String, required: true },
    subsampleID: { type: String, required: true },
    sampleType: String,
    taxonID: { type: String, required: true },
    scientificName: String,
    taxonRank: String,
    individualCount: { type: Number, required: true, min: 1 },
    identificationQualifier: String,
}, { timestamps: true });

SortRecordSchema.index({ datasetId: 1, rowIndex: 1 });

export const SortRecord = mongoose.model<ISortRecord>('CarabidSortRecord', SortRecordSchema);

// ============================================
// PINNING MODEL
// ============================================
export interface IPinRecord extends Document {
    datasetId: string;
    rowIndex: number;
    subsampleID: string;
    individualID: string;
    taxonID: string;
    scientificName?: string;
    taxonRank?: string;
    identificationQualifier?: string;
}

const PinRecordSchema = new Schema<IPinRecord>({
    datasetId: { type: String, required: true, index: true },
    rowIndex: { type: Number, required: true },
    subsampleID: { type: String, required: true },
    individualID: { type: String, required: true },
    taxonID: { type: String, required: true },
    scientificName: String,
    taxonRank: String,
    identificationQualifier: String,
}, { timestamps: true });

PinRecordSchema.index({ datasetId: 1, rowIndex: 1 });

export const PinRecord = mongoose.model<IPinRecord>('CarabidPinRecord', PinRecordSchema);

// ============================================
// EXPERT TAXONOMY MODEL
// ============================================
export interface IExpertRecord extends Document {
    datasetId: string;
    rowIndex: number;
    individualID: string;
    taxonID: string;
    scientificName?: string;
    taxonRank?: string;
    identificationQualifier?: string;
}

const ExpertRecordSchema = new Schema<IExpertRecord>({
    datasetId: { type: String, required: true, index: true },
    rowIndex: { type: Number, required: true },
    individualID: { type: String, required: true },
    taxonID: { type: String, required: true },
    scientificName: String,
    taxonRank: String,
    identificationQualifier: String,
}, { timestamps: true });

ExpertRecordSchema.index({ datasetId: 1, rowIndex: 1 });

export const ExpertRecord = mongoose.model<IExpertRecord>('CarabidExpertRecord', ExpertRecordSchema);

export default { FieldSample, SortRecord, PinRecord, ExpertRecord };
