import { AppError } from '../../middleware/errorHandler';
import type { IntegrityReport } from './types';

export type CarabidTable = 'fieldSamples' | 'sortRecords' | 'pinRecords' | 'expertRecords';

export interface RowLocation {
    table: CarabidTable;
    rowIndex: number;
    key?: string;
    field?: string;
}

/**
 * Input rows the pipeline cannot interpret. The run stops; the message
 * names the offending table, row and field.
 */
export class DataIntegrityError extends AppError {
    location: RowLocation;

    constructor(reason: string, location: RowLocation) {
        const key = location.key ? ` (${location.key})` : '';
        super(`${location.table} row ${location.rowIndex}${key}: ${reason}`, 422, { ...location, reason });
        this.location = location;
    }
}

/** Raised instead of a warning when count conservation is enforced */
export class IntegrityViolationError extends AppError {
    report: IntegrityReport;

    constructor(report: IntegrityReport) {
        super(
            `Count conservation failed: ${report.declaredTotal} declared, ` +
            `${report.reconciledTotal} reconciled, ${report.countedTotal} counted`,
            422,
            {
                declaredTotal: report.declaredTotal,
                reconciledTotal: report.reconciledTotal,
                countedTotal: report.countedTotal,
                subsampleMismatches: report.subsampleMismatches,
            }
        );
        this.report = report;
    }
}

export class InvalidQueryError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 400, details);
    }
}

export class DatasetNotFoundError extends AppError {
    constructor(datasetId: string) {
        super(`Dataset "${datasetId}" not found`, 404, { datasetId });
    }
}
