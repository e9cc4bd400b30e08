/**
 * Carabid Count API Routes
 *
 * Runs the reconciliation pipeline against the configured data provider.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { toCalendarDate } from '../utils/dates';
import { CarabidCountPipeline } from '../services/carabid/pipeline';
import { InvalidQueryError } from '../services/carabid/errors';
import type { DatasetQuery } from '../services/carabid/types';
import {
    COUNT_TABLE_FORMATS,
    CountTableFormat,
    countTableToCsv,
    countTableToXlsx,
    isCountTableFormat,
} from '../services/exports/countTableExport';

type QueryValue = Request['query'][string];

function stringValues(value: QueryValue): string[] {
    if (typeof value === 'string') return [value];
    if (Array.isArray(value)) {
        return value.filter((v): v is string => typeof v === 'string');
    }
    return [];
}

function singleValue(value: QueryValue): string | undefined {
    const values = stringValues(value);
    return values.length > 0 ? values[0] : undefined;
}

function parseDateParam(name: string, value: QueryValue): string | undefined {
    const raw = singleValue(value);
    if (raw === undefined || raw === '') return undefined;
    const date = toCalendarDate(raw);
    if (!date) {
        throw new InvalidQueryError(`${name} must be a date (YYYY-MM-DD)`, { [name]: raw });
    }
    return date;
}

export function parseDatasetQuery(query: Request['query']): DatasetQuery {
    const siteIDs = stringValues(query.siteID)
        .flatMap(v => v.split(','))
        .map(v => v.trim())
        .filter(v => v.length > 0);
    const startDate = parseDateParam('startDate', query.startDate);
    const endDate = parseDateParam('endDate', query.endDate);

    if (startDate && endDate && startDate > endDate) {
        throw new InvalidQueryError('startDate must not be after endDate', { startDate, endDate });
    }

    return {
        datasetId: singleValue(query.datasetId) || undefined,
        siteIDs: siteIDs.length > 0 ? siteIDs : undefined,
        startDate,
        endDate,
    };
}

function parseFormat(query: Request['query']): CountTableFormat {
    const format = (singleValue(query.format) ?? 'json').toLowerCase();
    if (!isCountTableFormat(format)) {
        throw new InvalidQueryError(`format must be one of ${COUNT_TABLE_FORMATS.join(', ')}`, { format });
    }
    return format;
}

export function createCarabidRouter(pipeline: CarabidCountPipeline): Router {
    const router = Router();

    /**
     * @swagger
     * /api/carabid/counts:
     *   get:
     *     summary: Reconciled carabid counts per trap collection and taxon
     *     tags: [Carabid]
     *     parameters:
     *       - in: query
     *         name: datasetId
     *         schema:
     *           type: string
     *       - in: query
     *         name: siteID
     *         schema:
     *           type: string
     *         description: One or more site codes, comma separated
     *       - in: query
     *         name: startDate
     *         schema:
     *           type: string
     *           format: date
     *       - in: query
     *         name: endDate
     *         schema:
     *           type: string
     *           format: date
     *       - in: query
     *         name: format
     *         schema:
     *           type: string
     *           enum: [json, csv, xlsx]
     *     responses:
     *       200:
     *         description: Count table
     *       400:
     *         description: Invalid query
     *       422:
     *         description: Input data failed integrity checks
     */
    router.get('/counts', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const format = parseFormat(req.query);
            const result = await pipeline.run(parseDatasetQuery(req.query));

            if (format === 'csv') {
                res.setHeader('Content-Type', 'text/csv');
                res.setHeader('Content-Disposition', 'attachment; filename="carabid_counts.csv"');
                res.send(countTableToCsv(result.counts));
                return;
            }
            if (format === 'xlsx') {
                res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
                res.setHeader('Content-Disposition', 'attachment; filename="carabid_counts.xlsx"');
                res.send(countTableToXlsx(result.counts, result.integrity));
                return;
            }

            res.json({
                data: result.counts,
                integrity: result.integrity,
                stats: result.stats,
            });
        } catch (error) {
            next(error);
        }
    });

    /**
     * @swagger
     * /api/carabid/reconciled:
     *   get:
     *     summary: Per-individual identifications after sort, pin and expert reconciliation
     *     tags: [Carabid]
     */
    router.get('/reconciled', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const result = await pipeline.run(parseDatasetQuery(req.query));
            res.json({
                data: result.reconciled,
                integrity: result.integrity,
                stats: result.stats,
            });
        } catch (error) {
            next(error);
        }
    });

    /**
     * @swagger
     * /api/carabid/bouts:
     *   get:
     *     summary: Collected trap samples with trapping days and bout identifiers
     *     tags: [Carabid]
     */
    router.get('/bouts', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const result = await pipeline.run(parseDatasetQuery(req.query));
            res.json({
                data: result.trappingRecords,
                bouts: Array.from(new Set(result.trappingRecords.map(r => r.boutID))),
            });
        } catch (error) {
            next(error);
        }
    });

    return router;
}

export default createCarabidRouter;
