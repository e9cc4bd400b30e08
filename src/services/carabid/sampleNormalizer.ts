/**
 * Sample Normalizer
 *
 * Turns raw pitfall-trap field samples into trapping records: collected
 * samples only, with trap-exposure duration (trappingDays) and a canonical
 * site-wide bout identifier.
 *
 * Two grouped reductions run over the collected rows in input order:
 * - traps set once but emptied on several dates have their later
 *   collections measured from the first one rather than from the set date;
 * - sampling events split across consecutive days are pinned to the most
 *   common collect date of the event.
 */

import { calendarDaysBetween, toCalendarDate } from '../../utils/dates';
import { compositeKey, groupBy, mode } from '../../utils/tableOps';
import { DEFAULT_EVENT_SEPARATORS } from '../../config/pipeline';
import { DataIntegrityError } from './errors';
import type { FieldSample, TrappingRecord } from './types';

export interface NormalizeOptions {
    eventSeparatorPattern?: RegExp;
}

interface CollectedRow {
    sample: FieldSample;
    setDate: string;
    collectDate: string;
    trappingDays: number;
}

function globalPattern(pattern: RegExp): RegExp {
    return pattern.flags.includes('g') ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
}

/** Remove separator noise (dots, dashes, underscores...) from a raw eventID */
export function normalizeEventID(
    eventID: string | undefined,
    pattern: RegExp = new RegExp(DEFAULT_EVENT_SEPARATORS, 'g')
): string {
    return (eventID ?? '').replace(globalPattern(pattern), '');
}

export function boutIdFor(siteID: string, collectDate: string): string {
    return `${siteID}_${collectDate}`;
}

/**
 * Resolve each event to the mode of its collect dates. Ties go to the date
 * seen first for that event.
 */
export function resolveEventDates(rows: ReadonlyArray<{ eventKey: string; collectDate: string }>): Map<string, string> {
    const resolved = new Map<string, string>();
    for (const [eventKey, group] of groupBy(rows, r => r.eventKey)) {
        const date = mode(group.map(r => r.collectDate));
        if (date !== undefined) resolved.set(eventKey, date);
    }
    return resolved;
}

/**
 * Trapping days for one trap series (same trap, same set date).
 * Only series with more than one distinct collect date are adjusted: the
 * shortest interval anchors the series, every other row is re-measured
 * relative to it.
 */
export function adjustSeriesTrappingDays(series: ReadonlyArray<{ collectDate: string; trappingDays: number }>): number[] {
    const distinctDates = new Set(series.map(r => r.collectDate));
    if (distinctDates.size < 2) {
        return series.map(r => r.trappingDays);
    }

    const minDays = Math.min(...series.map(r => r.trappingDays));
    return series.map(r => (r.trappingDays === minDays ? r.trappingDays : r.trappingDays - minDays));
}

function validateCollected(sample: FieldSample, rowIndex: number): CollectedRow {
    const setDate = toCalendarDate(sample.setDate);
    const collectDate = toCalendarDate(sample.collectDate);
    const location = { table: 'fieldSamples' as const, rowIndex, key: sample.sampleID };

    if (!setDate) {
        throw new DataIntegrityError(`unparseable setDate "${sample.setDate}"`, { ...location, field: 'setDate' });
    }
    if (!collectDate) {
        throw new DataIntegrityError(`unparseable collectDate "${sample.collectDate}"`, { ...location, field: 'collectDate' });
    }

    const trappingDays = calendarDaysBetween(setDate, collectDate);
    if (trappingDays < 0) {
        throw new DataIntegrityError(
            `collectDate ${collectDate} precedes setDate ${setDate}`,
            { ...location, field: 'collectDate' }
        );
    }

    return { sample, setDate, collectDate, trappingDays };
}

export function normalizeFieldSamples(samples: readonly FieldSample[], options: NormalizeOptions = {}): TrappingRecord[] {
    const pattern = options.eventSeparatorPattern ?? new RegExp(DEFAULT_EVENT_SEPARATORS, 'g');

    const rows: CollectedRow[] = [];
    samples.forEach((sample, rowIndex) => {
        if (sample.collected) rows.push(validateCollected(sample, rowIndex));
    });

    // Multi-bout traps
    const trappingDays = new Map<CollectedRow, number>();
    const series = groupBy(rows, r =>
        compositeKey([r.sample.domainID, r.sample.siteID, r.sample.plotID, r.sample.trapID, r.setDate])
    );
    for (const group of series.values()) {
        const adjusted = adjustSeriesTrappingDays(group);
        group.forEach((row, i) => trappingDays.set(row, adjusted[i]));
    }

    // Bout dates; rows without an eventID stand alone
    const eventKeys = rows.map(r => {
        const normalized = normalizeEventID(r.sample.eventID, pattern);
        return normalized.length > 0 ? `event:${normalized}` : `sample:${r.sample.sampleID}`;
    });
    const boutDates = resolveEventDates(rows.map((r, i) => ({ eventKey: eventKeys[i], collectDate: r.collectDate })));

    return rows.map((row, i) => {
        const collectDate = boutDates.get(eventKeys[i]) ?? row.collectDate;
        return {
            sampleID: row.sample.sampleID,
            domainID: row.sample.domainID,
            siteID: row.sample.siteID,
            plotID: row.sample.plotID,
            trapID: row.sample.trapID,
            collectDate,
            trappingDays: trappingDays.get(row) ?? row.trappingDays,
            boutID: boutIdFor(row.sample.siteID, collectDate),
        };
    });
}

export default {
    normalizeFieldSamples,
    normalizeEventID,
    resolveEventDates,
    adjustSeriesTrappingDays,
    boutIdFor,
};
