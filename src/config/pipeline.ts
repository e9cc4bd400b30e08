/**
 * Pipeline configuration
 *
 * Values come from the environment (loaded through dotenv by the entry
 * points) and fall back to the defaults used by the field protocol.
 */

export interface PipelineConfig {
    /** Sort-table sample types treated as carabids; everything else is bycatch */
    admittedSampleTypes: string[];
    /** Characters removed from raw eventIDs before bout grouping */
    eventSeparatorPattern: RegExp;
    /** Throw instead of warning when counts are not conserved */
    failOnIntegrityViolation: boolean;
}

export const DEFAULT_SAMPLE_TYPES = ['carabid', 'other carabid'];
export const DEFAULT_EVENT_SEPARATORS = '[._\\-/\\s]';

function parseList(raw: string | undefined, fallback: string[]): string[] {
    if (!raw) return fallback;
    const values = raw.split(',').map(v => v.trim()).filter(v => v.length > 0);
    return values.length > 0 ? values : fallback;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
    if (raw === undefined || raw === '') return fallback;
    return ['true', '1', 'yes', 'y'].includes(raw.trim().toLowerCase());
}

export function getPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
    return {
        admittedSampleTypes: parseList(env.CARABID_SAMPLE_TYPES, DEFAULT_SAMPLE_TYPES),
        eventSeparatorPattern: new RegExp(env.CARABID_EVENT_SEPARATORS || DEFAULT_EVENT_SEPARATORS, 'g'),
        failOnIntegrityViolation: parseBoolean(env.CARABID_FAIL_ON_INTEGRITY, false),
    };
}

export default getPipelineConfig;
