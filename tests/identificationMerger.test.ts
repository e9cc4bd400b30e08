/**
 * Identification Merger Tests
 */

import {
  findInconsistentExperts,
  joinSortRecords,
  mergeIdentifications,
  resolveIdentification,
  resolveTaxonomy,
} from '../src/services/carabid/identificationMerger';
import { mapExpertRecords, mapPinRecords } from '../src/services/carabid/rowMapping';
import { normalizeFieldSamples } from '../src/services/carabid/sampleNormalizer';
import type { Identification, ReconciledIndividual } from '../src/services/carabid/types';
import { expertRecord, fieldSample, pinRecord, sortRecord, threeBeetleTables } from './fixtures/tables';

const trapping = normalizeFieldSamples([
  fieldSample({ sampleID: 'S1', trapID: 'N' }),
  fieldSample({ sampleID: 'S2', trapID: 'E' }),
]);

function summary(rows: ReconciledIndividual[]) {
  return rows.map(r => ({
    subsampleID: r.subsampleID,
    individualID: r.individualID,
    taxonID: r.taxonID,
    source: r.identificationSource,
    count: r.individualCount,
  }));
}

describe('resolveIdentification', () => {
  const sort: Identification = { source: 'sort', taxon: { taxonID: 'A' } };
  const pin: Identification = { source: 'pin', taxon: { taxonID: 'B' } };
  const expert: Identification = { source: 'expert', taxon: { taxonID: 'C' } };

  it('prefers expert over pin over sort', () => {
    expect(resolveIdentification([sort, pin, expert])).toBe(expert);
    expect(resolveIdentification([expert, sort, pin])).toBe(expert);
    expect(resolveIdentification([sort, pin])).toBe(pin);
    expect(resolveIdentification([sort])).toBe(sort);
  });

  it('keeps the first candidate among equals', () => {
    const otherPin: Identification = { source: 'pin', taxon: { taxonID: 'D' } };
    expect(resolveIdentification([pin, otherPin])).toBe(pin);
  });

  it('rejects an empty candidate list', () => {
    expect(() => resolveIdentification([])).toThrow('at least one candidate');
  });
});

describe('resolveTaxonomy', () => {
  it('takes taxonID and source from the winner and fills blank fields from lower tiers', () => {
    const resolved = resolveTaxonomy([
      { source: 'sort', taxon: { taxonID: 'CARSP1', scientificName: 'Carabus sp.', taxonRank: 'genus' }, identificationQualifier: 'cf. genus' },
      { source: 'pin', taxon: { taxonID: 'CARNEM', taxonRank: 'species' } },
      { source: 'expert', taxon: { taxonID: 'CARNEM', scientificName: 'Carabus nemoralis' } },
    ]);

    expect(resolved).toEqual({
      source: 'expert',
      taxonID: 'CARNEM',
      scientificName: 'Carabus nemoralis',
      taxonRank: 'species',
      identificationQualifier: 'cf. genus',
    });
  });

  it('keeps a single candidate as it is', () => {
    expect(resolveTaxonomy([{ source: 'sort', taxon: { taxonID: 'A' } }])).toEqual({
      source: 'sort',
      taxonID: 'A',
      scientificName: undefined,
      taxonRank: undefined,
      identificationQualifier: undefined,
    });
  });
});

describe('findInconsistentExperts', () => {
  it('flags individuals with more than one distinct taxonID', () => {
    const excluded = findInconsistentExperts([
      expertRecord({ individualID: 'I1', taxonID: 'A' }),
      expertRecord({ individualID: 'I1', taxonID: 'B' }),
      expertRecord({ individualID: 'I2', taxonID: 'A' }),
      expertRecord({ individualID: 'I2', taxonID: 'A' }),
      expertRecord({ individualID: 'I3', taxonID: 'C' }),
    ]);

    expect(Array.from(excluded)).toEqual(['I1']);
  });
});

describe('joinSortRecords', () => {
  it('admits carabid sample types and drops bycatch and orphans', () => {
    const { subsamples, dropped, bycatch } = joinSortRecords(trapping, [
      sortRecord({ subsampleID: 'SS1', sampleType: 'carabid' }),
      sortRecord({ subsampleID: 'SS2', sampleType: 'Other Carabid' }),
      sortRecord({ subsampleID: 'SS3', sampleType: 'invert bycatch' }),
      sortRecord({ subsampleID: 'SS4', sampleID: 'S9' }),
    ]);

    expect(subsamples.map(s => s.sort.subsampleID)).toEqual(['SS1', 'SS2']);
    expect(dropped).toBe(1);
    expect(bycatch).toBe(1);
  });
});

describe('mergeIdentifications', () => {
  it('reconciles the three tiers for a partially pinned subsample', () => {
    const tables = threeBeetleTables();
    const result = mergeIdentifications(normalizeFieldSamples(tables.fieldSamples), tables);

    expect(summary(result.reconciled)).toEqual([
      { subsampleID: 'SS1', individualID: 'I1', taxonID: 'CARSP1', source: 'pin', count: 1 },
      { subsampleID: 'SS1', individualID: 'I2', taxonID: 'COLSP1', source: 'expert', count: 1 },
      { subsampleID: 'SS1', individualID: undefined, taxonID: 'CARSP1', source: 'sort', count: 1 },
    ]);
    expect(result.reconciled[1].scientificName).toBe('Calosoma sp.');
    expect(result.stats).toEqual({
      admittedSortRecords: 1,
      droppedSortRecords: 0,
      bycatchSortRecords: 0,
      pinnedIndividuals: 2,
      excludedExpertIndividuals: 0,
      expertOverrides: 1,
      residualRows: 1,
    });
  });

  it('keeps unpinned subsamples whole at sort level', () => {
    const result = mergeIdentifications(trapping, {
      sortRecords: [sortRecord({ subsampleID: 'SS1', individualCount: 5, identificationQualifier: 'cf. species' })],
      pinRecords: [],
      expertRecords: [],
    });

    expect(summary(result.reconciled)).toEqual([
      { subsampleID: 'SS1', individualID: undefined, taxonID: 'CARSP1', source: 'sort', count: 5 },
    ]);
    expect(result.reconciled[0].identificationQualifier).toBe('cf. species');
    expect(result.stats.residualRows).toBe(0);
  });

  it('adds no residual row when every individual was pinned', () => {
    const result = mergeIdentifications(trapping, {
      sortRecords: [sortRecord({ individualCount: 2 })],
      pinRecords: [
        pinRecord({ individualID: 'I1', taxonID: 'A' }),
        pinRecord({ individualID: 'I2', taxonID: 'B' }),
      ],
      expertRecords: [],
    });

    expect(summary(result.reconciled).map(r => [r.individualID, r.taxonID, r.count])).toEqual([
      ['I1', 'A', 1],
      ['I2', 'B', 1],
    ]);
  });

  it('counts a pinned individual once even if it is listed twice', () => {
    const result = mergeIdentifications(trapping, {
      sortRecords: [sortRecord({ individualCount: 3 })],
      pinRecords: [
        pinRecord({ individualID: 'I1', taxonID: 'A' }),
        pinRecord({ individualID: 'I1', taxonID: 'B' }),
      ],
      expertRecords: [],
    });

    expect(summary(result.reconciled).map(r => [r.individualID, r.taxonID, r.count])).toEqual([
      ['I1', 'A', 1],
      [undefined, 'CARSP1', 2],
    ]);
  });

  it('leaves pin identifications in place for conflicting expert calls', () => {
    const result = mergeIdentifications(trapping, {
      sortRecords: [sortRecord({ individualCount: 2 })],
      pinRecords: [
        pinRecord({ individualID: 'I1', taxonID: 'PIN1' }),
        pinRecord({ individualID: 'I2', taxonID: 'PIN2' }),
      ],
      expertRecords: [
        expertRecord({ individualID: 'I1', taxonID: 'EXP1' }),
        expertRecord({ individualID: 'I1', taxonID: 'EXP2' }),
        expertRecord({ individualID: 'I2', taxonID: 'EXP3' }),
        expertRecord({ individualID: 'I2', taxonID: 'EXP3' }),
      ],
    });

    expect(summary(result.reconciled).map(r => [r.individualID, r.taxonID, r.source])).toEqual([
      ['I1', 'PIN1', 'pin'],
      ['I2', 'EXP3', 'expert'],
    ]);
    expect(result.stats.excludedExpertIndividuals).toBe(1);
    expect(result.stats.expertOverrides).toBe(1);
  });

  it('does not carry an expert call over to unpinned siblings', () => {
    const result = mergeIdentifications(trapping, {
      sortRecords: [sortRecord({ individualCount: 4 })],
      pinRecords: [pinRecord({ individualID: 'I1', taxonID: 'CARSP1' })],
      expertRecords: [expertRecord({ individualID: 'I1', taxonID: 'PTEMEL' })],
    });

    expect(summary(result.reconciled).map(r => [r.individualID, r.taxonID, r.source, r.count])).toEqual([
      ['I1', 'PTEMEL', 'expert', 1],
      [undefined, 'CARSP1', 'sort', 3],
    ]);
  });

  it('ignores expert records for individuals that were never pinned', () => {
    const result = mergeIdentifications(trapping, {
      sortRecords: [sortRecord({ individualCount: 1 })],
      pinRecords: [],
      expertRecords: [expertRecord({ individualID: 'I9', taxonID: 'X' })],
    });

    expect(summary(result.reconciled).map(r => [r.taxonID, r.source])).toEqual([['CARSP1', 'sort']]);
    expect(result.stats.expertOverrides).toBe(0);
  });

  it('carries trapping context onto reconciled rows', () => {
    const result = mergeIdentifications(trapping, {
      sortRecords: [sortRecord({ sampleID: 'S2', subsampleID: 'SS7', individualCount: 1 })],
      pinRecords: [],
      expertRecords: [],
    });

    expect(result.reconciled[0]).toMatchObject({
      sampleID: 'S2',
      trapID: 'E',
      boutID: 'HARV_2018-06-04',
      trappingDays: 3,
      subsampleID: 'SS7',
      sampleType: 'carabid',
    });
  });

  it('conserves declared counts per subsample', () => {
    const result = mergeIdentifications(trapping, {
      sortRecords: [
        sortRecord({ subsampleID: 'SS1', individualCount: 6 }),
        sortRecord({ subsampleID: 'SS2', sampleID: 'S2', individualCount: 2 }),
      ],
      pinRecords: [
        pinRecord({ subsampleID: 'SS1', individualID: 'I1' }),
        pinRecord({ subsampleID: 'SS1', individualID: 'I2', taxonID: 'B' }),
        pinRecord({ subsampleID: 'SS2', individualID: 'I3', taxonID: 'C' }),
      ],
      expertRecords: [expertRecord({ individualID: 'I2', taxonID: 'D' })],
    });

    const totals = new Map<string, number>();
    for (const row of result.reconciled) {
      totals.set(row.subsampleID, (totals.get(row.subsampleID) ?? 0) + row.individualCount);
    }
    expect(Array.from(totals.entries())).toEqual([['SS1', 6], ['SS2', 2]]);
  });

  it('keeps pin taxonomy when an expert record leaves name and rank blank', () => {
    const result = mergeIdentifications(trapping, {
      sortRecords: [sortRecord({ individualCount: 2 })],
      pinRecords: [pinRecord({ individualID: 'I1', taxonID: 'CARSP1', scientificName: 'Carabus sp.', taxonRank: 'genus' })],
      expertRecords: mapExpertRecords([{ individualID: 'I1', taxonID: 'CARSP1', scientificName: '', taxonRank: '' }]),
    });

    expect(result.reconciled.map(r => [r.individualID, r.taxonID, r.scientificName, r.taxonRank, r.identificationSource])).toEqual([
      ['I1', 'CARSP1', 'Carabus sp.', 'genus', 'expert'],
      [undefined, 'CARSP1', 'Carabus sp.', 'genus', 'sort'],
    ]);
  });

  it('keeps sort taxonomy and qualifier when a pin record leaves them blank', () => {
    const result = mergeIdentifications(trapping, {
      sortRecords: [sortRecord({ individualCount: 1, identificationQualifier: 'cf. species' })],
      pinRecords: mapPinRecords([{ subsampleID: 'SS1', individualID: 'I1', taxonID: 'CARSP1', scientificName: ' ', taxonRank: '' }]),
      expertRecords: [],
    });

    expect(result.reconciled).toHaveLength(1);
    expect(result.reconciled[0]).toMatchObject({
      taxonID: 'CARSP1',
      scientificName: 'Carabus sp.',
      taxonRank: 'genus',
      identificationQualifier: 'cf. species',
      identificationSource: 'pin',
    });
  });
});
