/**
 * Row Mapping Tests
 */

import {
  mapExpertRecords,
  mapFieldSamples,
  mapPinRecords,
  mapSortRecords,
} from '../src/services/carabid/rowMapping';
import { DataIntegrityError } from '../src/services/carabid/errors';

describe('mapFieldSamples', () => {
  it('coerces raw CSV values', () => {
    const [sample] = mapFieldSamples([{
      sampleID: ' S1 ',
      domainID: 'D01',
      siteID: 'HARV',
      plotID: 'HARV_001',
      trapID: 'N',
      setDate: '2018-06-01',
      collectDate: '2018-06-04T10:30:00Z',
      eventID: 'HARV.2018.23',
      sampleCollected: 'Y',
    }]);

    expect(sample).toEqual({
      sampleID: 'S1',
      domainID: 'D01',
      siteID: 'HARV',
      plotID: 'HARV_001',
      trapID: 'N',
      setDate: '2018-06-01',
      collectDate: '2018-06-04',
      eventID: 'HARV.2018.23',
      collected: true,
    });
  });

  it('reads collected flags in their usual spellings', () => {
    const base = { sampleID: 'S', siteID: 'HARV', trapID: 'N', setDate: '2018-06-01', collectDate: '2018-06-04' };
    const samples = mapFieldSamples([
      { ...base, collected: true },
      { ...base, collected: 'yes' },
      { ...base, sampleCollected: 'N' },
      { ...base, collected: 0 },
      { ...base },
    ]);

    expect(samples.map(s => s.collected)).toEqual([true, true, false, false, false]);
  });

  it('accepts Date objects from document stores', () => {
    const [sample] = mapFieldSamples([{
      sampleID: 'S1',
      siteID: 'HARV',
      trapID: 'N',
      setDate: new Date('2018-06-01T00:00:00Z'),
      collectDate: new Date('2018-06-04T00:00:00Z'),
      collected: true,
    }]);

    expect([sample.setDate, sample.collectDate]).toEqual(['2018-06-01', '2018-06-04']);
  });

  it('stops on a collected sample without a collect date', () => {
    const rows = [{ sampleID: 'S7', siteID: 'HARV', trapID: 'N', setDate: '2018-06-01', collected: 'Y' }];

    expect(() => mapFieldSamples(rows)).toThrow(DataIntegrityError);
    expect(() => mapFieldSamples(rows)).toThrow('fieldSamples row 0 (S7): missing required field "collectDate"');
  });

  it('stops on an impossible calendar date', () => {
    const rows = [{ sampleID: 'S7', siteID: 'HARV', trapID: 'N', setDate: '2018-02-30', collectDate: '2018-03-02', collected: 'Y' }];

    expect(() => mapFieldSamples(rows)).toThrow('fieldSamples row 0 (S7): unparseable setDate "2018-02-30"');
  });

  it('stops on a sample without an ID', () => {
    expect(() => mapFieldSamples([{ siteID: 'HARV' }])).toThrow('fieldSamples row 0: missing required field "sampleID"');
  });

  it('tolerates missing dates on uncollected samples', () => {
    const [sample] = mapFieldSamples([{ sampleID: 'S1', siteID: 'HARV', trapID: 'N', setDate: '2018-06-01', sampleCollected: 'N' }]);

    expect(sample.collected).toBe(false);
    expect(sample.collectDate).toBe('');
  });
});

describe('mapSortRecords', () => {
  const base = { sampleID: 'S1', subsampleID: 'SS1', sampleType: 'carabid', taxonID: 'CARSP1' };

  it('parses counts and drops empty optional fields', () => {
    const [record] = mapSortRecords([{ ...base, individualCount: '12', scientificName: '', identificationQualifier: ' ' }]);

    expect(record).toEqual({
      sampleID: 'S1',
      subsampleID: 'SS1',
      sampleType: 'carabid',
      taxonID: 'CARSP1',
      scientificName: undefined,
      taxonRank: undefined,
      individualCount: 12,
      identificationQualifier: undefined,
    });
  });

  it.each(['0', '-2', '1.5', 'many', ''])('rejects individualCount "%s"', (individualCount) => {
    expect(() => mapSortRecords([{ ...base, individualCount }]))
      .toThrow(`sortRecords row 0 (SS1): individualCount must be a whole number of at least 1, got "${individualCount}"`);
  });

  it('accepts numeric counts from document stores', () => {
    expect(mapSortRecords([{ ...base, individualCount: 4 }])[0].individualCount).toBe(4);
  });
});

describe('mapPinRecords and mapExpertRecords', () => {
  it('require identifiers and a taxon', () => {
    expect(() => mapPinRecords([{ individualID: 'I1', taxonID: 'A' }]))
      .toThrow('pinRecords row 0 (I1): missing required field "subsampleID"');
    expect(() => mapExpertRecords([{ individualID: 'I1' }]))
      .toThrow('expertRecords row 0 (I1): missing required field "taxonID"');
  });

  it('map identification fields', () => {
    expect(mapExpertRecords([{ individualID: 'I1', taxonID: 'CALFRI', scientificName: 'Calosoma frigidum', taxonRank: 'species' }]))
      .toEqual([{
        individualID: 'I1',
        taxonID: 'CALFRI',
        scientificName: 'Calosoma frigidum',
        taxonRank: 'species',
        identificationQualifier: undefined,
      }]);
  });
});
