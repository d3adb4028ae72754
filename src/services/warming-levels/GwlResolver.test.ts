import pino from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { TimeSeries } from '../dataset/TimeIndexedDataset.js';
import {
  InvalidArgumentError,
  NotCalculatedError,
  ReferenceParseError,
  SourceUnavailableError,
  ThresholdNotReachedError,
  UnknownModelError,
} from '../../types/errors.js';
import { readCmip6Sample } from './__fixtures__/fixtures.js';
import { GwlResolver } from './GwlResolver.js';
import type { CmipPhase } from './constants.js';
import type { ReferenceSource } from './sources/ReferenceSource.js';
import type { GwlQuery } from './types.js';

function fakeSource(text: string) {
  return {
    name: 'fake',
    fetchReferenceDocument: vi.fn(async (_cmipPhase: CmipPhase) => text),
  };
}

const query: GwlQuery = {
  cmipPhase: 'CMIP6',
  model: 'ACCESS-ESM1-5',
  ensemble: 'r1i1p1f1',
  pathway: 'ssp585',
  warmingLevel: 2.0,
};

describe('GwlResolver', () => {
  describe('resolveYearRange', () => {
    it('returns the timeslice of the matching simulation', async () => {
      const source = fakeSource(readCmip6Sample());
      const resolver = new GwlResolver({ source });

      await expect(resolver.resolveYearRange(query)).resolves.toEqual({ startYear: 2032, endYear: 2051 });
      expect(source.fetchReferenceDocument).toHaveBeenCalledWith('cmip6');
    });

    it('matches phase and pathway case-insensitively', async () => {
      const resolver = new GwlResolver({ source: fakeSource(readCmip6Sample()) });

      await expect(
        resolver.resolveYearRange({ ...query, cmipPhase: 'cmip6', pathway: 'SSP585', warmingLevel: '1.5' })
      ).resolves.toEqual({ startYear: 2016, endYear: 2035 });
    });

    it('gives the same answer for repeated calls', async () => {
      const source = fakeSource(readCmip6Sample());
      const resolver = new GwlResolver({ source });

      const first = await resolver.resolveYearRange(query);
      const second = await resolver.resolveYearRange(query);

      expect(second).toEqual(first);
      expect(source.fetchReferenceDocument).toHaveBeenCalledTimes(2);
    });

    it('validates the query before fetching anything', async () => {
      const source = fakeSource(readCmip6Sample());
      const resolver = new GwlResolver({ source });

      await expect(resolver.resolveYearRange({ ...query, warmingLevel: 2.5 })).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
      await expect(resolver.resolveYearRange({ ...query, cmipPhase: 'CMIP7' })).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
      await expect(resolver.resolveYearRange({ ...query, pathway: 'ssp119' })).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
      expect(source.fetchReferenceDocument).not.toHaveBeenCalled();
    });

    it('reports unknown models with the models of the bucket', async () => {
      const resolver = new GwlResolver({ source: fakeSource(readCmip6Sample()) });

      const error = await resolver.resolveYearRange({ ...query, model: 'NorESM2-LM' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnknownModelError);
      if (!(error instanceof UnknownModelError)) return;
      expect(error.context?.knownModels).toEqual(['ACCESS-ESM1-5', 'CanESM5', 'MIROC6']);
    });

    it('treats an empty model name as unknown', async () => {
      const resolver = new GwlResolver({ source: fakeSource(readCmip6Sample()) });

      await expect(resolver.resolveYearRange({ ...query, model: '' })).rejects.toBeInstanceOf(UnknownModelError);
    });

    it('treats an empty ensemble as not calculated', async () => {
      const resolver = new GwlResolver({ source: fakeSource(readCmip6Sample()) });

      await expect(resolver.resolveYearRange({ ...query, ensemble: '' })).rejects.toBeInstanceOf(NotCalculatedError);
    });

    it('warns about a timeslice that is not 20 years long but still returns it', async () => {
      const lines: string[] = [];
      const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
      const text = [
        'warming_level_20:',
        '  - {model: ACCESS-ESM1-5, ensemble: r1i1p1f1, exp: ssp585, start_year: 2032, end_year: 2041}',
        '',
      ].join('\n');
      const resolver = new GwlResolver({ source: fakeSource(text), logger });

      await expect(resolver.resolveYearRange(query)).resolves.toEqual({ startYear: 2032, endYear: 2041 });

      const warnings = lines.map((line) => JSON.parse(line)).filter((entry) => entry.level === 40);
      expect(warnings).toHaveLength(1);
      expect(warnings[0].msg).toBe('GWL timeslice does not span the expected number of years');
      expect(warnings[0].expectedYears).toBe(20);
    });

    it('does not warn about a 20-year timeslice', async () => {
      const lines: string[] = [];
      const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
      const resolver = new GwlResolver({ source: fakeSource(readCmip6Sample()), logger });

      await resolver.resolveYearRange(query);

      expect(lines.map((line) => JSON.parse(line).level)).not.toContain(40);
    });

    it('fails with ThresholdNotReachedError for a sentinel record', async () => {
      const text = [
        'warming_level_20:',
        '  # {model: ACCESS-ESM1-5, ensemble: r1i1p1f1, exp: ssp585} -- did not reach 2.0°C',
        '',
      ].join('\n');
      const resolver = new GwlResolver({ source: fakeSource(text) });

      await expect(resolver.resolveYearRange(query)).rejects.toBeInstanceOf(ThresholdNotReachedError);
    });

    it('propagates source failures unchanged', async () => {
      const failure = new SourceUnavailableError('offline', { cmipPhase: 'cmip6' });
      const source: ReferenceSource = {
        name: 'broken',
        fetchReferenceDocument: vi.fn(async () => {
          throw failure;
        }),
      };
      const resolver = new GwlResolver({ source });

      await expect(resolver.resolveYearRange(query)).rejects.toBe(failure);
    });

    it('propagates parse failures', async () => {
      const resolver = new GwlResolver({ source: fakeSource('warming_level_20: {model: [\n') });

      await expect(resolver.resolveYearRange(query)).rejects.toBeInstanceOf(ReferenceParseError);
    });
  });

  describe('buildLookupTable', () => {
    it('flattens every bucket of the phase', async () => {
      const resolver = new GwlResolver({ source: fakeSource(readCmip6Sample()) });

      const rows = await resolver.buildLookupTable('CMIP6');

      expect(rows).toHaveLength(13);
      expect(rows.filter((row) => row.gwl === 'gwl20')).toHaveLength(6);
      expect(rows[5]).toEqual({
        model: 'ACCESS-ESM1-5',
        ensemble: 'r1i1p1f1',
        exp: 'ssp585',
        startYear: 2032,
        endYear: 2051,
        gwl: 'gwl20',
      });
    });

    it('rejects an unsupported phase', async () => {
      const source = fakeSource(readCmip6Sample());
      const resolver = new GwlResolver({ source });

      await expect(resolver.buildLookupTable('CMIP3')).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(source.fetchReferenceDocument).not.toHaveBeenCalled();
    });
  });

  describe('listModels', () => {
    it('lists the distinct models of a warming level', async () => {
      const resolver = new GwlResolver({ source: fakeSource(readCmip6Sample()) });

      await expect(resolver.listModels('cmip6', 4)).resolves.toEqual(['ACCESS-ESM1-5', 'CanESM5']);
      await expect(resolver.listModels('cmip6', 1.2)).resolves.toEqual([]);
    });
  });

  describe('sliceToTimeslice', () => {
    it('selects January 1 of the start year through December 31 of the end year', async () => {
      const resolver = new GwlResolver({ source: fakeSource(readCmip6Sample()) });
      const dataset = { selectRange: vi.fn((startDate: string, endDate: string) => `${startDate}/${endDate}`) };

      await expect(resolver.sliceToTimeslice(dataset, query)).resolves.toBe('2032-01-01/2051-12-31');
      expect(dataset.selectRange).toHaveBeenCalledWith('2032-01-01', '2051-12-31');
    });

    it('slices an in-memory time series inclusively', async () => {
      const resolver = new GwlResolver({ source: fakeSource(readCmip6Sample()) });
      const series = TimeSeries.fromEntries<number>([
        ['2031-12-31T12:00:00Z', 1],
        ['2032-01-01T00:00:00Z', 2],
        ['2045-06-15T00:00:00Z', 3],
        ['2051-12-31T18:00:00Z', 4],
        ['2052-01-01T00:00:00Z', 5],
      ]);

      const slice = await resolver.sliceToTimeslice(series, query);

      expect(slice.values()).toEqual([2, 3, 4]);
    });

    it('does not touch the dataset when the lookup fails', async () => {
      const resolver = new GwlResolver({ source: fakeSource(readCmip6Sample()) });
      const dataset = { selectRange: vi.fn(() => 'unused') };

      await expect(
        resolver.sliceToTimeslice(dataset, { ...query, model: 'MIROC6', pathway: 'ssp126' })
      ).rejects.toBeInstanceOf(ThresholdNotReachedError);
      expect(dataset.selectRange).not.toHaveBeenCalled();
    });
  });
});
