import { describe, expect, it } from 'vitest';
import { ErrorCode, InvalidArgumentError, ReferenceParseError } from '../../types/errors.js';
import { readCmip6Sample } from './__fixtures__/fixtures.js';
import { parseReferenceDocument, rewriteNotReachedMarkers } from './ReferenceDocumentParser.js';

describe('rewriteNotReachedMarkers', () => {
  it('turns a commented "did not reach" entry into a sequence item with sentinel years', () => {
    const line = '  # {model: MIROC6, ensemble: r1i1p1f1, exp: ssp126} -- did not reach 2.0°C';
    expect(rewriteNotReachedMarkers(line)).toBe(
      '  - {model: MIROC6, ensemble: r1i1p1f1, exp: ssp126, start_year: 9999, end_year: 9999}'
    );
  });

  it('rewrites every occurrence for every supported level', () => {
    const text = [
      '# {model: A, ensemble: r1, exp: ssp126} -- did not reach 1.0°C',
      '# {model: B, ensemble: r1, exp: ssp126} -- did not reach 1.2°C',
      '# {model: C, ensemble: r1, exp: ssp126} -- did not reach 4.0°C',
    ].join('\n');
    expect(rewriteNotReachedMarkers(text)).toBe(
      [
        '- {model: A, ensemble: r1, exp: ssp126, start_year: 9999, end_year: 9999}',
        '- {model: B, ensemble: r1, exp: ssp126, start_year: 9999, end_year: 9999}',
        '- {model: C, ensemble: r1, exp: ssp126, start_year: 9999, end_year: 9999}',
      ].join('\n')
    );
  });

  it('leaves ordinary comments alone', () => {
    expect(rewriteNotReachedMarkers('# generated file')).toBe('# generated file');
  });
});

describe('parseReferenceDocument', () => {
  it('parses every bucket in document order', () => {
    const document = parseReferenceDocument(readCmip6Sample(), 'CMIP6');

    expect(document.cmipPhase).toBe('cmip6');
    expect([...document.buckets.keys()]).toEqual([
      'warming_level_10',
      'warming_level_15',
      'warming_level_20',
      'warming_level_40',
    ]);
    expect(document.buckets.get('warming_level_15')?.map((record) => record.model)).toEqual([
      'ACCESS-ESM1-5',
      'CanESM5',
      'MIROC6',
    ]);
  });

  it('parses reached entries with their years', () => {
    const document = parseReferenceDocument(readCmip6Sample(), 'cmip6');

    expect(document.buckets.get('warming_level_20')?.[0]).toEqual({
      model: 'ACCESS-ESM1-5',
      ensemble: 'r1i1p1f1',
      exp: 'ssp585',
      outcome: { kind: 'reached', startYear: 2032, endYear: 2051 },
    });
  });

  it('parses a "did not reach 2.0°C" entry as not reached', () => {
    const document = parseReferenceDocument(readCmip6Sample(), 'cmip6');

    expect(document.buckets.get('warming_level_20')?.[2]).toEqual({
      model: 'MIROC6',
      ensemble: 'r1i1p1f1',
      exp: 'ssp126',
      outcome: { kind: 'not_reached' },
    });
  });

  it('treats an empty bucket as having no records', () => {
    const document = parseReferenceDocument(
      'warming_level_30:\nwarming_level_40:\n  - {model: A, ensemble: r1, exp: ssp585, start_year: 2070, end_year: 2089}\n',
      'cmip5'
    );

    expect(document.buckets.get('warming_level_30')).toEqual([]);
    expect(document.buckets.get('warming_level_40')).toHaveLength(1);
  });

  it('raises ReferenceParseError for invalid YAML', () => {
    const text = 'warming_level_20:\n  - {model: A, ensemble: r1, exp: ssp585, start_year: 2032\n';

    expect(() => parseReferenceDocument(text, 'cmip6')).toThrow(ReferenceParseError);
  });

  it('raises ReferenceParseError for a record without years', () => {
    const text = 'warming_level_20:\n  - {model: A, ensemble: r1, exp: ssp585}\n';

    let caught: unknown;
    try {
      parseReferenceDocument(text, 'cmip6');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ReferenceParseError);
    if (!(caught instanceof ReferenceParseError)) return;
    expect(caught.code).toBe(ErrorCode.PARSE_ERROR);
    expect(caught.isOperational).toBe(false);
    expect(caught.context?.cmipPhase).toBe('cmip6');
    expect(caught.context?.issues).toEqual(['warming_level_20.0.start_year: Required', 'warming_level_20.0.end_year: Required']);
  });

  it('raises ReferenceParseError when the document is not a mapping of buckets', () => {
    expect(() => parseReferenceDocument('- just\n- a list\n', 'cmip6')).toThrow(ReferenceParseError);
  });

  it('rejects an unsupported phase before parsing', () => {
    expect(() => parseReferenceDocument(readCmip6Sample(), 'CMIP4')).toThrow(InvalidArgumentError);
  });
});
