/**
 * GwlResolver - resolves Global Warming Level timeslices
 *
 * Each call fetches the phase document from its source, parses it afresh and
 * discards it afterwards; nothing is cached between calls.
 *
 * Workflow for a lookup:
 * 1. Validate and normalize the query (before anything is fetched)
 * 2. Fetch and parse the reference document for the phase
 * 3. Select the unique record for the simulation in the warming level bucket
 */

import type { Logger } from 'pino';
import { createChildLogger } from '../../utils/logger.js';
import type { TimeIndexedDataset } from '../dataset/TimeIndexedDataset.js';
import { TIMESLICE_YEARS, type CmipPhase } from './constants.js';
import { normalizeGwlQuery, validateCmipPhase, validateWarmingLevel } from './queryValidation.js';
import { parseReferenceDocument } from './ReferenceDocumentParser.js';
import type { ReferenceSource } from './sources/ReferenceSource.js';
import { bucketRecords, knownModels, selectTimeslice, timesliceBounds, toLookupTable } from './timeslice.js';
import type { GwlQuery, LookupTableRow, ReferenceDocument, YearRange } from './types.js';

export interface GwlResolverOptions {
  source: ReferenceSource;
  logger?: Logger;
}

export class GwlResolver {
  private readonly source: ReferenceSource;
  private readonly logger: Logger;

  constructor(options: GwlResolverOptions) {
    this.source = options.source;
    this.logger = options.logger ?? createChildLogger({ component: 'GwlResolver' });
  }

  /**
   * Start and end year of the 20-year timeslice in which the simulation
   * first crosses the warming level.
   *
   * @throws InvalidArgumentError, SourceUnavailableError, ReferenceParseError,
   * UnknownModelError, NotCalculatedError, AmbiguousEntryError or
   * ThresholdNotReachedError
   */
  async resolveYearRange(query: GwlQuery): Promise<YearRange> {
    const normalized = normalizeGwlQuery(query);
    const document = await this.loadDocument(normalized.cmipPhase);
    const range = selectTimeslice(document, normalized);

    if (range.endYear - range.startYear + 1 !== TIMESLICE_YEARS) {
      this.logger.warn(
        { query: normalized, ...range, expectedYears: TIMESLICE_YEARS },
        'GWL timeslice does not span the expected number of years'
      );
    }
    this.logger.debug({ query: normalized, ...range }, 'Resolved GWL timeslice');
    return range;
  }

  /**
   * Every record of every warming level bucket for a phase, tagged with its
   * `gwlNN` label.
   */
  async buildLookupTable(cmipPhase: string): Promise<LookupTableRow[]> {
    const phase = validateCmipPhase(cmipPhase);
    const document = await this.loadDocument(phase);
    const rows = toLookupTable(document);

    this.logger.debug({ cmipPhase: phase, rows: rows.length }, 'Built GWL lookup table');
    return rows;
  }

  /** Sorted distinct model names listed for a phase and warming level */
  async listModels(cmipPhase: string, warmingLevel: number | string): Promise<string[]> {
    const phase = validateCmipPhase(cmipPhase);
    const level = validateWarmingLevel(warmingLevel);
    const document = await this.loadDocument(phase);
    return knownModels(bucketRecords(document, level));
  }

  /**
   * Select the GWL timeslice of a dataset, from January 1 of the start year
   * to December 31 of the end year.
   */
  async sliceToTimeslice<TSubset>(dataset: TimeIndexedDataset<TSubset>, query: GwlQuery): Promise<TSubset> {
    const { startDate, endDate } = timesliceBounds(await this.resolveYearRange(query));
    this.logger.debug({ startDate, endDate }, 'Selecting GWL timeslice from dataset');
    return dataset.selectRange(startDate, endDate);
  }

  private async loadDocument(cmipPhase: CmipPhase): Promise<ReferenceDocument> {
    const rawText = await this.source.fetchReferenceDocument(cmipPhase);
    const document = parseReferenceDocument(rawText, cmipPhase);

    this.logger.debug(
      { cmipPhase, source: this.source.name, buckets: [...document.buckets.keys()] },
      'Parsed warming level reference'
    );
    return document;
  }
}
