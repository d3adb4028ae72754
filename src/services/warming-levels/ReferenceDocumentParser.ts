/**
 * Reference Document Parser
 *
 * Turns the cmip_warming_levels YAML for one CMIP phase into a
 * ReferenceDocument. The upstream file lists simulations that never reach a
 * level as comments with a trailing "did not reach N°C" annotation; those
 * lines are rewritten into ordinary entries carrying the sentinel year before
 * the YAML is loaded.
 */

import { load, YAMLException } from 'js-yaml';
import { z } from 'zod';
import type { ZodError } from 'zod';
import { ReferenceParseError } from '../../types/errors.js';
import { NOT_REACHED_YEAR, WARMING_LEVELS, notReachedMarker } from './constants.js';
import { validateCmipPhase } from './queryValidation.js';
import type { ReferenceDocument, ReferenceRecord } from './types.js';

const COMMENTED_ENTRY = '# {';
const SEQUENCE_ENTRY = '- {';
const SENTINEL_FIELDS = `, start_year: ${NOT_REACHED_YEAR}, end_year: ${NOT_REACHED_YEAR}}`;

const rawRecordSchema = z.object({
  model: z.string(),
  ensemble: z.string(),
  exp: z.string(),
  start_year: z.number().int(),
  end_year: z.number().int(),
});

type RawRecord = z.infer<typeof rawRecordSchema>;

// An empty bucket loads as null
const rawDocumentSchema = z.record(z.string(), z.array(rawRecordSchema).nullable());

/**
 * Rewrite commented "did not reach" entries into sequence items with the
 * sentinel year in both year fields.
 */
export function rewriteNotReachedMarkers(rawText: string): string {
  let tidied = rawText.replaceAll(COMMENTED_ENTRY, SEQUENCE_ENTRY);
  for (const level of WARMING_LEVELS) {
    tidied = tidied.replaceAll(notReachedMarker(level), SENTINEL_FIELDS);
  }
  return tidied;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function toReferenceRecord(raw: RawRecord): ReferenceRecord {
  const { model, ensemble, exp } = raw;
  if (raw.start_year === NOT_REACHED_YEAR || raw.end_year === NOT_REACHED_YEAR) {
    return { model, ensemble, exp, outcome: { kind: 'not_reached' } };
  }
  return {
    model,
    ensemble,
    exp,
    outcome: { kind: 'reached', startYear: raw.start_year, endYear: raw.end_year },
  };
}

/**
 * Parse the reference text for a CMIP phase.
 *
 * @throws InvalidArgumentError for an unsupported phase
 * @throws ReferenceParseError when the rewritten text is not valid YAML or
 * does not have the bucket/record structure
 */
export function parseReferenceDocument(rawText: string, cmipPhase: string): ReferenceDocument {
  const phase = validateCmipPhase(cmipPhase);

  let loaded: unknown;
  try {
    loaded = load(rewriteNotReachedMarkers(rawText));
  } catch (error) {
    if (error instanceof YAMLException) {
      throw new ReferenceParseError(phase, [error.message], error);
    }
    throw error;
  }

  const result = rawDocumentSchema.safeParse(loaded);
  if (!result.success) {
    throw new ReferenceParseError(phase, formatIssues(result.error), result.error);
  }

  const buckets = new Map<string, ReferenceRecord[]>();
  for (const [name, records] of Object.entries(result.data)) {
    buckets.set(name, (records ?? []).map(toReferenceRecord));
  }

  return { cmipPhase: phase, buckets };
}
