import type { CmipPhase } from '../constants.js';

/**
 * Supplies the raw reference text for a CMIP phase.
 *
 * Implementations fail with SourceUnavailableError (or a subclass) when the
 * document cannot be obtained.
 */
export interface ReferenceSource {
  /** Short name used in logs and aggregated errors */
  readonly name: string;
  fetchReferenceDocument(cmipPhase: CmipPhase): Promise<string>;
}

/**
 * Path of a phase's document relative to the root of the reference repository
 */
export function referenceDocumentPath(cmipPhase: CmipPhase): string {
  return `warming_levels/${cmipPhase}_all_ens/${cmipPhase}_warming_levels_all_ens_1850_1900.yml`;
}
