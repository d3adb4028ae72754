import type { Logger } from 'pino';
import { SourceUnavailableError } from '../../../types/errors.js';
import { createChildLogger } from '../../../utils/logger.js';
import type { CmipPhase } from '../constants.js';
import type { ReferenceSource } from './ReferenceSource.js';

interface SourceFailure {
  source: string;
  code: string;
  message: string;
}

/**
 * Tries each source in order and returns the first document obtained.
 * Only SourceUnavailableError moves on to the next source; anything else
 * propagates immediately. When every source fails, the combined error keeps
 * the code of the last failure and has it as its cause.
 */
export class FallbackReferenceSource implements ReferenceSource {
  readonly name: string;
  private readonly logger: Logger;

  constructor(
    private readonly sources: readonly ReferenceSource[],
    logger?: Logger
  ) {
    if (sources.length === 0) {
      throw new Error('FallbackReferenceSource needs at least one source');
    }
    this.name = sources.map((source) => source.name).join('+');
    this.logger = logger ?? createChildLogger({ component: 'FallbackReferenceSource' });
  }

  async fetchReferenceDocument(cmipPhase: CmipPhase): Promise<string> {
    const failures: SourceFailure[] = [];
    let lastError: SourceUnavailableError | undefined;

    for (const source of this.sources) {
      try {
        return await source.fetchReferenceDocument(cmipPhase);
      } catch (error) {
        if (!(error instanceof SourceUnavailableError)) {
          throw error;
        }
        failures.push({ source: source.name, code: error.code, message: error.message });
        lastError = error;
        this.logger.warn(
          { cmipPhase, source: source.name, code: error.code, error: error.message },
          'Reference source unavailable, trying next source'
        );
      }
    }

    throw new SourceUnavailableError(
      `No source could supply the ${cmipPhase.toUpperCase()} warming level reference. ` +
        failures.map((failure) => `[${failure.source}] ${failure.message}`).join(' '),
      { cmipPhase, failures },
      lastError,
      lastError?.code
    );
  }
}
