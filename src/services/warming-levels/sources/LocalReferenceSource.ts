import { readFile } from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import { DEFAULT_REFERENCE_LOCAL_DIR } from '../../../config/env.js';
import { LocalReferenceMissingError, SourceUnavailableError } from '../../../types/errors.js';
import { createChildLogger } from '../../../utils/logger.js';
import type { CmipPhase } from '../constants.js';
import { referenceDocumentPath, type ReferenceSource } from './ReferenceSource.js';

const MISSING_FILE_CODES = new Set(['ENOENT', 'ENOTDIR']);

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export interface LocalReferenceSourceOptions {
  /** Root of a cmip_warming_levels checkout */
  localDir?: string;
  logger?: Logger;
}

/**
 * Reads the reference document from a local checkout of cmip_warming_levels.
 * The checkout is provisioned separately (git clone); a missing file raises
 * LocalReferenceMissingError with instructions.
 */
export class LocalReferenceSource implements ReferenceSource {
  readonly name = 'local';
  readonly localDir: string;
  private readonly logger: Logger;

  constructor(options: LocalReferenceSourceOptions = {}) {
    this.localDir = path.resolve(options.localDir ?? DEFAULT_REFERENCE_LOCAL_DIR);
    this.logger = options.logger ?? createChildLogger({ component: 'LocalReferenceSource' });
  }

  pathFor(cmipPhase: CmipPhase): string {
    return path.join(this.localDir, referenceDocumentPath(cmipPhase));
  }

  async fetchReferenceDocument(cmipPhase: CmipPhase): Promise<string> {
    const filePath = this.pathFor(cmipPhase);
    this.logger.debug({ cmipPhase, filePath }, 'Reading warming level reference');

    try {
      return await readFile(filePath, 'utf-8');
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && MISSING_FILE_CODES.has(code)) {
        throw new LocalReferenceMissingError(cmipPhase, filePath, this.localDir, error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(
        `Could not read the ${cmipPhase.toUpperCase()} warming level reference at ${filePath}: ${reason}`,
        { cmipPhase, location: filePath, code },
        error
      );
    }
  }
}
