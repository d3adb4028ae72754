/**
 * Reads the reference document over HTTP (by default from the raw GitHub
 * copy of cmip_warming_levels), retrying transient transport failures.
 */

import { isAxiosError } from 'axios';
import type { AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { createHttpClient, HTTP_TIMEOUTS } from '../../../config/httpClient.js';
import { DEFAULT_REFERENCE_BASE_URL } from '../../../config/env.js';
import { SourceUnavailableError } from '../../../types/errors.js';
import { createChildLogger } from '../../../utils/logger.js';
import { retryWithBackoff, type RetryConfig } from '../../../utils/retry.js';
import type { CmipPhase } from '../constants.js';
import { referenceDocumentPath, type ReferenceSource } from './ReferenceSource.js';

export type ReferenceHttpClient = Pick<AxiosInstance, 'get'>;

export interface RemoteReferenceSourceOptions {
  baseUrl?: string;
  timeoutMs?: number;
  retry?: RetryConfig;
  httpClient?: ReferenceHttpClient;
  logger?: Logger;
}

export class RemoteReferenceSource implements ReferenceSource {
  readonly name = 'remote';
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig;
  private readonly httpClient: ReferenceHttpClient;
  private readonly logger: Logger;

  constructor(options: RemoteReferenceSourceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_REFERENCE_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? HTTP_TIMEOUTS.STANDARD;
    this.retry = options.retry ?? {};
    this.httpClient = options.httpClient ?? createHttpClient();
    this.logger = options.logger ?? createChildLogger({ component: 'RemoteReferenceSource' });
  }

  urlFor(cmipPhase: CmipPhase): string {
    return `${this.baseUrl}/${referenceDocumentPath(cmipPhase)}`;
  }

  async fetchReferenceDocument(cmipPhase: CmipPhase): Promise<string> {
    const url = this.urlFor(cmipPhase);
    this.logger.debug({ cmipPhase, url }, 'Fetching warming level reference');

    let body: unknown;
    try {
      const response = await retryWithBackoff(
        () =>
          this.httpClient.get<string>(url, {
            timeout: this.timeoutMs,
            responseType: 'text',
            // Keep the body as text; YAML must not go through JSON parsing
            transformResponse: (data: unknown) => data,
          }),
        this.retry,
        `fetch ${cmipPhase} warming level reference`
      );
      body = response.data;
    } catch (error) {
      const status = isAxiosError(error) ? error.response?.status : undefined;
      const reason = error instanceof Error ? error.message : String(error);
      throw new SourceUnavailableError(
        `Could not download the ${cmipPhase.toUpperCase()} warming level reference from ${url}: ${reason}`,
        { cmipPhase, location: url, status },
        error
      );
    }

    if (typeof body !== 'string') {
      throw new SourceUnavailableError(
        `Unexpected response body for the ${cmipPhase.toUpperCase()} warming level reference from ${url}`,
        { cmipPhase, location: url }
      );
    }

    this.logger.debug({ cmipPhase, url, bytes: body.length }, 'Fetched warming level reference');
    return body;
  }
}
