import { getEnv, type Env } from '../../../config/env.js';
import { FallbackReferenceSource } from './FallbackReferenceSource.js';
import { LocalReferenceSource } from './LocalReferenceSource.js';
import { RemoteReferenceSource } from './RemoteReferenceSource.js';
import type { ReferenceSource } from './ReferenceSource.js';

/**
 * Build the reference source selected by GWL_REFERENCE_SOURCE
 */
export function createReferenceSource(env: Env = getEnv()): ReferenceSource {
  const remote = (): RemoteReferenceSource =>
    new RemoteReferenceSource({
      baseUrl: env.GWL_REFERENCE_BASE_URL,
      timeoutMs: env.GWL_HTTP_TIMEOUT_MS,
      retry: {
        maxAttempts: env.GWL_FETCH_MAX_RETRIES,
        initialDelay: env.GWL_FETCH_RETRY_DELAY_MS,
      },
    });
  const local = (): LocalReferenceSource => new LocalReferenceSource({ localDir: env.GWL_REFERENCE_LOCAL_DIR });

  switch (env.GWL_REFERENCE_SOURCE) {
    case 'remote':
      return remote();
    case 'local':
      return local();
    case 'auto':
      return new FallbackReferenceSource([remote(), local()]);
  }
}
