import { readFileSync } from 'fs';

/** Raw text of the CMIP6 sample reference document */
export function readCmip6Sample(): string {
  return readFileSync(new URL('./cmip6_sample.yml', import.meta.url), 'utf-8');
}
