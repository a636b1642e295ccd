import type { ApiError } from './types';

interface ErrorCodeInfo {
  meaning: string;
  hint?: string;
}

/**
 * Error numbers documented by the vendor. Unknown numbers are still
 * surfaced verbatim; this table only adds descriptions.
 */
export const DOCUMENTED_ERROR_CODES: ReadonlyMap<number, ErrorCodeInfo> = new Map([
  [2011170, { meaning: 'PromotionCode is invalid' }],
  [2011298, { meaning: 'ProductType is invalid' }],
  [1011102, {
    meaning: 'API Key is invalid or API access has not been enabled',
    hint: 'Verify the API key and enable API access in the Namecheap account settings',
  }],
  [1011147, {
    meaning: 'IP is not in the whitelist',
    hint: 'Whitelist the client IP in the Namecheap API settings',
  }],
  [1010900, {
    meaning: 'Invalid username',
    hint: 'Check that NAMECHEAP_USERNAME is correct',
  }],
]);

export function isDocumentedErrorCode(code: number): boolean {
  return DOCUMENTED_ERROR_CODES.has(code);
}

/**
 * Human-readable line for an API error, with an operator hint when one is known
 */
export function describeApiError(error: ApiError): string {
  const info = DOCUMENTED_ERROR_CODES.get(error.code);
  const base = `${error.code}: ${error.message}`;
  return info?.hint ? `${base} - ${info.hint}` : base;
}
