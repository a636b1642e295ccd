export * from './types';
export * from './errors';
export * from './errorCodes';
export { decodePricing, safeDecodePricing, encodePricing, encodeErrors, countPriceEntries, findProduct, PRICING_COMMAND } from './pricing';
export { decodeDomainCheck, splitDomainName, searchCandidates, DEFAULT_SEARCH_TLDS, DOMAINS_CHECK_COMMAND, MAX_DOMAINS_PER_CHECK } from './domains';
export { NamecheapClient, axiosGet, SANDBOX_API_URL, PRODUCTION_API_URL } from './client';
export type { NamecheapConfig, HttpGet } from './client';
export { NAMESPACE } from './xml';
