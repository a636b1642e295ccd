import { MalformedResponseError } from './errors';
import { booleanAttr, childElements, optionalDecimalAttr, readEnvelope, requiredAttr } from './xml';
import type { DomainAvailability, DomainCheckResult } from './types';

export const DOMAINS_CHECK_COMMAND = 'namecheap.domains.check';

// Limit imposed by the API on DomainList
export const MAX_DOMAINS_PER_CHECK = 50;

// TLDs tried by a keyword search when none are given
export const DEFAULT_SEARCH_TLDS: ReadonlyArray<string> = ['com', 'net', 'org', 'info', 'biz'];

/**
 * Decode a namecheap.domains.check response
 */
export function decodeDomainCheck(document: string): DomainCheckResult {
  const { command, metadata } = readEnvelope(document);
  const path = '/ApiResponse/CommandResponse';

  const domains = childElements(command, 'DomainCheckResult', path).map((node, i): DomainAvailability => {
    const nodePath = `${path}/DomainCheckResult[${i}]`;
    const available = booleanAttr(node, 'Available', nodePath);
    if (available === undefined) {
      throw new MalformedResponseError('missing required attribute', `${nodePath}/@Available`);
    }
    const premiumRegistrationPrice = optionalDecimalAttr(node, 'PremiumRegistrationPrice', nodePath);

    return {
      domain: requiredAttr(node, 'Domain', nodePath),
      available,
      premium: booleanAttr(node, 'IsPremiumName', nodePath) ?? false,
      ...(premiumRegistrationPrice !== undefined ? { premiumRegistrationPrice } : {}),
    };
  });

  return { domains, ...metadata };
}

/**
 * Split a name into its second-level label and TLD: "example.co.uk" → ("example", "co.uk")
 */
export function splitDomainName(domain: string): { sld: string; tld: string } {
  const normalized = domain.trim().toLowerCase();
  const firstDot = normalized.indexOf('.');

  if (firstDot === -1) {
    return { sld: normalized, tld: '' };
  }

  return { sld: normalized.slice(0, firstDot), tld: normalized.slice(firstDot + 1) };
}

/**
 * Candidate names for a keyword search: "shop" with ["com", ".net"] → ["shop.com", "shop.net"]
 */
export function searchCandidates(keyword: string, tlds: ReadonlyArray<string>): string[] {
  const label = keyword.trim().toLowerCase();
  const suffixes = tlds.length > 0 ? tlds : DEFAULT_SEARCH_TLDS;

  return Array.from(new Set(suffixes.map((tld) => `${label}.${tld.trim().toLowerCase().replace(/^\./, '')}`)));
}
