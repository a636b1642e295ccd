import { z } from 'zod';
import { MAX_DOMAINS_PER_CHECK } from '../namecheap/domains';

/**
 * Domain name validation (one or more labels plus an alphabetic TLD)
 */
const DOMAIN_REGEX = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,63}$/;

const domainSchema = z
  .string()
  .trim()
  .min(3, 'Domain must be at least 3 characters')
  .max(253, 'Domain must not exceed 253 characters')
  .regex(DOMAIN_REGEX, 'Invalid domain format')
  .transform((val) => val.toLowerCase());

/**
 * Pricing request parameter: a plain token of at most 20 characters
 */
const pricingToken = (field: string) =>
  z
    .string()
    .trim()
    .min(1, `${field} must not be empty`)
    .max(20, `${field} must not exceed 20 characters`)
    .regex(/^[A-Za-z0-9._-]+$/, `${field} must be a plain token`);

/**
 * namecheap.users.getPricing parameters
 */
export const PricingRequestSchema = z.object({
  productType: pricingToken('productType'),
  productCategory: pricingToken('productCategory').optional(),
  promotionCode: pricingToken('promotionCode').optional(),
  actionName: pricingToken('actionName').optional(),
  productName: pricingToken('productName').optional(),
});

/**
 * Availability check request
 */
export const CheckSchema = z.object({
  domains: z
    .array(domainSchema)
    .min(1, 'At least one domain is required')
    .max(MAX_DOMAINS_PER_CHECK, `Maximum ${MAX_DOMAINS_PER_CHECK} domains per check`),
});

/**
 * TLD with or without its leading dot, e.g. "com", ".net" or "co.uk"
 */
const tldSchema = z
  .string()
  .trim()
  .regex(/^\.?[a-zA-Z]{2,63}(?:\.[a-zA-Z]{2,63})*$/, 'Invalid TLD format')
  .transform((val) => val.replace(/^\./, '').toLowerCase());

/**
 * Keyword search request
 */
export const SearchSchema = z.object({
  keyword: z
    .string()
    .trim()
    .min(1, 'Keyword must not be empty')
    .max(63, 'Keyword must not exceed 63 characters')
    .regex(/^[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?$/, 'Keyword must be a single domain label')
    .transform((val) => val.toLowerCase()),
  tlds: z
    .array(tldSchema)
    .min(1, 'At least one TLD is required')
    .max(MAX_DOMAINS_PER_CHECK, `Maximum ${MAX_DOMAINS_PER_CHECK} TLDs per search`)
    .optional(),
  includePremium: z.boolean().default(false),
});

export type PricingRequestInput = z.infer<typeof PricingRequestSchema>;
export type CheckInput = z.infer<typeof CheckSchema>;
export type SearchInput = z.infer<typeof SearchSchema>;
