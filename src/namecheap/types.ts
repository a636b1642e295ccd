import type { MalformedResponseError, NamecheapApiError } from './errors';

/**
 * Decimal currency amount exactly as the API wrote it (e.g. "6.00")
 */
export type DecimalAmount = string;

/**
 * Query inputs for namecheap.users.getPricing
 */
export interface PricingRequest {
  productType: string;
  productCategory?: string;
  promotionCode?: string;
  actionName?: string;
  productName?: string;
}

/**
 * One priced offering for a product
 */
export interface PriceEntry {
  readonly duration: number;
  readonly durationType: string;
  readonly price: DecimalAmount;
  readonly regularPrice: DecimalAmount;
  readonly yourPrice: DecimalAmount;
  /** Absent when no coupon applies (the API sends CouponPrice="") */
  readonly couponPrice?: DecimalAmount;
  /** ICANN or registry fee charged on top, when the API reports one */
  readonly additionalCost?: DecimalAmount;
  readonly currency: string;
}

export interface Product {
  readonly name: string;
  readonly prices: ReadonlyArray<PriceEntry>;
}

export interface ProductCategory {
  readonly name: string;
  readonly products: ReadonlyArray<Product>;
}

export interface ProductTypeResult {
  readonly name: string;
  readonly categories: ReadonlyArray<ProductCategory>;
}

/**
 * Trailer elements every ApiResponse carries
 */
export interface ResponseMetadata {
  readonly server: string;
  readonly gmtTimeDifference: string;
  readonly executionTimeSeconds: number;
}

export interface PricingResult extends ResponseMetadata {
  readonly productTypes: ReadonlyArray<ProductTypeResult>;
}

/**
 * Error reported by the remote service in a Status="ERROR" response
 */
export interface ApiError {
  readonly code: number;
  readonly message: string;
}

export type DecodeResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: NamecheapApiError | MalformedResponseError };

/**
 * Availability of a single name from namecheap.domains.check
 */
export interface DomainAvailability {
  readonly domain: string;
  readonly available: boolean;
  readonly premium: boolean;
  readonly premiumRegistrationPrice?: DecimalAmount;
}

export interface DomainCheckResult extends ResponseMetadata {
  readonly domains: ReadonlyArray<DomainAvailability>;
}

/**
 * Availability combined with the one-year registration price of the name
 */
export interface PricedDomain {
  domain: string;
  available: boolean;
  premium: boolean;
  price?: number;
  currency?: string;
}
