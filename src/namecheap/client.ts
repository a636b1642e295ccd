/**
 * Namecheap XML API client
 *
 * Builds the authenticated query string, performs a single GET per call and
 * hands the response text to the matching decoder. API errors and transport
 * failures reach the caller on the first occurrence; nothing is retried or cached.
 *
 * API Documentation: https://www.namecheap.com/support/api/intro/
 */

import axios from 'axios';
import { logger } from '../middleware/logging';
import { incProviderCall } from '../metrics';
import { PricingRequestSchema } from '../lib/schemas';
import { NamecheapTransportError } from './errors';
import {
  DEFAULT_SEARCH_TLDS,
  DOMAINS_CHECK_COMMAND,
  MAX_DOMAINS_PER_CHECK,
  decodeDomainCheck,
  searchCandidates,
  splitDomainName,
} from './domains';
import { PRICING_COMMAND, decodePricing, findProduct } from './pricing';
import type { DomainCheckResult, PricedDomain, PricingRequest, PricingResult } from './types';

export const SANDBOX_API_URL = 'https://api.sandbox.namecheap.com/xml.response';
export const PRODUCTION_API_URL = 'https://api.namecheap.com/xml.response';

const USER_AGENT = 'namecheap-pricing/1.0';
const DEFAULT_TIMEOUT_MS = 10_000;

export interface NamecheapConfig {
  apiUser: string;
  apiKey: string;
  username: string;
  clientIp: string;
  sandbox: boolean;
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Performs one GET and resolves with the response body text
 */
export type HttpGet = (url: string, params: Record<string, string>, timeoutMs: number) => Promise<string>;

/**
 * Default transport backed by axios
 */
export const axiosGet: HttpGet = async (url, params, timeoutMs) => {
  try {
    const response = await axios.get<string>(url, {
      params,
      timeout: timeoutMs,
      responseType: 'text',
      headers: {
        'User-Agent': USER_AGENT,
      },
    });
    return response.data;
  } catch (error) {
    if (!axios.isAxiosError(error)) {
      throw error;
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      throw new NamecheapTransportError(`Request timed out after ${timeoutMs}ms`, 'TIMEOUT', {
        code: error.code,
      });
    }
    if (error.response) {
      throw new NamecheapTransportError(
        `HTTP ${error.response.status}: ${error.response.statusText}`,
        'HTTP_ERROR',
        { status: error.response.status, body: error.response.data }
      );
    }
    throw new NamecheapTransportError(`Network error: ${error.message}`, 'NETWORK_ERROR', {
      code: error.code,
    });
  }
};

export class NamecheapClient {
  private readonly config: NamecheapConfig;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly httpGet: HttpGet;
  private readonly log = logger.child({ provider: 'namecheap' });

  constructor(config: NamecheapConfig, httpGet: HttpGet = axiosGet) {
    if (!config.apiUser || !config.apiKey || !config.username || !config.clientIp) {
      throw new Error('Namecheap client requires apiUser, apiKey, username, and clientIp');
    }

    this.config = config;
    this.baseUrl = config.baseUrl || (config.sandbox ? SANDBOX_API_URL : PRODUCTION_API_URL);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.httpGet = httpGet;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Authentication parameters plus the command and its arguments.
   * Arguments left undefined are not sent.
   */
  buildParams(command: string, extra: Record<string, string | undefined> = {}): Record<string, string> {
    const params: Record<string, string> = {
      ApiUser: this.config.apiUser,
      ApiKey: this.config.apiKey,
      UserName: this.config.username,
      ClientIp: this.config.clientIp,
      Command: command,
    };

    for (const [key, value] of Object.entries(extra)) {
      if (value !== undefined) {
        params[key] = value;
      }
    }

    return params;
  }

  private async execute<T>(
    command: string,
    extra: Record<string, string | undefined>,
    decode: (document: string) => T
  ): Promise<T> {
    const params = this.buildParams(command, extra);
    const startTime = Date.now();

    try {
      const body = await this.httpGet(this.baseUrl, params, this.timeoutMs);
      const result = decode(body);

      incProviderCall('namecheap', command, 'success');
      this.log.debug({ event: 'provider_call', command, params, latency: Date.now() - startTime });

      return result;
    } catch (error) {
      incProviderCall('namecheap', command, 'error');
      this.log.warn({
        event: 'provider_call_failed',
        command,
        latency: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * namecheap.users.getPricing
   */
  async getPricing(request: PricingRequest): Promise<PricingResult> {
    const input = PricingRequestSchema.parse(request);

    return this.execute(
      PRICING_COMMAND,
      {
        ProductType: input.productType,
        ProductCategory: input.productCategory,
        PromotionCode: input.promotionCode,
        ActionName: input.actionName,
        ProductName: input.productName,
      },
      decodePricing
    );
  }

  /**
   * namecheap.domains.check for up to 50 names
   */
  async checkDomains(domains: string[]): Promise<DomainCheckResult> {
    if (domains.length === 0) {
      throw new Error('At least one domain is required');
    }
    if (domains.length > MAX_DOMAINS_PER_CHECK) {
      throw new Error(`Maximum of ${MAX_DOMAINS_PER_CHECK} domains can be checked in a single API call`);
    }

    return this.execute(DOMAINS_CHECK_COMMAND, { DomainList: domains.join(',') }, decodeDomainCheck);
  }

  /**
   * Availability of each name together with the one-year registration price
   * of its TLD. Premium names are priced at their premium registration price.
   */
  async checkWithPricing(domains: string[]): Promise<PricedDomain[]> {
    const availability = await this.checkDomains(domains);

    const tlds = Array.from(new Set(availability.domains.map((d) => splitDomainName(d.domain).tld)));
    const pricing = await Promise.all(
      tlds.map(async (tld) => {
        const result = await this.getPricing({
          productType: 'DOMAIN',
          productCategory: 'REGISTER',
          actionName: 'REGISTER',
          productName: tld,
        });
        const entry = findProduct(result, 'DOMAIN', 'REGISTER', tld)?.prices.find(
          (p) => p.duration === 1 && p.durationType.toUpperCase() === 'YEAR'
        );
        return [tld, entry] as const;
      })
    );
    const priceByTld = new Map(pricing);

    return availability.domains.map((info) => {
      const entry = priceByTld.get(splitDomainName(info.domain).tld);
      const premiumPrice = info.premiumRegistrationPrice !== undefined
        ? parseFloat(info.premiumRegistrationPrice)
        : 0;

      const priced: PricedDomain = {
        domain: info.domain,
        available: info.available,
        premium: info.premium,
      };

      if (info.premium && premiumPrice > 0) {
        // Premium registration prices are quoted in USD
        priced.price = premiumPrice;
        priced.currency = 'USD';
      } else if (entry) {
        priced.price = parseFloat(entry.price);
        priced.currency = entry.currency;
      }

      return priced;
    });
  }

  /**
   * Available names made of the keyword and each TLD, with their prices.
   * Premium names are left out unless includePremium is set.
   */
  async searchAvailable(
    keyword: string,
    tlds: ReadonlyArray<string> = DEFAULT_SEARCH_TLDS,
    includePremium = false
  ): Promise<PricedDomain[]> {
    if (!keyword.trim()) {
      throw new Error('A search keyword is required');
    }

    const results = await this.checkWithPricing(searchCandidates(keyword, tlds));

    return results.filter((r) => r.available && (includePremium || !r.premium));
  }
}
