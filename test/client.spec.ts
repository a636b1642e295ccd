/**
 * Namecheap Client Tests
 *
 * The transport is replaced by a jest.fn, so no request leaves the process
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import axios, { AxiosError, AxiosHeaders } from 'axios';
import { ZodError } from 'zod';
import {
  NamecheapClient,
  PRODUCTION_API_URL,
  SANDBOX_API_URL,
  axiosGet,
  type HttpGet,
  type NamecheapConfig,
} from '../src/namecheap/client';
import { NamecheapApiError, NamecheapTransportError } from '../src/namecheap/errors';

const fixture = (name: string) => readFileSync(join(__dirname, 'fixtures', name), 'utf8');

const config: NamecheapConfig = {
  apiUser: 'test_user',
  apiKey: 'test_key',
  username: 'test_user',
  clientIp: '127.0.0.1',
  sandbox: true,
};

const AUTH_PARAMS = {
  ApiUser: 'test_user',
  ApiKey: 'test_key',
  UserName: 'test_user',
  ClientIp: '127.0.0.1',
};

function checkResponse(results: string): string {
  return `<ApiResponse Status="OK">
      <Errors />
      <CommandResponse Type="namecheap.domains.check">${results}</CommandResponse>
      <Server>TEST-01</Server>
      <GMTTimeDifference>+0</GMTTimeDifference>
      <ExecutionTime>0.1</ExecutionTime>
    </ApiResponse>`;
}

describe('NamecheapClient', () => {
  let httpGet: jest.Mock<Promise<string>, Parameters<HttpGet>>;
  let client: NamecheapClient;

  beforeEach(() => {
    httpGet = jest.fn<Promise<string>, Parameters<HttpGet>>();
    client = new NamecheapClient(config, httpGet);
  });

  describe('constructor', () => {
    it('should require every credential', () => {
      expect(() => new NamecheapClient({ ...config, apiKey: '' }, httpGet)).toThrow(
        'Namecheap client requires apiUser, apiKey, username, and clientIp'
      );
    });

    it('should pick the endpoint from the sandbox flag', () => {
      expect(client.getBaseUrl()).toBe(SANDBOX_API_URL);
      expect(new NamecheapClient({ ...config, sandbox: false }, httpGet).getBaseUrl()).toBe(PRODUCTION_API_URL);
    });

    it('should prefer an explicit base URL', () => {
      const custom = new NamecheapClient({ ...config, baseUrl: 'http://127.0.0.1:8080/xml.response' }, httpGet);

      expect(custom.getBaseUrl()).toBe('http://127.0.0.1:8080/xml.response');
    });
  });

  describe('buildParams', () => {
    it('should add authentication and drop undefined arguments', () => {
      expect(client.buildParams('namecheap.users.getPricing', { ProductType: 'DOMAIN', ProductName: undefined })).toEqual({
        ...AUTH_PARAMS,
        Command: 'namecheap.users.getPricing',
        ProductType: 'DOMAIN',
      });
    });
  });

  describe('getPricing', () => {
    it('should send the query and decode the response', async () => {
      httpGet.mockResolvedValueOnce(fixture('get-pricing-ok.xml'));

      const result = await client.getPricing({ productType: 'DOMAIN', productCategory: 'REGISTER' });

      expect(httpGet).toHaveBeenCalledTimes(1);
      expect(httpGet).toHaveBeenCalledWith(
        SANDBOX_API_URL,
        {
          ...AUTH_PARAMS,
          Command: 'namecheap.users.getPricing',
          ProductType: 'DOMAIN',
          ProductCategory: 'REGISTER',
        },
        10000
      );
      expect(result.server).toBe('IMWS-A06');
      expect(result.productTypes[0].categories.map((c) => c.name)).toEqual(['REACTIVATE', 'REGISTER']);
    });

    it('should pass every optional argument', async () => {
      httpGet.mockResolvedValueOnce(fixture('get-pricing-ok.xml'));
      const timed = new NamecheapClient({ ...config, timeoutMs: 2500 }, httpGet);

      await timed.getPricing({
        productType: 'DOMAIN',
        productCategory: 'REGISTER',
        promotionCode: 'SAVE10',
        actionName: 'REGISTER',
        productName: 'biz',
      });

      expect(httpGet).toHaveBeenCalledWith(
        SANDBOX_API_URL,
        {
          ...AUTH_PARAMS,
          Command: 'namecheap.users.getPricing',
          ProductType: 'DOMAIN',
          ProductCategory: 'REGISTER',
          PromotionCode: 'SAVE10',
          ActionName: 'REGISTER',
          ProductName: 'biz',
        },
        2500
      );
    });

    it('should reject invalid input without calling the API', async () => {
      await expect(client.getPricing({ productType: '' })).rejects.toThrow(ZodError);
      await expect(client.getPricing({ productType: 'DOMAIN', productName: 'x'.repeat(21) })).rejects.toThrow(ZodError);

      expect(httpGet).not.toHaveBeenCalled();
    });

    it('should raise API errors', async () => {
      httpGet.mockResolvedValueOnce(fixture('get-pricing-error.xml'));

      await expect(client.getPricing({ productType: 'BOGUS' })).rejects.toThrow(NamecheapApiError);
    });

    it('should propagate transport failures unchanged', async () => {
      const failure = new NamecheapTransportError('Request timed out after 10000ms', 'TIMEOUT');
      httpGet.mockRejectedValueOnce(failure);

      await expect(client.getPricing({ productType: 'DOMAIN' })).rejects.toBe(failure);
      expect(httpGet).toHaveBeenCalledTimes(1);
    });
  });

  describe('checkDomains', () => {
    it('should send the names as a comma-separated list', async () => {
      httpGet.mockResolvedValueOnce(fixture('domains-check-ok.xml'));

      const result = await client.checkDomains(['example-shop.biz', 'taken.biz', 'gold.bz']);

      expect(httpGet).toHaveBeenCalledWith(
        SANDBOX_API_URL,
        {
          ...AUTH_PARAMS,
          Command: 'namecheap.domains.check',
          DomainList: 'example-shop.biz,taken.biz,gold.bz',
        },
        10000
      );
      expect(result.domains).toHaveLength(3);
    });

    it('should reject an empty list', async () => {
      await expect(client.checkDomains([])).rejects.toThrow('At least one domain is required');
    });

    it('should reject more than 50 names', async () => {
      const domains = Array.from({ length: 51 }, (_, i) => `name${i}.com`);

      await expect(client.checkDomains(domains)).rejects.toThrow(
        'Maximum of 50 domains can be checked in a single API call'
      );
      expect(httpGet).not.toHaveBeenCalled();
    });
  });

  describe('checkWithPricing', () => {
    const respond = (pricing: Record<string, string>, check: string) => {
      httpGet.mockImplementation(async (_url, params) => {
        if (params.Command === 'namecheap.domains.check') {
          return check;
        }
        return pricing[params.ProductName] ?? fixture('get-pricing-error.xml');
      });
    };

    it('should price each name by its TLD', async () => {
      respond(
        { biz: fixture('get-pricing-ok.xml'), bz: fixture('get-pricing-ok.xml') },
        fixture('domains-check-ok.xml')
      );

      const results = await client.checkWithPricing(['example-shop.biz', 'taken.biz', 'gold.bz']);

      expect(results).toEqual([
        { domain: 'example-shop.biz', available: true, premium: false, price: 6, currency: 'USD' },
        { domain: 'taken.biz', available: false, premium: false, price: 6, currency: 'USD' },
        { domain: 'gold.bz', available: true, premium: true, price: 2500, currency: 'USD' },
      ]);
    });

    it('should request pricing once per TLD', async () => {
      respond(
        { biz: fixture('get-pricing-ok.xml'), bz: fixture('get-pricing-ok.xml') },
        fixture('domains-check-ok.xml')
      );

      await client.checkWithPricing(['example-shop.biz', 'taken.biz', 'gold.bz']);

      const pricingCalls = httpGet.mock.calls.filter(([, params]) => params.Command === 'namecheap.users.getPricing');
      expect(pricingCalls.map(([, params]) => params.ProductName)).toEqual(['biz', 'bz']);
      expect(pricingCalls[0][1]).toMatchObject({
        ProductType: 'DOMAIN',
        ProductCategory: 'REGISTER',
        ActionName: 'REGISTER',
      });
    });

    it('should leave the price out when the TLD has no one-year registration entry', async () => {
      respond(
        { bz: fixture('get-pricing-ok.xml') },
        checkResponse('<DomainCheckResult Domain="plain.bz" Available="true" IsPremiumName="false" />')
      );

      const results = await client.checkWithPricing(['plain.bz']);

      expect(results).toEqual([{ domain: 'plain.bz', available: true, premium: false }]);
      expect('price' in results[0]).toBe(false);
    });

    it('should use the regular price for a premium name without a premium price', async () => {
      respond(
        { biz: fixture('get-pricing-ok.xml') },
        checkResponse('<DomainCheckResult Domain="rare.biz" Available="true" IsPremiumName="true" PremiumRegistrationPrice="0" />')
      );

      const results = await client.checkWithPricing(['rare.biz']);

      expect(results).toEqual([{ domain: 'rare.biz', available: true, premium: true, price: 6, currency: 'USD' }]);
    });

    it('should fail when pricing fails', async () => {
      respond({}, fixture('domains-check-ok.xml'));

      await expect(client.checkWithPricing(['example-shop.biz'])).rejects.toThrow(NamecheapApiError);
    });
  });

  describe('searchAvailable', () => {
    const SEARCH_RESULTS = checkResponse(`
      <DomainCheckResult Domain="example.com" Available="false" IsPremiumName="false" />
      <DomainCheckResult Domain="example.net" Available="true" IsPremiumName="false" />
      <DomainCheckResult Domain="example.org" Available="true" IsPremiumName="true" PremiumRegistrationPrice="1200.00" />
      <DomainCheckResult Domain="example.info" Available="true" IsPremiumName="false" />
      <DomainCheckResult Domain="example.biz" Available="true" IsPremiumName="false" />
    `);

    beforeEach(() => {
      httpGet.mockImplementation(async (_url, params) =>
        params.Command === 'namecheap.domains.check' ? SEARCH_RESULTS : fixture('get-pricing-ok.xml')
      );
    });

    it('should check the keyword against the default TLDs', async () => {
      await client.searchAvailable('example');

      expect(httpGet.mock.calls[0][1].DomainList).toBe('example.com,example.net,example.org,example.info,example.biz');
    });

    it('should return only available names that are not premium', async () => {
      const results = await client.searchAvailable('example');

      expect(results).toEqual([
        { domain: 'example.net', available: true, premium: false },
        { domain: 'example.info', available: true, premium: false },
        { domain: 'example.biz', available: true, premium: false, price: 6, currency: 'USD' },
      ]);
    });

    it('should include premium names when asked', async () => {
      const results = await client.searchAvailable('example', undefined, true);

      expect(results.map((r) => r.domain)).toEqual(['example.net', 'example.org', 'example.info', 'example.biz']);
      expect(results[1]).toEqual({ domain: 'example.org', available: true, premium: true, price: 1200, currency: 'USD' });
    });

    it('should accept TLDs with or without a leading dot', async () => {
      await client.searchAvailable('Shop', ['.COM', 'co.uk']);

      expect(httpGet.mock.calls[0][1].DomainList).toBe('shop.com,shop.co.uk');
    });

    it('should reject an empty keyword', async () => {
      await expect(client.searchAvailable('  ')).rejects.toThrow('A search keyword is required');
      expect(httpGet).not.toHaveBeenCalled();
    });
  });
});

describe('axiosGet', () => {
  let get: jest.Mock;

  beforeEach(() => {
    get = jest.spyOn(axios, 'get') as unknown as jest.Mock;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should request text with the query parameters', async () => {
    get.mockResolvedValueOnce({ data: '<ApiResponse Status="OK" />' });

    const body = await axiosGet(SANDBOX_API_URL, { Command: 'namecheap.users.getPricing' }, 5000);

    expect(body).toBe('<ApiResponse Status="OK" />');
    expect(get).toHaveBeenCalledWith(SANDBOX_API_URL, {
      params: { Command: 'namecheap.users.getPricing' },
      timeout: 5000,
      responseType: 'text',
      headers: { 'User-Agent': 'namecheap-pricing/1.0' },
    });
  });

  it('should report timeouts', async () => {
    get.mockRejectedValueOnce(new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED'));

    await expect(axiosGet(SANDBOX_API_URL, {}, 5000)).rejects.toMatchObject({
      name: 'NamecheapTransportError',
      code: 'TIMEOUT',
      message: 'Request timed out after 5000ms',
    });
  });

  it('should report HTTP error statuses', async () => {
    const response = {
      data: 'Service Unavailable',
      status: 503,
      statusText: 'Service Unavailable',
      headers: {},
      config: { headers: new AxiosHeaders() },
    };
    get.mockRejectedValueOnce(
      new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', undefined, undefined, response)
    );

    await expect(axiosGet(SANDBOX_API_URL, {}, 5000)).rejects.toMatchObject({
      code: 'HTTP_ERROR',
      message: 'HTTP 503: Service Unavailable',
      details: { status: 503, body: 'Service Unavailable' },
    });
  });

  it('should report network failures', async () => {
    get.mockRejectedValueOnce(new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED'));

    await expect(axiosGet(SANDBOX_API_URL, {}, 5000)).rejects.toMatchObject({
      code: 'NETWORK_ERROR',
      message: 'Network error: connect ECONNREFUSED 127.0.0.1:443',
    });
  });

  it('should rethrow anything that is not an axios error', async () => {
    const failure = new TypeError('unexpected');
    get.mockRejectedValueOnce(failure);

    await expect(axiosGet(SANDBOX_API_URL, {}, 5000)).rejects.toBe(failure);
  });
});
