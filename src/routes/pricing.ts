import { Router, Request, Response } from 'express';
import { PricingRequestSchema, CheckSchema, SearchSchema } from '../lib/schemas';
import { asyncHandler } from '../lib/errors';
import { getLogger } from '../middleware/logging';
import { countPriceEntries } from '../namecheap/pricing';
import type { NamecheapClient } from '../namecheap/client';

/**
 * The client operations the routes depend on
 */
export type PricingService = Pick<NamecheapClient, 'getPricing' | 'checkWithPricing' | 'searchAvailable'>;

export function createPricingRouter(service: PricingService): Router {
  const router = Router();

  /**
   * GET /pricing
   * Query: productType, productCategory?, promotionCode?, actionName?, productName?
   * Returns: PricingResult
   */
  router.get('/pricing', asyncHandler(async (req: Request, res: Response) => {
    const input = PricingRequestSchema.parse(req.query);
    const result = await service.getPricing(input);

    getLogger(req).info({
      event: 'pricing',
      productType: input.productType,
      productTypes: result.productTypes.length,
      prices: countPriceEntries(result),
    });

    res.json(result);
  }));

  /**
   * POST /check
   * Body: { domains: string[] }
   * Returns: [{ domain, available, premium, price?, currency? }]
   */
  router.post('/check', asyncHandler(async (req: Request, res: Response) => {
    const input = CheckSchema.parse(req.body);
    const results = await service.checkWithPricing(input.domains);

    getLogger(req).info({
      event: 'check',
      requested: input.domains.length,
      available: results.filter((r) => r.available).length,
    });

    res.json(results);
  }));

  /**
   * POST /search
   * Body: { keyword: string, tlds?: string[], includePremium?: boolean }
   * Returns: available names only, premium ones when includePremium is true
   */
  router.post('/search', asyncHandler(async (req: Request, res: Response) => {
    const input = SearchSchema.parse(req.body);
    const results = await service.searchAvailable(input.keyword, input.tlds, input.includePremium);

    getLogger(req).info({
      event: 'search',
      keyword: input.keyword,
      available: results.length,
    });

    res.json(results);
  }));

  return router;
}
