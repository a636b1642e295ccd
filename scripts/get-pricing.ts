/**
 * Get Pricing
 *
 * Fetches namecheap.users.getPricing and prints one row per price entry,
 * or writes the decoded result as JSON with --output.
 *
 * Usage: npm run get-pricing -- --type DOMAIN [--category REGISTER] [--action REGISTER]
 *          [--product com] [--promo CODE] [--output pricing.json]
 */

import dotenv from 'dotenv';
dotenv.config();

import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { loadNamecheapConfig } from '../src/config';
import { NamecheapClient } from '../src/namecheap/client';
import { describeApiError } from '../src/namecheap/errorCodes';
import { NamecheapApiError } from '../src/namecheap/errors';
import { countPriceEntries } from '../src/namecheap/pricing';
import { PRICING_HEADERS, formatTable, pricingRows } from '../src/lib/report';

async function main() {
  const { values } = parseArgs({
    options: {
      type: { type: 'string', short: 't' },
      category: { type: 'string', short: 'c' },
      action: { type: 'string', short: 'a' },
      product: { type: 'string', short: 'p' },
      promo: { type: 'string' },
      output: { type: 'string', short: 'o' },
    },
    strict: true,
  });

  if (!values.type) {
    console.log('Usage: npm run get-pricing -- --type DOMAIN [--category REGISTER] [--product com] [--output file.json]');
    process.exit(1);
  }

  const client = new NamecheapClient(loadNamecheapConfig());
  const result = await client.getPricing({
    productType: values.type,
    productCategory: values.category,
    actionName: values.action,
    productName: values.product,
    promotionCode: values.promo,
  });

  if (values.output) {
    await writeFile(values.output, `${JSON.stringify(result, null, 2)}\n`, 'utf8');
    console.log(`Wrote ${countPriceEntries(result)} price entries to ${values.output}`);
    return;
  }

  console.log(formatTable(PRICING_HEADERS, pricingRows(result)));
  console.log(`\n${result.server} (GMT ${result.gmtTimeDifference}) in ${result.executionTimeSeconds}s`);
}

main().catch((err) => {
  if (err instanceof NamecheapApiError) {
    err.errors.forEach((e) => console.error(`Error: ${describeApiError(e)}`));
  } else {
    console.error('Error:', err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
