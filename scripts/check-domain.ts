/**
 * Check Domain Availability
 *
 * Checks whether domains can be registered and shows the one-year
 * registration price of each. With --search, tries a keyword against a list
 * of TLDs and shows only the available names.
 * Credentials come from .env / NAMECHEAP_* variables.
 *
 * Usage: npm run check-domain -- [--debug] <domain...>
 *        npm run check-domain -- --search KEYWORD [--tlds com,net] [--premium]
 * Example: npm run check-domain -- example.com example.net
 */

import dotenv from 'dotenv';
dotenv.config();

import { parseArgs } from 'node:util';
import { loadNamecheapConfig } from '../src/config';
import { logger } from '../src/middleware/logging';
import { NamecheapClient } from '../src/namecheap/client';
import { describeApiError } from '../src/namecheap/errorCodes';
import { NamecheapApiError } from '../src/namecheap/errors';
import type { PricedDomain } from '../src/namecheap/types';
import { CheckSchema, SearchSchema } from '../src/lib/schemas';
import { CHECK_HEADERS, checkRows, formatTable } from '../src/lib/report';

async function main() {
  const { values, positionals } = parseArgs({
    options: {
      debug: { type: 'boolean', short: 'd', default: false },
      search: { type: 'string', short: 's' },
      tlds: { type: 'string' },
      premium: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  if (positionals.length === 0 && values.search === undefined) {
    console.log('Usage: npm run check-domain -- [--debug] <domain...>');
    console.log('       npm run check-domain -- --search KEYWORD [--tlds com,net] [--premium]');
    console.log('Example: npm run check-domain -- example.com example.net');
    process.exit(1);
  }

  if (values.debug) {
    logger.level = 'debug';
  }

  const client = new NamecheapClient(loadNamecheapConfig());
  let results: PricedDomain[];

  if (values.search !== undefined) {
    const search = SearchSchema.parse({
      keyword: values.search,
      tlds: values.tlds?.split(','),
      includePremium: values.premium,
    });
    results = await client.searchAvailable(search.keyword, search.tlds, search.includePremium);
  } else {
    const { domains } = CheckSchema.parse({ domains: positionals });
    results = await client.checkWithPricing(domains);
  }

  if (values.debug) {
    console.log('\nDecoded results:');
    console.log(JSON.stringify(results, null, 2));
  }

  console.log('\nResults:');
  console.log(formatTable(CHECK_HEADERS, checkRows(results)));
}

main().catch((err) => {
  if (err instanceof NamecheapApiError) {
    err.errors.forEach((e) => console.error(`Error: ${describeApiError(e)}`));
  } else {
    console.error('Error:', err instanceof Error ? err.message : err);
  }
  process.exit(1);
});
