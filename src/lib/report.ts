/**
 * Plain-text table rendering for the command-line scripts
 */

import type { PricedDomain, PricingResult } from '../namecheap/types';

export type Cell = string | number | boolean;

const PADDING = 2;

/**
 * Left-aligned columns, each as wide as its longest cell plus padding,
 * with a dashed separator under the header
 */
export function formatTable(headers: string[], rows: Cell[][]): string {
  const widths = headers.map((header, i) =>
    rows.reduce((width, row) => Math.max(width, String(row[i] ?? '').length), header.length) + PADDING
  );

  const renderRow = (cells: Cell[]) =>
    widths.map((width, i) => String(cells[i] ?? '').padEnd(width)).join('').trimEnd();

  return [renderRow(headers), '-'.repeat(widths.reduce((a, b) => a + b, 0)), ...rows.map(renderRow)].join('\n');
}

export const CHECK_HEADERS = ['Domain', 'Available', 'Premium', 'Price'];

export function checkRows(results: PricedDomain[]): Cell[][] {
  return results.map((r) => [
    r.domain,
    r.available ? 'Yes' : 'No',
    r.premium ? 'Yes' : 'No',
    r.available && r.price !== undefined ? `$${r.price.toFixed(2)}` : 'N/A',
  ]);
}

export const PRICING_HEADERS = ['Type', 'Category', 'Product', 'Duration', 'Price', 'Regular', 'Yours', 'Coupon', 'Currency'];

/**
 * One row per price entry, in document order
 */
export function pricingRows(result: PricingResult): Cell[][] {
  return result.productTypes.flatMap((productType) =>
    productType.categories.flatMap((category) =>
      category.products.flatMap((product) =>
        product.prices.map((entry) => [
          productType.name,
          category.name,
          product.name,
          `${entry.duration} ${entry.durationType}`,
          entry.price,
          entry.regularPrice,
          entry.yourPrice,
          entry.couponPrice ?? '-',
          entry.currency,
        ])
      )
    )
  );
}
