import * as cheerio from 'cheerio';
import type { ParsedRow } from '../types/index.js';
import {
  auctionPageSelectors,
  cellText,
  EMPTY_PRICE_PLACEHOLDERS,
  PRODUCT_URL_PATTERN,
} from './auction-selectors.js';

/**
 * Walk the products table and emit one row per product.
 *
 * Family header rows only update the current family. Product rows seen before
 * any family header are skipped. A page without the products table yields [].
 */
export function parseRows($: cheerio.CheerioAPI): ParsedRow[] {
  const table = $(auctionPageSelectors.productsTable).first();
  if (table.length === 0) {
    return [];
  }

  const rows: ParsedRow[] = [];
  let currentFamily = '';

  for (const element of table.find('tr').toArray()) {
    const row = $(element);

    if (row.hasClass(auctionPageSelectors.familyRowClass)) {
      const familyCell = row.find(auctionPageSelectors.familyCell).first();
      if (familyCell.length > 0) {
        currentFamily = cellText(familyCell.toArray());
      }
      continue;
    }

    const productCell = row.find(auctionPageSelectors.productCell).first();
    if (productCell.length === 0 || !currentFamily) {
      continue;
    }

    rows.push({
      familyName: currentFamily,
      productName: cellText(productCell.toArray()),
      productUrl: parseProductUrl(row.attr('onclick')),
      cuts: row
        .find(auctionPageSelectors.priceCell)
        .toArray()
        .map(cell => parseCutPrice($(cell).text())),
    });
  }

  return rows;
}

/**
 * Pull the target URL out of a row's onclick handler
 */
export function parseProductUrl(onclick: string | undefined): string | null {
  if (!onclick) return null;

  const match = onclick.match(PRODUCT_URL_PATTERN);
  return match ? match[1] : null;
}

/**
 * Parse one price cell. Only digits are kept, so "1.200" and "1200 €"
 * both read as 1200.
 */
export function parseCutPrice(text: string): number | null {
  const trimmed = text.trim();
  if (EMPTY_PRICE_PLACEHOLDERS.includes(trimmed)) {
    return null;
  }

  const digits = trimmed.replace(/[^0-9]/g, '');
  return digits ? Number.parseInt(digits, 10) : null;
}
