import { PRODUCTS_TABLE_MARKER } from './auction-selectors.js';

/**
 * The endpoint answers unknown auctions or closed days with a page that
 * mentions "error" and has no products table. Both conditions must hold:
 * a page that says "error" somewhere but still has the table is valid.
 */
export function isErrorResponse(html: string): boolean {
  return html.toUpperCase().includes('ERROR') && !html.includes(PRODUCTS_TABLE_MARKER);
}
