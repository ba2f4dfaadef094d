import * as cheerio from 'cheerio';
import { findDashDate } from '../utils/dates.js';
import { auctionPageSelectors, cellText } from './auction-selectors.js';

/**
 * Auction display name from the header table, or "Subasta <id>" when the
 * page does not carry one
 */
export function extractAuctionName($: cheerio.CheerioAPI, fallbackId: number): string {
  const name = cellText($(auctionPageSelectors.auctionName).first().toArray());
  return name || `Subasta ${fallbackId}`;
}

/**
 * Date printed in the header table (dd-mm-yyyy). The page may show a different
 * day than the one requested; when no valid date is found the requested day
 * is returned.
 */
export function extractTableDate($: cheerio.CheerioAPI, fallback: Date): Date {
  const cell = $(auctionPageSelectors.tableDate).first();
  if (cell.length === 0) {
    return fallback;
  }

  return findDashDate(cellText(cell.toArray())) ?? fallback;
}
