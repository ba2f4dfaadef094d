import * as cheerio from 'cheerio';
import { EntityStore } from '../database/entity-store.js';
import type { AuctionPageSource, HarvestOptions, HarvestStats, ParsedRow } from '../types/index.js';
import { config } from '../utils/config.js';
import { formatSlashDate, subtractDays, toIsoDate } from '../utils/dates.js';
import { logger } from '../utils/logger.js';
import { extractAuctionName, extractTableDate } from './metadata-extractor.js';
import { isErrorResponse } from './response-classifier.js';
import { parseRows } from './row-extractor.js';

const log = logger.child('harvest');

export type PageOutcome =
  | { status: 'invalid' }
  | { status: 'empty'; date: string }
  | { status: 'recorded'; date: string; rows: number; insertedPrices: number };

export interface HarvestOrchestratorOptions {
  store: EntityStore;
  source: AuctionPageSource;
  requestDelayMs?: number;
}

/**
 * Walks the (day × auction) grid, newest day first, one request at a time.
 *
 * Per pair: fetch → classify → parse → reconcile into the store. Failures on
 * one pair are logged and skipped. The store is saved once, after the grid.
 */
export class HarvestOrchestrator {
  private store: EntityStore;
  private source: AuctionPageSource;
  private requestDelayMs: number;

  constructor(options: HarvestOrchestratorOptions) {
    this.store = options.store;
    this.source = options.source;
    this.requestDelayMs = options.requestDelayMs ?? config.harvest.requestDelayMs;
  }

  async run(options: HarvestOptions): Promise<HarvestStats> {
    const stats: HarvestStats = {
      queried: 0,
      insertedPrices: 0,
      failedRequests: 0,
      invalidResponses: 0,
      emptyPages: 0,
      recordedPages: 0,
    };

    log.info('Harvest started', {
      lastDate: formatSlashDate(options.lastDate),
      maxDays: options.maxDays,
      maxAuctions: options.maxAuctions,
    });

    for (let dayOffset = 0; dayOffset < options.maxDays; dayOffset++) {
      const currentDay = subtractDays(options.lastDate, dayOffset);

      for (let auctionId = 1; auctionId <= options.maxAuctions; auctionId++) {
        if (stats.queried > 0) {
          await this.sleep(this.requestDelayMs);
        }
        stats.queried++;

        let html: string;
        try {
          html = await this.source.fetchAuctionHtml(auctionId, currentDay);
        } catch (error) {
          stats.failedRequests++;
          log.warn('Auction request failed', {
            auctionId,
            date: formatSlashDate(currentDay),
            error: error instanceof Error ? error.message : String(error),
          });
          continue;
        }

        const outcome = this.recordPage(auctionId, currentDay, html);
        switch (outcome.status) {
          case 'invalid':
            stats.invalidResponses++;
            break;
          case 'empty':
            stats.emptyPages++;
            break;
          case 'recorded':
            stats.recordedPages++;
            stats.insertedPrices += outcome.insertedPrices;
            break;
        }
      }
    }

    this.store.save();

    log.info('Harvest completed', { ...stats, dataDir: this.store.dataDir });
    return stats;
  }

  /**
   * Reconcile one fetched page into the store. Prices are dated with the day
   * the page displays, which may differ from the requested day.
   */
  recordPage(auctionId: number, requestedDay: Date, html: string): PageOutcome {
    if (isErrorResponse(html)) {
      log.info('No valid auction in response', { auctionId, date: formatSlashDate(requestedDay) });
      return { status: 'invalid' };
    }

    const $ = cheerio.load(html);
    const auctionName = extractAuctionName($, auctionId);
    const displayedDate = toIsoDate(extractTableDate($, requestedDay));
    const rows = parseRows($);

    if (rows.length === 0) {
      log.info('No product rows on page', { auctionId, date: displayedDate });
      return { status: 'empty', date: displayedDate };
    }

    this.store.upsertAuction(auctionId, auctionName);

    let insertedPrices = 0;
    for (const row of rows) {
      insertedPrices += this.recordRow(auctionId, displayedDate, row);
    }

    log.debug('Auction page recorded', {
      auctionId,
      auctionName,
      date: displayedDate,
      rows: rows.length,
      insertedPrices,
    });

    return { status: 'recorded', date: displayedDate, rows: rows.length, insertedPrices };
  }

  private recordRow(auctionId: number, dateIso: string, row: ParsedRow): number {
    const familyId = this.store.getOrCreateFamily(row.familyName);
    const productId = this.store.getOrCreateProduct(familyId, row.productName, row.productUrl);

    let inserted = 0;
    row.cuts.forEach((price, index) => {
      if (price === null) return;
      if (this.store.insertPrice(auctionId, dateIso, productId, index + 1, price)) {
        inserted++;
      }
    });
    return inserted;
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
