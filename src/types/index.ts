// Persisted records (one JSON array per collection)
export interface AuctionRecord {
  id: number;
  name: string;
}

export interface FamilyRecord {
  id: number;
  name: string;
}

export interface ProductRecord {
  id: number;
  family_id: number;
  name: string;
  url: string | null;
}

export interface PriceRecord {
  auction_id: number;
  date: string;
  product_id: number;
  cut: number;
  price: number;
}

export interface StoreCounts {
  auctions: number;
  families: number;
  products: number;
  prices: number;
}

// Scraper Types
export interface ParsedRow {
  familyName: string;
  productName: string;
  productUrl: string | null;
  cuts: Array<number | null>;
}

export interface AuctionPageSource {
  fetchAuctionHtml(auctionId: number, date: Date): Promise<string>;
}

export interface HarvestOptions {
  lastDate: Date;
  maxDays: number;
  maxAuctions: number;
}

export interface HarvestStats {
  queried: number;
  insertedPrices: number;
  failedRequests: number;
  invalidResponses: number;
  emptyPages: number;
  recordedPages: number;
}

// Configuration
export interface Config {
  source: {
    url: string;
    operation: string;
    userAgent: string;
    acceptLanguage: string;
    referer: string;
    timeoutMs: number;
  };
  harvest: {
    requestDelayMs: number;
    dataDir: string;
  };
  app: {
    logLevel: LogLevel;
    logFormat: LogFormat;
  };
}

// Utility Types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(component: string): Logger;
}
