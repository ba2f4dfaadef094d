import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type {
  AuctionRecord,
  FamilyRecord,
  PriceRecord,
  ProductRecord,
  StoreCounts,
} from '../types/index.js';
import { logger } from '../utils/logger.js';

const log = logger.child('store');

const auctionSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

const familySchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

const productSchema = z.object({
  id: z.number().int(),
  family_id: z.number().int(),
  name: z.string(),
  url: z.string().nullable().default(null),
});

const priceSchema = z.object({
  auction_id: z.number().int(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  product_id: z.number().int(),
  cut: z.number().int().positive(),
  price: z.number().int(),
});

export const COLLECTION_FILES = {
  auctions: 'auctions.json',
  families: 'families.json',
  products: 'products.json',
  prices: 'prices.json',
} as const;

/**
 * Case and surrounding whitespace never distinguish two families or products
 */
export function normalizeKey(name: string): string {
  return name.trim().toLowerCase();
}

function priceKey(auctionId: number, date: string, productId: number, cut: number): string {
  return `${auctionId}|${date}|${productId}|${cut}`;
}

function productKey(familyId: number, name: string): string {
  return `${familyId}|${normalizeKey(name)}`;
}

function nextId(records: ReadonlyArray<{ id: number }>): number {
  return records.reduce((max, record) => Math.max(max, record.id), 0) + 1;
}

/**
 * JSON-file backed store for auctions, families, products and prices.
 *
 * Lookups by natural key go through indices rebuilt at load time. Families
 * and products get surrogate ids (max + 1); auction ids come from the caller.
 * Nothing is written until save().
 */
export class EntityStore {
  private auctions: AuctionRecord[];
  private families: FamilyRecord[];
  private products: ProductRecord[];
  private prices: PriceRecord[];

  private auctionsById = new Map<number, AuctionRecord>();
  private familiesById = new Map<number, FamilyRecord>();
  private familiesByName = new Map<string, FamilyRecord>();
  private productsById = new Map<number, ProductRecord>();
  private productsByKey = new Map<string, ProductRecord>();
  private priceKeys = new Set<string>();

  constructor(readonly dataDir: string) {
    this.auctions = this.load(COLLECTION_FILES.auctions, auctionSchema);
    this.families = this.load(COLLECTION_FILES.families, familySchema);
    this.products = this.load(COLLECTION_FILES.products, productSchema);
    this.prices = [];

    for (const auction of this.auctions) {
      this.auctionsById.set(auction.id, auction);
    }
    for (const family of this.families) {
      this.familiesById.set(family.id, family);
      this.familiesByName.set(normalizeKey(family.name), family);
    }
    for (const product of this.products) {
      this.productsById.set(product.id, product);
      this.productsByKey.set(productKey(product.family_id, product.name), product);
    }

    let duplicates = 0;
    for (const price of this.load(COLLECTION_FILES.prices, priceSchema)) {
      const key = priceKey(price.auction_id, price.date, price.product_id, price.cut);
      if (this.priceKeys.has(key)) {
        duplicates++;
        continue;
      }
      this.priceKeys.add(key);
      this.prices.push(price);
    }
    if (duplicates > 0) {
      log.warn('Dropped duplicate price records', { duplicates });
    }

    log.debug('Store loaded', { dataDir, ...this.counts() });
  }

  /**
   * Create the auction, or rename it when a non-empty, different name arrives
   */
  upsertAuction(id: number, name: string): void {
    const trimmed = name.trim();
    const stored = this.auctionsById.get(id);

    if (!stored) {
      const record: AuctionRecord = { id, name: trimmed };
      this.auctions.push(record);
      this.auctionsById.set(id, record);
      return;
    }

    if (trimmed && stored.name !== trimmed) {
      log.info('Auction renamed', { id, from: stored.name, to: trimmed });
      stored.name = trimmed;
    }
  }

  getOrCreateFamily(name: string): number {
    const key = normalizeKey(name);
    const existing = this.familiesByName.get(key);
    if (existing) {
      return existing.id;
    }

    const record: FamilyRecord = { id: nextId(this.families), name: name.trim() };
    this.families.push(record);
    this.familiesById.set(record.id, record);
    this.familiesByName.set(key, record);
    return record.id;
  }

  /**
   * Look up a product within its family. An existing product without a URL
   * takes the incoming one; its name never changes.
   */
  getOrCreateProduct(familyId: number, name: string, url?: string | null): number {
    const key = productKey(familyId, name);
    const existing = this.productsByKey.get(key);
    if (existing) {
      if (url && !existing.url) {
        existing.url = url;
      }
      return existing.id;
    }

    const record: ProductRecord = {
      id: nextId(this.products),
      family_id: familyId,
      name: name.trim(),
      url: url || null,
    };
    this.products.push(record);
    this.productsById.set(record.id, record);
    this.productsByKey.set(key, record);
    return record.id;
  }

  /**
   * Insert a price unless its (auction, date, product, cut) key is known.
   * Returns true only when a record was added.
   */
  insertPrice(auctionId: number, dateIso: string, productId: number, cut: number, price: number): boolean {
    const key = priceKey(auctionId, dateIso, productId, cut);
    if (this.priceKeys.has(key)) {
      return false;
    }

    this.prices.push({
      auction_id: auctionId,
      date: dateIso,
      product_id: productId,
      cut,
      price,
    });
    this.priceKeys.add(key);
    return true;
  }

  getAuction(id: number): AuctionRecord | null {
    const record = this.auctionsById.get(id);
    return record ? { ...record } : null;
  }

  getFamily(id: number): FamilyRecord | null {
    const record = this.familiesById.get(id);
    return record ? { ...record } : null;
  }

  getProduct(id: number): ProductRecord | null {
    const record = this.productsById.get(id);
    return record ? { ...record } : null;
  }

  listPrices(): PriceRecord[] {
    return this.prices.map(price => ({ ...price }));
  }

  counts(): StoreCounts {
    return {
      auctions: this.auctions.length,
      families: this.families.length,
      products: this.products.length,
      prices: this.prices.length,
    };
  }

  /**
   * Rewrite every collection. Each file goes through a temp file + rename,
   * so an interrupted save leaves the other files as they were.
   */
  save(): void {
    mkdirSync(this.dataDir, { recursive: true });

    this.writeCollection(COLLECTION_FILES.auctions, this.auctions);
    this.writeCollection(COLLECTION_FILES.families, this.families);
    this.writeCollection(COLLECTION_FILES.products, this.products);
    this.writeCollection(COLLECTION_FILES.prices, this.prices);

    log.info('Store saved', { dataDir: this.dataDir, ...this.counts() });
  }

  private writeCollection(fileName: string, records: readonly object[]): void {
    const path = join(this.dataDir, fileName);
    const tempPath = `${path}.tmp`;

    writeFileSync(tempPath, JSON.stringify(records, null, 2) + '\n', 'utf-8');
    renameSync(tempPath, path);
  }

  /**
   * Read one collection; anything unreadable becomes an empty collection
   */
  private load<T extends z.ZodTypeAny>(fileName: string, schema: T): Array<z.output<T>> {
    const path = join(this.dataDir, fileName);
    if (!existsSync(path)) {
      log.debug('No stored collection, starting empty', { file: fileName });
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      log.warn('Unreadable stored collection, starting empty', {
        file: fileName,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }

    const result = z.array(schema).safeParse(data);
    if (!result.success) {
      log.warn('Invalid stored collection, starting empty', {
        file: fileName,
        issues: result.error.issues.length,
      });
      return [];
    }

    return result.data;
  }
}
