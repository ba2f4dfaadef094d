import axios, { type AxiosInstance } from 'axios';
import type { AuctionPageSource } from '../types/index.js';
import { config } from '../utils/config.js';
import { formatSlashDate } from '../utils/dates.js';
import { logger } from '../utils/logger.js';

const CHARSET_PATTERN = /charset\s*=\s*["']?([\w-]+)/i;
const META_CHARSET_PATTERN = /<meta[^>]+charset\s*=\s*["']?([\w-]+)/i;

export class AuctionFetchError extends Error {
  constructor(
    message: string,
    readonly status: number | null
  ) {
    super(message);
    this.name = 'AuctionFetchError';
  }
}

/**
 * HTTP client for the auction price table endpoint.
 * One GET per (auction, day); no retries, failures surface as AuctionFetchError.
 */
export class AuctionClient implements AuctionPageSource {
  private client: AxiosInstance;
  private operation: string;

  constructor(sourceUrl?: string) {
    this.operation = config.source.operation;

    this.client = axios.create({
      baseURL: sourceUrl || config.source.url,
      timeout: config.source.timeoutMs,
      responseType: 'arraybuffer',
      headers: {
        'User-Agent': config.source.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': config.source.acceptLanguage,
        Referer: config.source.referer,
      },
    });
  }

  /**
   * Fetch the raw price table page for one auction on one day
   */
  async fetchAuctionHtml(auctionId: number, date: Date): Promise<string> {
    const params = {
      sub: auctionId,
      fec: formatSlashDate(date),
      op: this.operation,
    };

    logger.debug('Fetching auction page', params);

    try {
      const response = await this.client.get<ArrayBuffer>('', { params });
      const contentType = response.headers['content-type'];

      return decodeBody(
        Buffer.from(response.data),
        typeof contentType === 'string' ? contentType : undefined
      );
    } catch (error) {
      throw this.toFetchError(error);
    }
  }

  private toFetchError(error: unknown): AuctionFetchError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status ?? null;
      return new AuctionFetchError(status !== null ? `HTTP ${status}` : error.message, status);
    }

    return new AuctionFetchError(error instanceof Error ? error.message : String(error), null);
  }
}

/**
 * Decode a response body using the charset from the Content-Type header,
 * then from a <meta charset> declaration, then UTF-8
 */
export function decodeBody(body: Buffer, contentType?: string): string {
  const head = body.subarray(0, 2048).toString('latin1');
  const charset = (
    contentType?.match(CHARSET_PATTERN)?.[1] ||
    head.match(META_CHARSET_PATTERN)?.[1] ||
    'utf-8'
  ).toLowerCase();

  try {
    return new TextDecoder(charset).decode(body);
  } catch (error) {
    logger.debug('Unknown response charset, decoding as UTF-8', {
      charset,
      error: error instanceof Error ? error.message : String(error),
    });
    return new TextDecoder('utf-8').decode(body);
  }
}

export const auctionClient = new AuctionClient();
