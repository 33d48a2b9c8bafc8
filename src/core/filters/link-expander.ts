import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { Readable } from 'stream';

/**
 * Path fragments that identify a product page; only those get their
 * query string (tracking parameters) removed
 */
export const PRODUCT_PATH_MARKERS = ['/dp/', '/gp/'];

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const REDIRECT_STATUSES = [301, 302, 303, 307, 308];

/**
 * Resolves a link to its canonical form
 */
export interface LinkExpander {
  /**
   * Never rejects: on failure the original URL is returned
   */
  expand(url: string): Promise<string>;
}

export interface HttpLinkExpanderOptions {
  timeoutMs?: number;
  maxRedirects?: number;
  userAgent?: string;
  http?: AxiosInstance;
}

export function isProductUrl(url: string): boolean {
  return PRODUCT_PATH_MARKERS.some((marker) => url.includes(marker));
}

/**
 * Drop the query string of product URLs; other URLs are returned as is
 */
export function stripProductQuery(url: string): string {
  if (isProductUrl(url) && url.includes('?')) {
    return url.split('?')[0];
  }
  return url;
}

/**
 * Follows redirects over HTTP with a bounded total timeout
 */
export class HttpLinkExpander implements LinkExpander {
  private readonly logger = new Logger(HttpLinkExpander.name);
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;

  constructor(options: HttpLinkExpanderOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxRedirects = options.maxRedirects ?? 10;
    this.http =
      options.http ??
      axios.create({
        timeout: this.timeoutMs,
        headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT },
      });
  }

  async expand(url: string): Promise<string> {
    try {
      const finalUrl = await this.resolve(url);
      return stripProductQuery(finalUrl);
    } catch (error) {
      this.logger.error(
        `Failed to expand ${url}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return url;
    }
  }

  /**
   * Walk Location headers one hop at a time
   */
  private async resolve(url: string): Promise<string> {
    const signal = AbortSignal.timeout(this.timeoutMs);
    let current = url;

    for (let hop = 0; hop <= this.maxRedirects; hop++) {
      const response = await this.http.get<unknown>(current, {
        maxRedirects: 0,
        responseType: 'stream',
        validateStatus: () => true,
        signal,
      });
      closeBody(response.data);

      const location = response.headers['location'];
      if (!REDIRECT_STATUSES.includes(response.status) || typeof location !== 'string') {
        return current;
      }

      current = new URL(location, current).toString();
    }

    throw new Error(`Too many redirects (>${this.maxRedirects})`);
  }
}

function closeBody(body: unknown): void {
  if (body instanceof Readable) {
    body.destroy();
  }
}
