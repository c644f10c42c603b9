/**
 * Link metadata fetching for link clips.
 *
 * The page is downloaded once and its <head> parsed with htmlparser2 in SAX
 * mode (parsing stops at </head>). Title prefers og:title over <title>; the
 * favicon comes from <link rel="icon"> or /favicon.ico; the preview image
 * from og:image. Both images are downloaded with the same size cap.
 *
 * @module link-metadata-service
 */

import { Parser } from 'htmlparser2';
import { createLogger } from './logger';
import { ClipKeepError, ErrorCode } from '../../shared/types/errors';
import { MAX_ENRICHMENT_BYTES } from '../../shared/constants';
import type { LinkMetadata } from '../../shared/types/clipboard';

const log = createLogger('LinkMetadata');

const PAGE_FETCH_TIMEOUT_MS = 10_000;
const USER_AGENT = 'clipkeep/1.0 (+link preview)';
const HTML_ACCEPT_HEADER = 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8';

// ─── Contracts ───

export interface LinkMetadataFetcher {
  fetch(url: string): Promise<LinkMetadata>;
}

export type FetchFn = typeof fetch;

export interface HttpLinkMetadataFetcherOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
  maxBytes?: number;
}

/** What the <head> of a page says about itself */
export interface PageHead {
  title: string | null;
  iconUrl: string | null;
  imageUrl: string | null;
}

// ─── Parsing ───

function resolveUrl(href: string | null, baseUrl: string): string | null {
  if (!href) return null;
  try {
    const resolved = new URL(href, baseUrl);
    return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.href : null;
  } catch {
    return null;
  }
}

/**
 * Extract title, icon and preview image from a page's <head>.
 * Relative URLs are resolved against `baseUrl`.
 */
export function parsePageHead(html: string, baseUrl: string): PageHead {
  let ogTitle: string | null = null;
  let titleText: string | null = null;
  let iconHref: string | null = null;
  let imageHref: string | null = null;
  let inTitle = false;
  let titleContent = '';

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        const tagName = name.toLowerCase();

        if (tagName === 'title') {
          inTitle = true;
          titleContent = '';
        } else if (tagName === 'meta') {
          const property = (attribs.property ?? attribs.name)?.toLowerCase();
          const content = attribs.content?.trim();
          if (!content) return;

          if (property === 'og:title' && !ogTitle) {
            ogTitle = content;
          } else if (property === 'og:image' && !imageHref) {
            imageHref = content;
          }
        } else if (tagName === 'link' && !iconHref) {
          const rel = (attribs.rel ?? '').toLowerCase().split(/\s+/);
          if (rel.includes('icon') && attribs.href) {
            iconHref = attribs.href;
          }
        }
      },
      ontext(text) {
        if (inTitle) titleContent += text;
      },
      onclosetag(name) {
        const tagName = name.toLowerCase();
        if (tagName === 'title') {
          inTitle = false;
          if (titleContent.trim() && !titleText) titleText = titleContent.trim();
        } else if (tagName === 'head') {
          parser.pause();
        }
      },
    },
    { decodeEntities: true },
  );

  parser.write(html);
  parser.end();

  return {
    title: ogTitle ?? titleText,
    iconUrl: resolveUrl(iconHref, baseUrl) ?? resolveUrl('/favicon.ico', baseUrl),
    imageUrl: resolveUrl(imageHref, baseUrl),
  };
}

// ─── HTTP fetcher ───

export class HttpLinkMetadataFetcher implements LinkMetadataFetcher {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly maxBytes: number;

  constructor(options: HttpLinkMetadataFetcherOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs ?? PAGE_FETCH_TIMEOUT_MS;
    this.maxBytes = options.maxBytes ?? MAX_ENRICHMENT_BYTES;
  }

  /**
   * Fetch the page and its images. Throws when the page itself cannot be
   * fetched; a missing icon or preview image only leaves that field null.
   */
  async fetch(url: string): Promise<LinkMetadata> {
    const page = await this.download(url, HTML_ACCEPT_HEADER);
    const head = parsePageHead(new TextDecoder().decode(page.body), page.finalUrl);

    const [favicon, previewImage] = await Promise.all([this.tryImage(head.iconUrl), this.tryImage(head.imageUrl)]);

    return { title: head.title, favicon, previewImage };
  }

  private async tryImage(url: string | null): Promise<Uint8Array | null> {
    if (!url) return null;
    try {
      const { body } = await this.download(url, 'image/*');
      return body.byteLength > 0 ? body : null;
    } catch (err) {
      log.debug(`Skipping image ${url}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  private async download(url: string, accept: string): Promise<{ body: Uint8Array; finalUrl: string }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        headers: { 'User-Agent': USER_AGENT, Accept: accept },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (!response.ok) {
        throw new ClipKeepError(`HTTP ${response.status} for ${url}`, ErrorCode.NETWORK_ERROR, {
          context: { url, status: response.status },
        });
      }

      const declared = Number(response.headers.get('content-length') ?? '0');
      if (declared > this.maxBytes) {
        throw new ClipKeepError(`Response too large (${declared} bytes) for ${url}`, ErrorCode.NETWORK_ERROR, {
          context: { url, maxBytes: this.maxBytes },
        });
      }

      const body = await this.readCapped(response, url);
      return { body, finalUrl: response.url || url };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ClipKeepError(`Request timed out: ${url}`, ErrorCode.NETWORK_ERROR, { context: { url } });
      }
      throw ClipKeepError.from(error, ErrorCode.NETWORK_ERROR, { url });
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Read the body chunk by chunk, cancelling the stream once it passes the cap */
  private async readCapped(response: Response, url: string): Promise<Uint8Array> {
    if (!response.body) return new Uint8Array();

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let total = 0;

    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      total += value.byteLength;
      if (total > this.maxBytes) {
        await reader.cancel();
        throw new ClipKeepError(`Response too large (over ${this.maxBytes} bytes) for ${url}`, ErrorCode.NETWORK_ERROR, {
          context: { url, maxBytes: this.maxBytes },
        });
      }
      chunks.push(value);
    }

    const body = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      body.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return body;
  }
}
