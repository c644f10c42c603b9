/**
 * ImageCacheService — decoded, rescaled derived images for clip records.
 *
 * Three bounded LRU caches (thumbnails, favicons, link preview images) keyed
 * by record id and target size. Decoding runs through sharp; concurrent
 * requests for the same entry share one decode. Records that leave the
 * history are dropped with invalidate(id).
 *
 * @module image-cache-service
 */

import sharp from 'sharp';
import { createLogger } from './logger';
import { LRUCache } from './lru-cache';
import { ClipKeepError, ErrorCode } from '../../shared/types/errors';
import {
  FAVICON_CACHE_LIMIT,
  FAVICON_MAX_SIZE,
  LINK_IMAGE_CACHE_LIMIT,
  LINK_IMAGE_MAX_SIZE,
  THUMBNAIL_CACHE_LIMIT,
  THUMBNAIL_MAX_SIZE,
} from '../../shared/constants';
import type { CachedImage, ImageSize } from '../../shared/types/clipboard';

const log = createLogger('ImageCache');

type AssetKind = 'thumbnail' | 'favicon' | 'linkImage';

interface AssetCache {
  entries: LRUCache<string, CachedImage>;
  defaultSize: ImageSize;
}

export interface ImageCacheLimits {
  thumbnails?: number;
  favicons?: number;
  linkImages?: number;
}

export interface ImageCacheStats {
  thumbnails: number;
  favicons: number;
  linkImages: number;
  pending: number;
  /** Records invalidated while one of their decodes was still running */
  staleGuards: number;
}

function entryKey(id: string, size: ImageSize): string {
  return `${id}@${size.width}x${size.height}`;
}

function belongsTo(id: string): (key: string) => boolean {
  const prefix = `${id}@`;
  return (key) => key.startsWith(prefix);
}

export class ImageCacheService {
  private caches: Record<AssetKind, AssetCache>;
  private inFlight = new Map<string, Promise<CachedImage | null>>();
  /**
   * Bumped by invalidate() while a decode for the id is running, so that
   * decode's result is not cached. Entries go away with the last decode.
   */
  private generations = new Map<string, number>();
  /** Running decodes per record id */
  private pendingById = new Map<string, number>();
  private epoch = 0;

  constructor(limits: ImageCacheLimits = {}) {
    this.caches = {
      thumbnail: {
        entries: new LRUCache(limits.thumbnails ?? THUMBNAIL_CACHE_LIMIT),
        defaultSize: THUMBNAIL_MAX_SIZE,
      },
      favicon: {
        entries: new LRUCache(limits.favicons ?? FAVICON_CACHE_LIMIT),
        defaultSize: FAVICON_MAX_SIZE,
      },
      linkImage: {
        entries: new LRUCache(limits.linkImages ?? LINK_IMAGE_CACHE_LIMIT),
        defaultSize: LINK_IMAGE_MAX_SIZE,
      },
    };
  }

  // ─── Public API ───

  thumbnail(id: string, bytes: Uint8Array, maxSize?: ImageSize): Promise<CachedImage | null> {
    return this.resolve('thumbnail', id, bytes, maxSize);
  }

  favicon(id: string, bytes: Uint8Array, maxSize?: ImageSize): Promise<CachedImage | null> {
    return this.resolve('favicon', id, bytes, maxSize);
  }

  linkImage(id: string, bytes: Uint8Array, maxSize?: ImageSize): Promise<CachedImage | null> {
    return this.resolve('linkImage', id, bytes, maxSize);
  }

  /** Drop every cached size of every asset kind for a record */
  invalidate(id: string): void {
    if (this.pendingById.has(id)) {
      this.generations.set(id, (this.generations.get(id) ?? 0) + 1);
    }
    for (const cache of Object.values(this.caches)) {
      cache.entries.deleteWhere(belongsTo(id));
    }
  }

  clear(): void {
    this.epoch++;
    this.generations.clear();
    for (const cache of Object.values(this.caches)) {
      cache.entries.clear();
    }
  }

  getStats(): ImageCacheStats {
    return {
      thumbnails: this.caches.thumbnail.entries.size,
      favicons: this.caches.favicon.entries.size,
      linkImages: this.caches.linkImage.entries.size,
      pending: this.inFlight.size,
      staleGuards: this.generations.size,
    };
  }

  // ─── Internals ───

  private resolve(kind: AssetKind, id: string, bytes: Uint8Array, maxSize?: ImageSize): Promise<CachedImage | null> {
    const cache = this.caches[kind];
    const size = maxSize ?? cache.defaultSize;
    const key = entryKey(id, size);

    const cached = cache.entries.get(key);
    if (cached) return Promise.resolve(cached);

    const flightKey = `${kind}:${key}`;
    const pending = this.inFlight.get(flightKey);
    if (pending) return pending;

    const generation = this.generations.get(id) ?? 0;
    const epoch = this.epoch;

    const task = decodeAndScale(bytes, size)
      .then((image) => {
        const stale = epoch !== this.epoch || generation !== (this.generations.get(id) ?? 0);
        if (image && !stale) cache.entries.set(key, image);
        return image;
      })
      .catch((err: unknown) => {
        const error = ClipKeepError.from(err, ErrorCode.IMAGE_DECODE_ERROR);
        log.warn(`Could not decode ${kind} for ${id}: ${error.message}`);
        return null;
      })
      .finally(() => {
        this.inFlight.delete(flightKey);
        this.releaseDecode(id);
      });

    this.pendingById.set(id, (this.pendingById.get(id) ?? 0) + 1);
    this.inFlight.set(flightKey, task);
    return task;
  }

  private releaseDecode(id: string): void {
    const remaining = (this.pendingById.get(id) ?? 1) - 1;
    if (remaining > 0) {
      this.pendingById.set(id, remaining);
      return;
    }
    this.pendingById.delete(id);
    this.generations.delete(id);
  }
}

/**
 * Decode and scale to fit inside `size`, preserving the aspect ratio and
 * never upscaling. Output is PNG.
 */
export async function decodeAndScale(bytes: Uint8Array, size: ImageSize): Promise<CachedImage | null> {
  if (bytes.byteLength === 0) return null;

  const { data, info } = await sharp(Buffer.from(bytes))
    .resize({ width: size.width, height: size.height, fit: 'inside', withoutEnlargement: true })
    .png()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height };
}
