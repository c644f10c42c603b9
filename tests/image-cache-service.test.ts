import { describe, it, expect, vi, beforeAll } from 'vitest';
import sharp from 'sharp';

vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

import { ImageCacheService, decodeAndScale } from '../src/main/services/image-cache-service';

function solidPng(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 200, g: 30, b: 30 } } })
    .png()
    .toBuffer();
}

describe('ImageCacheService', () => {
  let large: Buffer;
  let small: Buffer;
  let square: Buffer;

  beforeAll(async () => {
    large = await solidPng(400, 300);
    small = await solidPng(50, 40);
    square = await solidPng(128, 128);
  });

  it('scales thumbnails to fit the default box', async () => {
    const cache = new ImageCacheService();
    const image = await cache.thumbnail('r1', large);

    expect(image).toMatchObject({ width: 200, height: 150 });
    expect(image?.data.subarray(1, 4).toString('ascii')).toBe('PNG');
  });

  it('preserves the aspect ratio inside a custom box', async () => {
    const cache = new ImageCacheService();
    expect(await cache.thumbnail('r1', large, { width: 100, height: 100 })).toMatchObject({ width: 100, height: 75 });
  });

  it('never upscales', async () => {
    const cache = new ImageCacheService();
    expect(await cache.thumbnail('r1', small)).toMatchObject({ width: 50, height: 40 });
  });

  it('uses the favicon and link image defaults', async () => {
    const cache = new ImageCacheService();
    expect(await cache.favicon('r1', square)).toMatchObject({ width: 64, height: 64 });
    expect(await cache.linkImage('r1', large)).toMatchObject({ width: 160, height: 120 });
  });

  it('returns null for undecodable bytes', async () => {
    const cache = new ImageCacheService();
    expect(await cache.thumbnail('r1', new Uint8Array([0, 1, 2, 3]))).toBeNull();
    expect(cache.getStats().thumbnails).toBe(0);
  });

  it('returns null for empty input', async () => {
    expect(await decodeAndScale(new Uint8Array(), { width: 10, height: 10 })).toBeNull();
  });

  it('serves repeated requests from the cache', async () => {
    const cache = new ImageCacheService();
    const first = await cache.thumbnail('r1', large);
    const second = await cache.thumbnail('r1', large);
    expect(second).toBe(first);
  });

  it('shares one decode between concurrent requests', async () => {
    const cache = new ImageCacheService();
    const [a, b] = await Promise.all([cache.thumbnail('r1', large), cache.thumbnail('r1', large)]);
    expect(a).toBe(b);
    expect(cache.getStats().pending).toBe(0);
  });

  it('bounds each cache by its entry limit', async () => {
    const cache = new ImageCacheService({ thumbnails: 2 });
    await cache.thumbnail('r1', small);
    await cache.thumbnail('r2', small);
    await cache.thumbnail('r3', small);
    expect(cache.getStats().thumbnails).toBe(2);
  });

  it('invalidates every asset of a record', async () => {
    const cache = new ImageCacheService();
    await cache.thumbnail('r1', large);
    await cache.thumbnail('r1', large, { width: 20, height: 20 });
    await cache.favicon('r1', square);
    await cache.linkImage('r2', large);

    cache.invalidate('r1');

    expect(cache.getStats()).toEqual({ thumbnails: 0, favicons: 0, linkImages: 1, pending: 0, staleGuards: 0 });
  });

  it('does not cache a decode that finished after invalidation', async () => {
    const cache = new ImageCacheService();
    const pending = cache.thumbnail('r1', large);
    cache.invalidate('r1');
    expect(cache.getStats().staleGuards).toBe(1);

    expect(await pending).toMatchObject({ width: 200, height: 150 });
    expect(cache.getStats().thumbnails).toBe(0);
    expect(cache.getStats().staleGuards).toBe(0);
  });

  it('keeps no bookkeeping for records invalidated while idle', () => {
    const cache = new ImageCacheService();
    for (let i = 0; i < 5_000; i++) cache.invalidate(`evicted-${i}`);
    expect(cache.getStats().staleGuards).toBe(0);
  });

  it('caches a decode started after an invalidation that raced an earlier one', async () => {
    const cache = new ImageCacheService();
    const first = cache.thumbnail('r1', large);
    cache.invalidate('r1');
    const second = cache.thumbnail('r1', large, { width: 100, height: 100 });

    await Promise.all([first, second]);

    expect(cache.getStats()).toMatchObject({ thumbnails: 1, pending: 0, staleGuards: 0 });
  });

  it('clears all caches', async () => {
    const cache = new ImageCacheService();
    await cache.thumbnail('r1', large);
    await cache.favicon('r2', square);
    cache.clear();
    expect(cache.getStats()).toEqual({ thumbnails: 0, favicons: 0, linkImages: 0, pending: 0, staleGuards: 0 });
  });
});
