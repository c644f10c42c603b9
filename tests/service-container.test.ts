import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
  setLogLevel: vi.fn(),
  getLogLevel: vi.fn(() => 'info'),
}));

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { setLogLevel } from '../src/main/services/logger';
import { ServiceContainer } from '../src/main/services/service-container';
import { MemoryClipboardSource } from '../src/main/services/clipboard-source';

describe('ServiceContainer', () => {
  let dataDir: string;
  let clipboard: MemoryClipboardSource;
  let container: ServiceContainer;

  function createContainer(): ServiceContainer {
    return new ServiceContainer({ dataDir, clipboard, linkFetcher: null, autoStart: false });
  }

  function copy(text: string): void {
    clipboard.write({ text });
    container.get('capture').captureNow();
  }

  beforeEach(async () => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'clipkeep-container-'));
    clipboard = new MemoryClipboardSource();
    container = createContainer();
    await container.init();
  });

  afterEach(async () => {
    await container.shutdown();
    fs.rmSync(dataDir, { recursive: true, force: true });
    vi.mocked(setLogLevel).mockClear();
  });

  it('refuses access before init', () => {
    const fresh = createContainer();
    expect(() => fresh.get('history')).toThrow('ServiceContainer not initialized');
  });

  it('refuses a second init', async () => {
    await expect(container.init()).rejects.toThrow('ServiceContainer already initialized');
  });

  it('registers every service', () => {
    for (const key of ['config', 'database', 'unitOfWork', 'history', 'collections', 'imageCache', 'enrichment', 'capture'] as const) {
      expect(container.has(key)).toBe(true);
    }
    expect(container.get('capture').isMonitoring()).toBe(false);
  });

  it('captures clipboard changes into the history', () => {
    copy('first');
    copy('second');

    expect(container.get('history').getVisibleRecords().map((r) => r.plainText)).toEqual(['second', 'first']);
  });

  it('applies a lower history limit immediately and invalidates removed assets', () => {
    copy('a');
    copy('b');
    copy('c');
    const invalidate = vi.spyOn(container.get('imageCache'), 'invalidate');
    const oldest = container.get('history').getVisibleRecords()[2];

    container.get('config').set('historyLimit', 2);

    expect(container.get('history').getVisibleRecords().map((r) => r.plainText)).toEqual(['c', 'b']);
    expect(invalidate).toHaveBeenCalledWith(oldest.id);
  });

  it('follows the captureEnabled switch', () => {
    const config = container.get('config');
    const capture = container.get('capture');

    config.set('captureEnabled', false);
    expect(capture.isMonitoring()).toBe(false);
    config.set('captureEnabled', true);
    expect(capture.isMonitoring()).toBe(true);
  });

  it('forwards log level changes to the logger', () => {
    container.get('config').set('logLevel', 'debug');
    expect(setLogLevel).toHaveBeenCalledWith('debug');
  });

  it('persists history, collections and config across restarts', async () => {
    copy('keep me');
    const work = container.get('collections').createCollection('Work');
    const record = container.get('history').getVisibleRecords()[0];
    container.get('collections').addRecord(record.id, work.id);
    container.get('config').set('historyLimit', 50);

    await container.shutdown();
    container = createContainer();
    await container.init();

    const reloaded = container.get('history').getById(record.id);
    expect(reloaded?.plainText).toBe('keep me');
    expect([...(reloaded?.collectionIds ?? [])]).toEqual([work.id]);
    expect(container.get('config').get('historyLimit')).toBe(50);
    expect(fs.existsSync(path.join(dataDir, 'clipkeep-config.json'))).toBe(true);
  });

  it('stops monitoring on shutdown', async () => {
    const capture = container.get('capture');
    capture.startMonitoring();

    await container.shutdown();

    expect(capture.isMonitoring()).toBe(false);
    expect(() => container.get('capture')).toThrow('ServiceContainer not initialized');
  });

  it('finishes shutdown within the grace period while enrichment hangs', async () => {
    await container.shutdown();
    const recognize = vi.fn((_image: Uint8Array) => new Promise<string>(() => undefined));
    container = new ServiceContainer({
      dataDir,
      clipboard,
      linkFetcher: null,
      textRecognizer: { recognize },
      autoStart: false,
      shutdownGraceMs: 20,
    });
    await container.init();

    clipboard.write({ image: { data: new Uint8Array([1, 2, 3]), width: 3, height: 1 } });
    const record = container.get('capture').captureNow();
    expect(recognize).toHaveBeenCalledTimes(1);
    expect(container.get('enrichment').pendingCount()).toBe(1);

    await container.shutdown();
    expect(container.has('database')).toBe(false);

    container = createContainer();
    await container.init();
    expect(container.get('history').getById(record?.id ?? '')?.content.kind).toBe('image');
  });
});
