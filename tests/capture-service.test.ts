import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../src/main/services/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

import { DatabaseService, IN_MEMORY_DATABASE } from '../src/main/services/database-service';
import { UnitOfWork } from '../src/main/services/unit-of-work';
import { HistoryStore } from '../src/main/services/history-store';
import { EnrichmentService } from '../src/main/services/enrichment-service';
import { CaptureService, isIgnoredApplication } from '../src/main/services/capture-service';
import { MemoryClipboardSource } from '../src/main/services/clipboard-source';
import type { CaptureSettings } from '../src/main/services/capture-service';
import type { LinkMetadata } from '../src/shared/types/clipboard';

const T0 = 1_700_000_000_000;
const MINUTE = 60_000;

function createFetcher() {
  return {
    fetch: vi.fn(async (_url: string): Promise<LinkMetadata> => ({ title: 'Example', favicon: null, previewImage: null })),
  };
}

class FlakyClipboardSource extends MemoryClipboardSource {
  failNextRead = false;

  readText(): string | null {
    if (this.failNextRead) {
      this.failNextRead = false;
      throw new Error('pasteboard unavailable');
    }
    return super.readText();
  }
}

describe('CaptureService', () => {
  let database: DatabaseService;
  let history: HistoryStore;
  let clipboard: FlakyClipboardSource;
  let capture: CaptureService;
  let settings: CaptureSettings;
  let clock: number;
  let fetcher: ReturnType<typeof createFetcher>;
  let enrichment: EnrichmentService;

  beforeEach(() => {
    clock = T0;
    settings = { pollIntervalMs: 200, ignorePasswordManagers: true, ignoredApplications: [] };
    database = new DatabaseService(IN_MEMORY_DATABASE);
    database.initialize();
    history = new HistoryStore(database, new UnitOfWork(database), { now: () => clock });
    history.load();

    fetcher = createFetcher();
    enrichment = new EnrichmentService(history, { linkFetcher: fetcher });

    clipboard = new FlakyClipboardSource();
    capture = new CaptureService(clipboard, history, { settings: () => settings, now: () => clock });
    capture.setDependencies({ enrichment });
  });

  afterEach(async () => {
    capture.stopMonitoring();
    await enrichment.whenIdle();
    vi.useRealTimers();
    database.close();
  });

  // ─── Ticking ───

  it('captures a clipboard change', () => {
    clipboard.write({ text: 'hello', source: { id: 'com.example.editor', name: 'Editor' } });

    const record = capture.captureNow();

    expect(record?.plainText).toBe('hello');
    expect(record?.sourceAppName).toBe('Editor');
    expect(history.count()).toBe(1);
  });

  it('does nothing when the change counter has not moved', () => {
    clipboard.write({ text: 'hello' });
    capture.captureNow();

    expect(capture.captureNow()).toBeNull();
    expect(history.getVisibleRecords()[0].useCount).toBe(1);
  });

  it('bumps a repeated copy', () => {
    clipboard.write({ text: 'hello' });
    capture.captureNow();
    clipboard.write({ text: 'hello' });
    capture.captureNow();

    expect(history.count()).toBe(1);
    expect(history.getVisibleRecords()[0].useCount).toBe(2);
  });

  it('skips payloads that classify to nothing', () => {
    const skipped = vi.fn();
    capture.on('skipped', skipped);
    clipboard.write({ text: '' });

    expect(capture.captureNow()).toBeNull();
    expect(skipped).toHaveBeenCalledWith('unsupported');
  });

  it('polls on the configured interval and ignores what was already on the clipboard', () => {
    vi.useFakeTimers();
    clipboard.write({ text: 'before start' });
    capture.startMonitoring();

    vi.advanceTimersByTime(200);
    expect(history.count()).toBe(0);

    clipboard.write({ text: 'after start' });
    vi.advanceTimersByTime(200);
    expect(history.getVisibleRecords().map((r) => r.plainText)).toEqual(['after start']);
  });

  it('re-arms the timer when the poll interval changes', () => {
    vi.useFakeTimers();
    capture.startMonitoring();
    settings = { ...settings, pollIntervalMs: 1_000 };
    capture.refreshInterval();

    clipboard.write({ text: 'slow' });
    vi.advanceTimersByTime(999);
    expect(history.count()).toBe(0);
    vi.advanceTimersByTime(1);
    expect(history.count()).toBe(1);
  });

  it('keeps polling after a clipboard read error', () => {
    clipboard.write({ text: 'broken' });
    clipboard.failNextRead = true;
    expect(capture.captureNow()).toBeNull();

    clipboard.write({ text: 'fine' });
    expect(capture.captureNow()?.plainText).toBe('fine');
    expect(capture.getStatus().phase).toBe('idle');
  });

  it('keeps the poll timer alive when a captured listener throws', () => {
    vi.useFakeTimers();
    capture.on('captured', () => {
      throw new Error('listener failed');
    });
    capture.startMonitoring();

    clipboard.write({ text: 'one' });
    expect(() => vi.advanceTimersByTime(200)).not.toThrow();
    clipboard.write({ text: 'two' });
    vi.advanceTimersByTime(200);

    expect(history.getVisibleRecords().map((r) => r.plainText)).toEqual(['two', 'one']);
    expect(capture.isMonitoring()).toBe(true);
  });

  it('still schedules enrichment when a history change listener throws', () => {
    const captured = vi.fn();
    capture.on('captured', captured);
    history.onChange(() => {
      throw new Error('listener failed');
    });
    clipboard.write({ text: 'https://example.com' });

    const record = capture.captureNow();

    expect(record?.plainText).toBe('https://example.com');
    expect(fetcher.fetch).toHaveBeenCalledWith('https://example.com');
    expect(captured).toHaveBeenCalledWith(record, true);
  });

  // ─── Privacy filters ───

  it.each(['org.nspasteboard.ConcealedType', 'org.nspasteboard.TransientType', 'com.agilebits.onepassword'])(
    'skips payloads marked %s',
    (marker) => {
      clipboard.write({ text: 'test-secret', types: [marker] });
      expect(capture.captureNow()).toBeNull();
      expect(history.count()).toBe(0);
    },
  );

  it('skips password managers while the filter is on', () => {
    clipboard.write({ text: 'test-secret', source: { id: 'com.bitwarden.desktop', name: 'Bitwarden' } });
    expect(capture.captureNow()).toBeNull();

    settings = { ...settings, ignorePasswordManagers: false };
    clipboard.write({ text: 'test-secret', source: { id: 'com.bitwarden.desktop', name: 'Bitwarden' } });
    expect(capture.captureNow()?.plainText).toBe('test-secret');
  });

  it('skips ignored applications', () => {
    settings = { ...settings, ignoredApplications: ['com.example.vault'] };
    clipboard.write({ text: 'private', source: { id: 'com.example.vault', name: 'Vault' } });

    expect(capture.captureNow()).toBeNull();
    expect(history.count()).toBe(0);
  });

  it('does not treat an unknown source as ignored', () => {
    expect(isIgnoredApplication(null, { ...settings, ignoredApplications: ['x'] })).toBe(false);
    expect(isIgnoredApplication({ id: null, name: 'Unknown' }, settings)).toBe(false);
  });

  // ─── Pause ───

  describe('pause', () => {
    it('captures the clipboard content present when a timed pause expires', () => {
      expect(capture.pause(5 * MINUTE)).toEqual({ state: 'paused-until', until: T0 + 5 * MINUTE });

      clipboard.write({ text: 'while paused' });
      expect(capture.captureNow()).toBeNull();
      expect(history.count()).toBe(0);

      clock += 5 * MINUTE;
      expect(capture.isPaused()).toBe(false);
      expect(capture.captureNow()?.plainText).toBe('while paused');
      expect(capture.captureNow()).toBeNull();
    });

    it('pauses until resumed', () => {
      capture.pause('until-resumed');
      clock += 24 * 60 * MINUTE;
      clipboard.write({ text: 'ignored' });

      expect(capture.captureNow()).toBeNull();
      expect(capture.getPauseState()).toEqual({ state: 'paused-indefinitely' });

      capture.resume();
      clipboard.write({ text: 'captured' });
      expect(capture.captureNow()?.plainText).toBe('captured');
      expect(history.getVisibleRecords().map((r) => r.plainText)).toEqual(['captured']);
    });

    it('picks up the last copy made while paused on the first tick after resume', () => {
      vi.useFakeTimers();
      capture.startMonitoring();
      capture.pause('until-resumed');

      clipboard.write({ text: 'first' });
      clipboard.write({ text: 'second' });
      vi.advanceTimersByTime(200);
      expect(history.count()).toBe(0);

      capture.resume();
      vi.advanceTimersByTime(200);
      expect(history.getVisibleRecords().map((r) => r.plainText)).toEqual(['second']);
    });

    it('treats a non-positive duration as resume', () => {
      capture.pause('until-resumed');
      expect(capture.pause(0)).toEqual({ state: 'active' });
    });

    it('emits pause changes', () => {
      const listener = vi.fn();
      capture.on('pause', listener);
      capture.pause('until-resumed');
      capture.resume();

      expect(listener.mock.calls).toEqual([[{ state: 'paused-indefinitely' }], [{ state: 'active' }]]);
    });
  });

  // ─── Enrichment & status ───

  it('schedules enrichment for new links only', () => {
    clipboard.write({ text: 'https://example.com' });
    capture.captureNow();
    clipboard.write({ text: 'https://example.com' });
    capture.captureNow();

    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
    expect(fetcher.fetch).toHaveBeenCalledWith('https://example.com');
  });

  it('reports status', () => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    capture.startMonitoring();
    clipboard.write({ text: 'a' });
    const record = capture.captureNow();
    if (record) history.togglePin(record.id);
    clipboard.write({ text: 'b' });
    capture.captureNow();

    expect(capture.getStatus()).toEqual({
      monitoring: true,
      phase: 'idle',
      pause: { state: 'active' },
      totalRecords: 2,
      pinnedRecords: 1,
      newClipCount: 2,
      startedAt: new Date(T0).toISOString(),
    });
  });
});
