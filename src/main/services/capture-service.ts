/**
 * CaptureService — polls the clipboard and feeds new payloads into history.
 *
 * Each tick compares the source's change counter with the last one seen.
 * A change runs through the pipeline
 *   idle → filtering → classifying → committing → idle
 * and is skipped when the payload is marked concealed or came from an
 * ignored application. While paused the counter is not read at all, so the
 * clipboard content present at resume is captured by the next tick.
 *
 * @module capture-service
 */

import { EventEmitter } from 'events';
import { createLogger } from './logger';
import { classify } from './content-classifier';
import { readSnapshot } from './clipboard-source';
import { ClipKeepError, ErrorCode } from '../../shared/types/errors';
import { CONCEALED_TYPES, DEFAULT_POLL_INTERVAL_MS, PASSWORD_MANAGER_APP_IDS } from '../../shared/constants';
import type { ClipboardSnapshot, ClipboardSource, SourceApplication } from './clipboard-source';
import type { EnrichmentService } from './enrichment-service';
import type { HistoryStore } from './history-store';
import type { CapturePhase, CaptureStatus, ClipRecord, PauseDuration, PauseState } from '../../shared/types/clipboard';

const log = createLogger('Capture');

export interface CaptureSettings {
  pollIntervalMs: number;
  ignorePasswordManagers: boolean;
  ignoredApplications: string[];
}

export interface CaptureServiceOptions {
  /** Read on every tick so config edits apply without a restart */
  settings?: () => CaptureSettings;
  now?: () => number;
}

const DEFAULT_SETTINGS: CaptureSettings = {
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  ignorePasswordManagers: true,
  ignoredApplications: [],
};

/** Why a detected change did not produce a record */
export type SkipReason = 'concealed' | 'ignored-application' | 'unsupported' | 'read-error';

export function isConcealed(snapshot: ClipboardSnapshot): boolean {
  return snapshot.types.some((type) => CONCEALED_TYPES.includes(type));
}

export function isIgnoredApplication(app: SourceApplication | null, settings: CaptureSettings): boolean {
  if (!app?.id) return false;
  if (settings.ignoredApplications.includes(app.id)) return true;
  return settings.ignorePasswordManagers && PASSWORD_MANAGER_APP_IDS.includes(app.id);
}

export class CaptureService extends EventEmitter {
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private pollIntervalMs: number | null = null;
  private lastChangeCount = 0;
  private monitoring = false;
  private startedAt: string | null = null;
  private phase: CapturePhase = 'idle';
  private pauseState: PauseState = { state: 'active' };

  private readonly settings: () => CaptureSettings;
  private readonly now: () => number;
  private enrichment: EnrichmentService | null = null;

  constructor(
    private readonly source: ClipboardSource,
    private readonly history: HistoryStore,
    options: CaptureServiceOptions = {},
  ) {
    super();
    this.settings = options.settings ?? (() => DEFAULT_SETTINGS);
    this.now = options.now ?? Date.now;
  }

  /**
   * Set dependencies after construction (DI wiring phase).
   */
  setDependencies(opts: { enrichment?: EnrichmentService }): void {
    if (opts.enrichment) this.enrichment = opts.enrichment;
  }

  // ─── Monitoring ───

  /**
   * Start polling. Whatever is on the clipboard right now is treated as
   * already seen.
   */
  startMonitoring(): void {
    if (this.monitoring) return;

    this.lastChangeCount = this.readChangeCount() ?? this.lastChangeCount;
    this.monitoring = true;
    this.startedAt = new Date(this.now()).toISOString();
    this.schedule();
    log.info(`Clipboard monitoring started (every ${this.pollIntervalMs}ms)`);
  }

  stopMonitoring(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    if (!this.monitoring) return;
    this.monitoring = false;
    this.startedAt = null;
    log.info('Clipboard monitoring stopped');
  }

  isMonitoring(): boolean {
    return this.monitoring;
  }

  /** Re-arm the timer after a poll interval change */
  refreshInterval(): void {
    if (!this.monitoring) return;
    if (this.settings().pollIntervalMs === this.pollIntervalMs) return;
    this.schedule();
    log.info(`Poll interval changed to ${this.pollIntervalMs}ms`);
  }

  // ─── Pause ───

  /**
   * Pause capture for `duration` ms, or until resume() with 'until-resumed'.
   * A non-positive duration resumes immediately.
   */
  pause(duration: PauseDuration): PauseState {
    if (duration === 'until-resumed') {
      this.setPauseState({ state: 'paused-indefinitely' });
    } else if (duration > 0) {
      this.setPauseState({ state: 'paused-until', until: this.now() + duration });
    } else {
      this.setPauseState({ state: 'active' });
    }
    return this.pauseState;
  }

  resume(): void {
    this.setPauseState({ state: 'active' });
  }

  /** Current pause state; an expired timed pause reads as active */
  getPauseState(): PauseState {
    this.checkPauseExpiry();
    return this.pauseState;
  }

  isPaused(): boolean {
    return this.getPauseState().state !== 'active';
  }

  // ─── Ticking ───

  /**
   * Run one poll immediately. Returns the record that was inserted or moved
   * to the front, or null when nothing was captured.
   */
  captureNow(): ClipRecord | null {
    // The change counter is left alone while paused, so whatever is on the
    // clipboard at resume time is picked up by the next tick.
    if (this.isPaused()) return null;

    const count = this.readChangeCount();
    if (count === null || count === this.lastChangeCount) return null;
    this.lastChangeCount = count;

    try {
      return this.process();
    } finally {
      this.phase = 'idle';
    }
  }

  getStatus(): CaptureStatus {
    return {
      monitoring: this.monitoring,
      phase: this.phase,
      pause: this.getPauseState(),
      totalRecords: this.history.count(),
      pinnedRecords: this.history.pinnedCount(),
      newClipCount: this.history.getNewClipCount(),
      startedAt: this.startedAt ?? undefined,
    };
  }

  // ─── Private ───

  private process(): ClipRecord | null {
    this.phase = 'filtering';

    let snapshot: ClipboardSnapshot;
    let application: SourceApplication | null;
    try {
      snapshot = readSnapshot(this.source);
      application = this.source.frontmostApplication();
    } catch (err) {
      const error = ClipKeepError.from(err, ErrorCode.CLIPBOARD_READ_ERROR);
      log.error('Failed to read clipboard:', error.message);
      this.skip('read-error');
      return null;
    }

    if (isConcealed(snapshot)) {
      this.skip('concealed');
      return null;
    }
    if (isIgnoredApplication(application, this.settings())) {
      this.skip('ignored-application', application?.id ?? undefined);
      return null;
    }

    this.phase = 'classifying';
    const content = classify(snapshot);
    if (!content) {
      this.skip('unsupported');
      return null;
    }

    this.phase = 'committing';
    const { record, created } = this.history.insertOrBump(content, {
      sourceAppId: application?.id ?? null,
      sourceAppName: application?.name ?? null,
    });

    if (created && this.enrichment) {
      this.enrichment.schedule(record);
    }
    this.emit('captured', record, created);
    return record;
  }

  private schedule(): void {
    if (this.pollTimer) clearInterval(this.pollTimer);
    this.pollIntervalMs = this.settings().pollIntervalMs;
    this.pollTimer = setInterval(() => this.tick(), this.pollIntervalMs);
  }

  /** Timer callback: a throwing subscriber must not take the process down */
  private tick(): void {
    try {
      this.captureNow();
    } catch (err) {
      const error = ClipKeepError.from(err, ErrorCode.UNKNOWN_ERROR);
      log.error('Capture tick failed:', error.message);
    }
  }

  private readChangeCount(): number | null {
    try {
      return this.source.changeCount();
    } catch (err) {
      const error = ClipKeepError.from(err, ErrorCode.CLIPBOARD_READ_ERROR);
      log.error('Failed to read clipboard change count:', error.message);
      return null;
    }
  }

  private checkPauseExpiry(): void {
    const pause = this.pauseState;
    if (pause.state === 'paused-until' && this.now() >= pause.until) {
      log.info('Timed pause expired, capture resumed');
      this.setPauseState({ state: 'active' });
    }
  }

  private setPauseState(next: PauseState): void {
    this.pauseState = next;
    if (next.state === 'paused-until') {
      log.info(`Capture paused until ${new Date(next.until).toISOString()}`);
    } else if (next.state === 'paused-indefinitely') {
      log.info('Capture paused until resumed');
    }
    this.emit('pause', next);
  }

  private skip(reason: SkipReason, detail?: string): void {
    log.debug(`Skipped clipboard change: ${reason}${detail ? ` (${detail})` : ''}`);
    this.emit('skipped', reason);
  }
}
