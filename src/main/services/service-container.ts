/**
 * ServiceContainer — lightweight DI container for the clipboard engine.
 *
 * Provides typed access, centralized init, and ordered graceful shutdown.
 *
 * Usage:
 *   const container = new ServiceContainer({ dataDir, clipboard });
 *   await container.init();
 *   const history = container.get('history');
 *   ...
 *   await container.shutdown();
 */

import * as path from 'path';
import { createLogger, setLogLevel } from './logger';
import { ConfigService } from './config';
import { DatabaseService } from './database-service';
import { UnitOfWork } from './unit-of-work';
import { HistoryStore } from './history-store';
import { CollectionService } from './collection-service';
import { ImageCacheService } from './image-cache-service';
import { EnrichmentService } from './enrichment-service';
import { HttpLinkMetadataFetcher } from './link-metadata-service';
import { CaptureService } from './capture-service';
import { CONFIG_FILE_NAME, DATABASE_FILE_NAME } from '../../shared/constants';
import type { ClipboardSource } from './clipboard-source';
import type { TextRecognizer } from './enrichment-service';
import type { FetchFn, LinkMetadataFetcher } from './link-metadata-service';

const log = createLogger('Container');

const DEFAULT_SHUTDOWN_GRACE_MS = 5_000;

// ─── Service Map — typed registry of all services ───

export interface ServiceMap {
  config: ConfigService;
  database: DatabaseService;
  unitOfWork: UnitOfWork;
  history: HistoryStore;
  collections: CollectionService;
  imageCache: ImageCacheService;
  enrichment: EnrichmentService;
  capture: CaptureService;
}

export type ServiceKey = keyof ServiceMap;

export interface ContainerOptions {
  /** Directory holding the config file and (by default) the database */
  dataDir: string;
  clipboard: ClipboardSource;
  /** Overrides `<dataDir>/clipkeep.db`; use ':memory:' for a throwaway store */
  databasePath?: string;
  /** Replaces the HTTP fetcher (or disables link enrichment with null) */
  linkFetcher?: LinkMetadataFetcher | null;
  /** fetch implementation for the default HTTP fetcher */
  fetchFn?: FetchFn;
  /** OCR adapter; image text recognition is skipped without one */
  textRecognizer?: TextRecognizer | null;
  /** Start polling during init() when capture is enabled (default true) */
  autoStart?: boolean;
  /** How long shutdown waits for running enrichment before saving anyway (default 5000) */
  shutdownGraceMs?: number;
  now?: () => number;
}

export class ServiceContainer {
  private services: Partial<ServiceMap> = {};
  private unsubscribers: Array<() => void> = [];
  private initialized = false;

  constructor(private readonly options: ContainerOptions) {}

  /**
   * Get a registered service by key (typed).
   * Throws if the container hasn't been initialized yet or service doesn't exist.
   */
  get<K extends ServiceKey>(key: K): ServiceMap[K] {
    if (!this.initialized) {
      throw new Error(`ServiceContainer not initialized — call init() first`);
    }
    const svc: ServiceMap[K] | undefined = this.services[key];
    if (svc === undefined) {
      throw new Error(`Service '${key}' not found in container`);
    }
    return svc;
  }

  has(key: ServiceKey): boolean {
    return this.services[key] !== undefined;
  }

  /**
   * Initialize all services in dependency order.
   */
  async init(): Promise<void> {
    if (this.initialized) {
      throw new Error('ServiceContainer already initialized');
    }

    log.info('Initializing services...');
    const t0 = Date.now();
    const { dataDir, clipboard, now } = this.options;

    // ── Phase 1: Core (no deps) ──
    const config = new ConfigService(path.join(dataDir, CONFIG_FILE_NAME));
    if (!process.env.CLIPKEEP_LOG_LEVEL) setLogLevel(config.get('logLevel'));
    this.set('config', config);

    // Opening the database is the one fatal startup failure
    const database = new DatabaseService(this.options.databasePath ?? path.join(dataDir, DATABASE_FILE_NAME));
    database.initialize();
    this.set('database', database);

    // ── Phase 2: History & collections ──
    const unitOfWork = new UnitOfWork(database);
    const history = new HistoryStore(database, unitOfWork, {
      historyLimit: () => config.get('historyLimit'),
      now,
    });
    const collections = new CollectionService(database, unitOfWork, history);
    history.setDependencies({ collections });
    this.set('unitOfWork', unitOfWork);
    this.set('history', history);
    this.set('collections', collections);

    collections.load();
    history.load();
    history.performAutoCleanup(config.get('autoDeleteAfterDays'));
    history.enforceRetention();

    // ── Phase 3: Derived assets & enrichment ──
    const imageCache = new ImageCacheService();
    this.set('imageCache', imageCache);

    const linkFetcher =
      this.options.linkFetcher === undefined
        ? new HttpLinkMetadataFetcher({ fetchFn: this.options.fetchFn })
        : this.options.linkFetcher;
    const enrichment = new EnrichmentService(history, {
      linkFetcher,
      textRecognizer: this.options.textRecognizer,
      isLinkEnrichmentEnabled: () => config.get('fetchLinkMetadata'),
      isTextRecognitionEnabled: () => config.get('recognizeImageText'),
    });
    this.set('enrichment', enrichment);

    // ── Phase 4: Capture loop ──
    const capture = new CaptureService(clipboard, history, {
      settings: () => ({
        pollIntervalMs: config.get('pollIntervalMs'),
        ignorePasswordManagers: config.get('ignorePasswordManagers'),
        ignoredApplications: config.get('ignoredApplications'),
      }),
      now,
    });
    capture.setDependencies({ enrichment });
    this.set('capture', capture);

    // ── Phase 5: Cross-service wiring ──
    this.unsubscribers.push(
      history.onRemoved((ids) => {
        for (const id of ids) imageCache.invalidate(id);
      }),
      config.onChange('historyLimit', (limit) => {
        history.enforceRetention(limit);
      }),
      config.onChange('autoDeleteAfterDays', (days) => {
        history.performAutoCleanup(days);
      }),
      config.onChange('pollIntervalMs', () => {
        capture.refreshInterval();
      }),
      config.onChange('captureEnabled', (enabled) => {
        if (enabled) capture.startMonitoring();
        else capture.stopMonitoring();
      }),
      config.onChange('logLevel', (level) => {
        setLogLevel(level);
      }),
    );

    if (config.get('captureEnabled') && this.options.autoStart !== false) {
      capture.startMonitoring();
    }

    this.initialized = true;
    log.info(`All services initialized in ${Date.now() - t0}ms`);
  }

  /**
   * Graceful shutdown — stops services in reverse dependency order.
   */
  async shutdown(): Promise<void> {
    if (!this.initialized) return;

    log.info('Graceful shutdown started');
    const t0 = Date.now();

    // ── Phase 1: Stop capturing new clips ──
    this.trySync('capture', (s) => s.stopMonitoring());
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();

    // ── Phase 2: Let enrichment settle so its results are saved ──
    const graceMs = this.options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
    await this.tryAsync('enrichment', async (s) => {
      if (!(await s.whenIdle(graceMs))) {
        log.warn(`Enrichment still running after ${graceMs}ms, continuing shutdown (${s.pendingCount()} tasks dropped)`);
      }
    });

    // ── Phase 3: Flush caches & persist data ──
    this.trySync('unitOfWork', (s) => {
      if (!s.save()) log.warn('Unsaved changes were lost at shutdown');
    });
    this.trySync('imageCache', (s) => s.clear());
    await this.tryAsync('config', (s) => s.shutdown());

    // ── Phase 4: Close database (must be last) ──
    this.trySync('database', (s) => s.close());

    this.initialized = false;
    this.services = {};
    log.info(`Graceful shutdown completed in ${Date.now() - t0}ms`);
  }

  // ─── Private helpers ───

  private set<K extends ServiceKey>(key: K, service: ServiceMap[K]): void {
    this.services[key] = service;
  }

  /** Safely call a sync method on a service, logging errors. */
  private trySync<K extends ServiceKey>(key: K, fn: (service: ServiceMap[K]) => void): void {
    const service: ServiceMap[K] | undefined = this.services[key];
    if (service === undefined) return;
    try {
      fn(service);
    } catch (err) {
      log.error(`${key} shutdown error:`, err);
    }
  }

  /** Safely call an async method on a service, logging errors. */
  private async tryAsync<K extends ServiceKey>(key: K, fn: (service: ServiceMap[K]) => Promise<void>): Promise<void> {
    const service: ServiceMap[K] | undefined = this.services[key];
    if (service === undefined) return;
    try {
      await fn(service);
    } catch (err) {
      log.error(`${key} shutdown error:`, err);
    }
  }
}
