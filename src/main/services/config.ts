/**
 * ConfigService — Typed, reactive, validated configuration management.
 *
 * Features:
 * - Zod schema validation on load (corrupted JSON → safe defaults)
 * - Typed get<K>/set<K> with full TypeScript inference
 * - setBatch() for multiple key updates in a single save
 * - onChange<K>() subscriptions for services that follow a key
 * - Debounced save (200ms): multiple set() calls → single write
 * - Atomic write (temp file + rename)
 * - Config version tracking + ordered migrations
 *
 * @module main/services/config
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { EventEmitter } from 'events';
import { createLogger } from './logger';
import { ClipKeepError, ErrorCode } from '../../shared/types/errors';

import { ClipKeepConfigSchema, CURRENT_CONFIG_VERSION, CONFIG_MIGRATIONS } from '../../shared/schemas/config-schema';
import type { ClipKeepConfig, ConfigKey } from '../../shared/types/config';

export type { ClipKeepConfig } from '../../shared/types/config';

const log = createLogger('Config');

/** Delay before flushing config to disk (ms). Multiple set() calls within this window = single write. */
const SAVE_DELAY_MS = 200;

// ─── Change listener types ───

type ChangeCallback<K extends ConfigKey> = (newVal: ClipKeepConfig[K], oldVal: ClipKeepConfig[K]) => void;

type AnyChangeCallback = (changes: Partial<ClipKeepConfig>) => void;

/** Key listener bound to its key, so it can read typed values from whole configs */
type KeyNotifier = (next: ClipKeepConfig, previous: ClipKeepConfig) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(ClipKeepConfigSchema.shape, key);
}

// ─── ConfigService ───

export class ConfigService extends EventEmitter {
  private config: ClipKeepConfig;
  private saveTimer: ReturnType<typeof setTimeout> | null = null;
  private saving = false;
  /** Another save was requested while one was in progress */
  private pendingSave = false;

  /** Per-key change listeners */
  private keyListeners = new Map<ConfigKey, Set<KeyNotifier>>();
  /** Listeners for any config change */
  private anyListeners = new Set<AnyChangeCallback>();

  constructor(private readonly configPath: string) {
    super();
    this.config = this.loadConfig();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  // ────────────── Load / Save ──────────────

  private loadConfig(): ClipKeepConfig {
    let raw: Record<string, unknown> = {};

    try {
      if (fs.existsSync(this.configPath)) {
        const parsed: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
        if (isRecord(parsed)) {
          raw = parsed;
        } else {
          log.warn('Config file does not hold an object, using defaults');
        }
      }
    } catch (error) {
      const err = ClipKeepError.from(error, ErrorCode.CONFIG_LOAD_ERROR, { path: this.configPath });
      log.error('Failed to read config file, using defaults:', err.message);
    }

    raw = this.migrateConfig(raw);

    // Safe parse fills in defaults
    const result = ClipKeepConfigSchema.safeParse(raw);
    if (result.success) {
      return result.data;
    }

    log.warn('Config validation failed, keeping valid fields. Issues:', result.error.issues);
    // Partial recovery: valid fields survive, the rest fall back to defaults
    const recovered = ClipKeepConfigSchema.safeParse(this.pickValidFields(raw));
    return recovered.success ? recovered.data : ClipKeepConfigSchema.parse({});
  }

  /**
   * Pick fields from raw config that individually pass validation.
   * Used for partial recovery when overall validation fails.
   */
  private pickValidFields(raw: Record<string, unknown>): Record<string, unknown> {
    const recovered: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (!isConfigKey(key)) {
        recovered[key] = value;
        continue;
      }
      if (ClipKeepConfigSchema.shape[key].safeParse(value).success) {
        recovered[key] = value;
      } else {
        log.warn(`Dropping invalid config value for "${key}"`);
      }
    }
    return recovered;
  }

  /**
   * Run ordered migrations on raw config data.
   */
  private migrateConfig(raw: Record<string, unknown>): Record<string, unknown> {
    let version = typeof raw._version === 'number' ? raw._version : 0;
    let migrated = { ...raw };

    while (version < CURRENT_CONFIG_VERSION) {
      const migration = CONFIG_MIGRATIONS[version];
      if (migration) {
        log.info(`Migrating config v${version} → v${version + 1}`);
        migrated = migration(migrated);
      }
      version++;
    }

    migrated._version = CURRENT_CONFIG_VERSION;
    return migrated;
  }

  /**
   * Schedule a debounced save. Multiple calls within SAVE_DELAY_MS → single write.
   */
  private scheduleSave(): void {
    if (this.saveTimer) clearTimeout(this.saveTimer);
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      void this.flushSave();
    }, SAVE_DELAY_MS);
  }

  /**
   * Atomic write: write to temp file, then rename.
   */
  private async flushSave(): Promise<void> {
    if (this.saving) {
      this.pendingSave = true;
      return;
    }
    this.saving = true;
    try {
      await fsp.mkdir(path.dirname(this.configPath), { recursive: true });
      const tmpPath = this.configPath + '.tmp';
      await fsp.writeFile(tmpPath, JSON.stringify(this.config, null, 2), 'utf8');
      await fsp.rename(tmpPath, this.configPath);
    } catch (error) {
      const err = ClipKeepError.from(error, ErrorCode.CONFIG_SAVE_ERROR, { path: this.configPath });
      log.error('Failed to save config:', err.message);
    } finally {
      this.saving = false;
      if (this.pendingSave) {
        this.pendingSave = false;
        void this.flushSave();
      }
    }
  }

  /**
   * Force immediate save, used during shutdown.
   */
  async forceSave(): Promise<void> {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
    await this.flushSave();
  }

  // ────────────── Typed accessors ──────────────

  get<K extends ConfigKey>(key: K): ClipKeepConfig[K] {
    return this.config[key];
  }

  /**
   * Set a single config value. Triggers debounced save and change notifications.
   * Throws CONFIG_VALIDATION_ERROR for values the schema rejects.
   */
  set<K extends ConfigKey>(key: K, value: ClipKeepConfig[K]): void {
    if (this.config[key] === value) return;
    this.apply({ ...this.config, [key]: value }, [key]);
  }

  /**
   * Set multiple config values atomically. Single save, single change notification.
   */
  setBatch(updates: Partial<ClipKeepConfig>): void {
    const changedKeys = Object.keys(updates)
      .filter(isConfigKey)
      .filter((key) => updates[key] !== this.config[key]);
    if (changedKeys.length === 0) return;

    this.apply({ ...this.config, ...updates }, changedKeys);
  }

  /**
   * Get a shallow copy of the full config.
   */
  getAll(): ClipKeepConfig {
    return { ...this.config };
  }

  private apply(candidate: Record<string, unknown>, changedKeys: ConfigKey[]): void {
    const result = ClipKeepConfigSchema.safeParse(candidate);
    if (!result.success) {
      throw new ClipKeepError(`Invalid config value for ${changedKeys.join(', ')}`, ErrorCode.CONFIG_VALIDATION_ERROR, {
        severity: 'warning',
        context: { issues: result.error.issues },
      });
    }

    const previous = this.config;
    this.config = result.data;
    this.notifyChange(changedKeys, previous);
    this.scheduleSave();
  }

  // ────────────── Reactive subscriptions ──────────────

  /**
   * Subscribe to changes of a specific config key.
   * Returns an unsubscribe function.
   *
   * @example
   * const unsub = config.onChange('historyLimit', (limit) => {
   *   history.enforceRetention(limit);
   * });
   */
  onChange<K extends ConfigKey>(key: K, callback: ChangeCallback<K>): () => void {
    const notifier: KeyNotifier = (next, previous) => callback(next[key], previous[key]);

    let listeners = this.keyListeners.get(key);
    if (!listeners) {
      listeners = new Set();
      this.keyListeners.set(key, listeners);
    }
    listeners.add(notifier);

    return () => {
      this.keyListeners.get(key)?.delete(notifier);
    };
  }

  /**
   * Subscribe to any config change. Callback receives the changed keys/values.
   * Returns an unsubscribe function.
   */
  onAnyChange(callback: AnyChangeCallback): () => void {
    this.anyListeners.add(callback);
    return () => {
      this.anyListeners.delete(callback);
    };
  }

  private notifyChange(changedKeys: ConfigKey[], previous: ClipKeepConfig): void {
    const changes: Partial<ClipKeepConfig> = {};
    for (const key of changedKeys) {
      Object.assign(changes, { [key]: this.config[key] });

      for (const notify of this.keyListeners.get(key) ?? []) {
        try {
          notify(this.config, previous);
        } catch (err) {
          log.error(`Config onChange listener error for key "${key}":`, err);
        }
      }
    }

    for (const cb of this.anyListeners) {
      try {
        cb(changes);
      } catch (err) {
        log.error('Config onAnyChange listener error:', err);
      }
    }

    this.emit('change', changes);
  }

  // ────────────── Shutdown ──────────────

  async shutdown(): Promise<void> {
    await this.forceSave();
    this.keyListeners.clear();
    this.anyListeners.clear();
    this.removeAllListeners();
  }
}
