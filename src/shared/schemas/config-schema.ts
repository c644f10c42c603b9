/**
 * Zod schema for clipkeep configuration.
 *
 * Single source of truth for config shape, defaults, and validation.
 * The ClipKeepConfig type is derived from this schema via z.infer<>.
 *
 * @module shared/schemas/config-schema
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

// ─── Main config schema ───

export const ClipKeepConfigSchema = z
  .object({
    /** Schema version for migrations */
    _version: z.number().default(2),

    // ── Capture ──
    captureEnabled: z.boolean().default(true),
    pollIntervalMs: z.number().int().min(50).max(10_000).default(200),
    ignorePasswordManagers: z.boolean().default(true),
    ignoredApplications: z.array(z.string()).default([]),

    // ── Retention ──
    historyLimit: z.number().int().min(0).default(1000),
    /** Delete unpinned clips older than N days (0 = never) */
    autoDeleteAfterDays: z.number().int().min(0).default(0),

    // ── Enrichment ──
    fetchLinkMetadata: z.boolean().default(true),
    recognizeImageText: z.boolean().default(true),

    // ── Diagnostics ──
    logLevel: LogLevelSchema.default('info'),
  })
  .passthrough(); // Allow unknown keys for forward-compat

// ─── Derived types ───

/** Full config after parsing (defaults applied, all fields present) */
export type ClipKeepConfigParsed = z.infer<typeof ClipKeepConfigSchema>;

/** Config input (all fields optional — for file data or partial updates) */
export type ClipKeepConfigInput = z.input<typeof ClipKeepConfigSchema>;

// ─── Migration system ───

export const CURRENT_CONFIG_VERSION = 2;

export type ConfigMigration = (config: Record<string, unknown>) => Record<string, unknown>;

/**
 * Ordered migrations: key = source version, value = transform to next version.
 */
export const CONFIG_MIGRATIONS: Record<number, ConfigMigration> = {
  // v0 → v1: add _version field (configs written before versioning)
  0: (cfg) => ({ ...cfg, _version: 1 }),
  // v1 → v2: `ignoredBundleIds` was renamed to `ignoredApplications`
  1: (cfg) => {
    const { ignoredBundleIds, ...rest } = cfg;
    if (Array.isArray(ignoredBundleIds) && rest.ignoredApplications === undefined) {
      return { ...rest, ignoredApplications: ignoredBundleIds };
    }
    return rest;
  },
};
