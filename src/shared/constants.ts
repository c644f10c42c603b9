/**
 * Shared constants — default values, limits, and marker identifiers.
 */

/** Default capture poll interval */
export const DEFAULT_POLL_INTERVAL_MS = 200;

/** Default cap on unpinned history records */
export const DEFAULT_HISTORY_LIMIT = 1000;

/** Gap between neighbouring records when a reorder rewrites timestamps */
export const REORDER_STEP_MS = 1000;

/** Pasteboard types that mark a payload as concealed or transient (password managers) */
export const CONCEALED_TYPES: readonly string[] = [
  'org.nspasteboard.ConcealedType',
  'org.nspasteboard.TransientType',
  'com.agilebits.onepassword',
];

/** Application ids of known password managers */
export const PASSWORD_MANAGER_APP_IDS: readonly string[] = [
  'com.agilebits.onepassword7',
  'com.1password.1password',
  'com.lastpass.LastPass',
  'com.bitwarden.desktop',
  'com.dashlane.dashlanephonefinal',
];

/** Derived-asset cache ceilings (entries) */
export const THUMBNAIL_CACHE_LIMIT = 200;
export const FAVICON_CACHE_LIMIT = 100;
export const LINK_IMAGE_CACHE_LIMIT = 100;

/** Default derived-asset sizes */
export const THUMBNAIL_MAX_SIZE = { width: 200, height: 150 } as const;
export const FAVICON_MAX_SIZE = { width: 64, height: 64 } as const;
export const LINK_IMAGE_MAX_SIZE = { width: 200, height: 120 } as const;

/** Max bytes downloaded for a page or an image during link enrichment */
export const MAX_ENRICHMENT_BYTES = 5 * 1024 * 1024;

/** Config file name inside the data directory */
export const CONFIG_FILE_NAME = 'clipkeep-config.json';

/** Database file name inside the data directory */
export const DATABASE_FILE_NAME = 'clipkeep.db';
