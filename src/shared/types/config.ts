/**
 * Shared configuration types.
 *
 * ClipKeepConfig is derived from the Zod schema in `shared/schemas/config-schema.ts`.
 * That schema is the single source of truth for shape, defaults, and validation.
 */

export type { ClipKeepConfigParsed as ClipKeepConfig, ClipKeepConfigInput } from '../schemas/config-schema';

export type { ClipKeepConfigParsed } from '../schemas/config-schema';

/** Config key literal union (declared keys only, not passthrough extras) */
export type ConfigKey = keyof (typeof import('../schemas/config-schema').ClipKeepConfigSchema)['shape'];
