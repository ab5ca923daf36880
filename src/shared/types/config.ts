/**
 * Shared configuration types.
 *
 * ClipTrailConfig is derived from the Zod schema in `shared/schemas/config-schema.ts`.
 * That schema is the single source of truth for shape, defaults, and validation.
 */

export type { ClipTrailConfigParsed as ClipTrailConfig } from '../schemas/config-schema';

/** Config key literal union */
export type ConfigKey = keyof import('../schemas/config-schema').ClipTrailConfigParsed;
