import { configSchema, type SightcheckConfig } from './schema.js';

/** Every setting at its default: the schema applied to an empty config. */
export const DEFAULT_CONFIG: SightcheckConfig = configSchema.parse({});
