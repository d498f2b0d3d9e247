/**
 * Application config module.
 *
 * @module config
 */

export type { AppConfig, AuthConfig } from './types.js';

export { AppConfigSchema, AuthConfigSchema, DEFAULT_APP_CONFIG } from './schema.js';
export type { InferredAppConfig } from './schema.js';

export { readAppConfig, validateAppConfig, AppConfigError } from './reader.js';
